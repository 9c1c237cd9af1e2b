import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: [
        'src/**/*.test.ts',
        'src/__tests__/**',
        'src/config/migrate.ts',
        'src/index.ts',
      ],
      reporter: ['text', 'lcov', 'html'],
    },
    setupFiles: [],
  },
});
