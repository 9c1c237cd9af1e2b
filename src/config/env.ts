import { z } from 'zod';
import 'dotenv/config';

const envSchema = z.object({
  DATABASE_URL: z.string().url(),
  REDIS_URL: z.string().url().default('redis://localhost:6379'),
  PORT: z.coerce.number().default(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),

  // ─── Provider webhooks ────────────────────────────────────────────
  // Unset only in development: events are then accepted unsigned.
  WEBHOOK_SECRET: z.string().min(16).optional(),
  STRIPE_SECRET_KEY: z.string().optional(),
  PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),

  // ─── Auth ─────────────────────────────────────────────────────────
  JWT_SECRET: z.string().min(32),
  CRON_KEY: z.string().min(16).optional(),

  // ─── SMTP (lifecycle emails are skipped when unset) ──────────
  SMTP_HOST: z.string().optional(),
  SMTP_PORT: z.coerce.number().optional(),
  SMTP_USER: z.string().optional(),
  SMTP_PASS: z.string().optional(),
  SMTP_FROM: z.string().default('billing@localhost'),
  APP_BASE_URL: z.string().url().default('http://localhost:5173'),

  // ─── Lifecycle tuning ─────────────────────────────────────────────
  CONFLICT_RETRY_LIMIT: z.coerce.number().int().min(1).max(10).default(3),
  CLAIM_LEASE_SECONDS: z.coerce.number().int().positive().default(300),
  SWEEP_BATCH_SIZE: z.coerce.number().int().positive().default(100),
  ENABLE_SWEEPS: z.enum(['true', 'false']).default('true'),
}).superRefine((env, ctx) => {
  if (env.NODE_ENV === 'production' && !env.WEBHOOK_SECRET) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['WEBHOOK_SECRET'],
      message: 'WEBHOOK_SECRET is required in production',
    });
  }
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

export function getEnv(): Env {
  if (!_env) {
    const parsed = envSchema.safeParse(process.env);
    if (!parsed.success) {
      console.error('Invalid environment variables:', parsed.error.flatten().fieldErrors);
      process.exit(1);
    }
    _env = parsed.data;
  }
  return _env;
}

export { envSchema };
