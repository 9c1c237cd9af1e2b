import { drizzle } from 'drizzle-orm/postgres-js';
import { migrate } from 'drizzle-orm/postgres-js/migrator';
import postgres from 'postgres';
import 'dotenv/config';
import { createChildLogger } from './logger.js';

const log = createChildLogger('migrate');

async function runMigrations() {
  const url = process.env.DATABASE_URL;
  if (!url) {
    log.fatal('DATABASE_URL is required');
    process.exit(1);
  }

  const client = postgres(url, { max: 1 });
  const db = drizzle(client);

  log.info('Running migrations...');
  await migrate(db, { migrationsFolder: './migrations' });
  log.info('Migrations complete');

  await client.end();
}

runMigrations().catch((err) => {
  log.fatal({ err }, 'Migration failed');
  process.exit(1);
});
