import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from '../models/schema.js';
import { createChildLogger } from './logger.js';

const log = createChildLogger('database');

function connect(url: string) {
  const client = postgres(url, {
    max: 20,
    idle_timeout: 20,
    connect_timeout: 10,
  });
  return { client, db: drizzle(client, { schema }) };
}

let _conn: ReturnType<typeof connect> | null = null;

export function getDb(databaseUrl?: string) {
  if (!_conn) {
    const url = databaseUrl || process.env.DATABASE_URL;
    if (!url) throw new Error('DATABASE_URL is required');

    _conn = connect(url);
    log.info('Database connection pool created');
  }
  return _conn.db;
}

export async function closeDb() {
  if (_conn) {
    await _conn.client.end();
    _conn = null;
    log.info('Database connection closed');
  }
}

export type Database = ReturnType<typeof getDb>;
