import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import { configManager } from '../config/manager.js';
import { createLogger } from '../utils/logger.js';
import * as schema from './schema.js';

const log = createLogger('database');

export type Database = NodePgDatabase<typeof schema>;

export interface DatabaseOptions {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  max: number;
  ssl: boolean;
}

export const SCHEMA_SQL_PATH = fileURLToPath(new URL('../../database/schema.sql', import.meta.url));

let pool: pg.Pool | null = null;
let db: Database | null = null;

export function getDb(): Database {
  if (!db) {
    throw new Error('Database not initialized. Call initDatabase() first.');
  }
  return db;
}

function getPool(): pg.Pool {
  if (!pool) {
    throw new Error('Database not initialized. Call initDatabase() first.');
  }
  return pool;
}

export function databaseOptionsFromConfig(): DatabaseOptions {
  return {
    host: configManager.get('db.host'),
    port: configManager.get('db.port'),
    database: configManager.get('db.name'),
    user: configManager.get('db.user'),
    password: configManager.get('db.password'),
    max: configManager.get('db.poolMax'),
    ssl: configManager.get('db.ssl'),
  };
}

export function initDatabase(options: DatabaseOptions = databaseOptionsFromConfig()): Database {
  if (db) return db;

  log.info(
    { host: options.host, port: options.port, database: options.database },
    'Initializing database',
  );

  pool = new pg.Pool({
    host: options.host,
    port: options.port,
    database: options.database,
    user: options.user,
    password: options.password,
    max: options.max,
    ssl: options.ssl ? { rejectUnauthorized: false } : false,
  });
  pool.on('error', (err) => {
    log.error({ err }, 'Idle database client error');
  });

  db = drizzle(pool, { schema });
  return db;
}

/** Runs database/schema.sql; every statement is IF NOT EXISTS. */
export async function ensureSchema(): Promise<void> {
  const ddl = readFileSync(SCHEMA_SQL_PATH, 'utf-8');
  const client = await getPool().connect();
  try {
    await client.query(ddl);
  } finally {
    client.release();
  }
  log.info('Tables and indexes created/verified');
}

export async function closeDatabase(): Promise<void> {
  if (!pool) return;
  await pool.end();
  pool = null;
  db = null;
  log.info('Database connection closed');
}
