import { Pool } from 'pg';
import Database from 'better-sqlite3';
import { env } from './env.js';

// SQLite
let sqliteDb: Database.Database | null = null;

function getSqliteDb(): Database.Database {
  if (!sqliteDb) {
    sqliteDb = new Database(env.SQLITE_PATH, { readonly: false });
    sqliteDb.pragma('journal_mode = WAL');
  }
  return sqliteDb;
}

// PostgreSQL
let pgPool: Pool | null = null;

function getPgPool(): Pool {
  if (!pgPool) {
    pgPool = new Pool({
      host: env.DB_HOST,
      port: env.DB_PORT,
      database: env.DB_NAME,
      user: env.DB_USER,
      password: env.DB_PASSWORD,
      // A Lambda environment serves one invocation at a time
      max: process.env.AWS_LAMBDA_FUNCTION_NAME ? 2 : 20,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    });

    pgPool.on('error', (err) => {
      console.error('Unexpected error on idle client', err);
    });
  }
  return pgPool;
}

function useSqlite(): boolean {
  return env.DB_TYPE === 'sqlite';
}

export async function closePool(): Promise<void> {
  if (sqliteDb) {
    sqliteDb.close();
    sqliteDb = null;
  }
  if (pgPool) {
    await pgPool.end();
    pgPool = null;
  }
}

/**
 * Open the configured database (if it isn't already) and run a trivial query.
 * Throws when the database is unreachable.
 */
export async function verifyConnection(): Promise<void> {
  if (useSqlite()) {
    getSqliteDb().prepare('SELECT 1').get();
    console.log('SQLite connection successful');
    return;
  }

  const client = await getPgPool().connect();
  try {
    await client.query('SELECT 1');
  } finally {
    client.release();
  }
  console.log('PostgreSQL connection successful');
}

export async function testConnection(): Promise<boolean> {
  try {
    await verifyConnection();
    return true;
  } catch (error) {
    console.error('Database connection failed:', error);
    return false;
  }
}
