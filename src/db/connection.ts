import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { sql } from 'drizzle-orm';
import pg from 'pg';
import * as schema from './schema.js';

const { Pool } = pg;

export type Database = NodePgDatabase<typeof schema>;

let pool: pg.Pool | undefined;
let db: Database | undefined;

/**
 * Get or create the PostgreSQL connection pool.
 */
export function getPool(connectionString?: string): pg.Pool {
  if (!pool) {
    const url = connectionString ?? process.env.DATABASE_URL;
    if (!url) {
      throw new Error(
        'DATABASE_URL is not set. Provide it as an environment variable or pass a connection string.',
      );
    }
    pool = new Pool({ connectionString: url });
  }
  return pool;
}

/**
 * Get the Drizzle ORM instance bound to the shared pool.
 */
export function getDb(connectionString?: string): Database {
  if (!db) {
    db = drizzle(getPool(connectionString), { schema });
  }
  return db;
}

/**
 * Round-trip a trivial query; used at startup and by the health check.
 */
export async function pingDb(database: Database = getDb()): Promise<void> {
  await database.execute(sql`select 1`);
}

/**
 * Close the database connection pool gracefully.
 */
export async function closeDb(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = undefined;
    db = undefined;
  }
}
