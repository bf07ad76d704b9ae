import { readFile } from 'node:fs/promises';
import { Pool } from 'pg';

let pool: Pool | null = null;

/**
 * Initialize the connection pool
 */
export function initializePool(connectionString: string): Pool {
  if (pool) {
    return pool;
  }

  pool = new Pool({ connectionString });
  pool.on('error', (error) => {
    console.error(
      JSON.stringify({
        timestamp: new Date().toISOString(),
        level: 'error',
        event: 'db_pool_error',
        message: error.message,
      })
    );
  });

  return pool;
}

/**
 * Get the current pool
 * Throws if not initialized
 */
export function getPool(): Pool {
  if (!pool) {
    throw new Error('Database pool is not initialized');
  }
  return pool;
}

/**
 * Close the pool
 */
export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}

/**
 * Apply schema.sql. Every statement is idempotent.
 */
export async function migrate(db: Pool): Promise<void> {
  const schema = await readFile(new URL('./schema.sql', import.meta.url), 'utf8');
  await db.query(schema);
}

/**
 * First row of a statement that must return one (insert/update ... returning)
 */
export function requireRow<T>(rows: T[]): T {
  const row = rows.at(0);
  if (row === undefined) {
    throw new Error('Statement returned no rows');
  }
  return row;
}
