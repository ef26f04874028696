/**
 * Database Configuration
 * PostgreSQL pool for the candles hypertable
 */

import { Pool } from 'pg';

/**
 * Create PostgreSQL connection pool
 */
export function createDatabasePool(connectionString: string): Pool {
  const pool = new Pool({
    connectionString,
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  pool.on('error', (err) => {
    console.error('[Database] Idle client error:', err);
  });

  return pool;
}

/**
 * Close database pool gracefully
 */
export async function closeDatabasePool(pool: Pool): Promise<void> {
  await pool.end();
}
