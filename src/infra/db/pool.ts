import pg from 'pg';
import type { Pool as PgPool } from 'pg';
import type { Logger } from '../logger.js';

const { Pool } = pg;

/**
 * Create the PostgreSQL pool. Nothing connects until the first query,
 * so unit tests can import modules that depend on a pool without a database.
 */
export function createPool(connectionString: string | undefined, logger: Logger): PgPool {
  const pool = new Pool({
    connectionString,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  pool.on('connect', () => {
    logger.debug('Database connection established');
  });

  pool.on('error', (err) => {
    logger.error({ err }, 'Unexpected database error');
  });

  return pool;
}
