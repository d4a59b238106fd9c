/**
 * Database connection module
 * The pool is created once at startup and handed to each repository.
 */

import { Pool } from 'pg';
import { config } from '../config';
import { logger } from '../utils/logger';

export interface PoolOptions {
  connectionString: string;
  max: number;
  idleTimeoutMillis: number;
  connectionTimeoutMillis: number;
}

/**
 * The slice of pg's Pool the repositories use
 */
export type Queryable = Pick<Pool, 'query'>;

export function poolOptionsFromConfig(): PoolOptions {
  return {
    connectionString: config.databaseUrl,
    max: config.dbPoolMax,
    idleTimeoutMillis: config.dbIdleTimeoutMs,
    connectionTimeoutMillis: config.dbConnectionTimeoutMs,
  };
}

/**
 * Create a database connection pool
 */
export function createPool(options: PoolOptions = poolOptionsFromConfig()): Pool {
  const pool = new Pool(options);

  pool.on('error', (err) => {
    logger.error('Unexpected database pool error', err);
  });

  logger.info('Database connection pool created', { max: options.max });
  return pool;
}

/**
 * Close database connection pool (for graceful shutdown)
 */
export async function closePool(pool: Pool): Promise<void> {
  await pool.end();
  logger.info('Database connection pool closed');
}

// Export types
export type { Pool, PoolClient } from 'pg';
