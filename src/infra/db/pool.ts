import pg from 'pg';
import type { Pool as PgPool } from 'pg';
import type { AppConfig } from '../config.js';
import { logger } from '../logger.js';

const { Pool } = pg;

/**
 * The slice of `pg.Pool` the stores use. Tests substitute an in-process fake.
 */
export type Queryable = Pick<PgPool, 'query'>;

/**
 * Create the connection pool. Called once at startup; the caller owns the
 * pool and must `end()` it on shutdown.
 */
export function createPool(config: Pick<AppConfig, 'databaseUrl' | 'store'>): PgPool {
  if (!config.databaseUrl) {
    throw new Error('DATABASE_URL environment variable is required');
  }

  const pool = new Pool({
    connectionString: config.databaseUrl,
    max: 20,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: config.store.timeoutMs,
    query_timeout: config.store.timeoutMs,
  });

  pool.on('connect', () => {
    logger.debug('Database connection established');
  });

  pool.on('error', (err) => {
    logger.error({ err }, 'Unexpected database error');
  });

  return pool;
}
