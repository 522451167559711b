/**
 * PostgreSQL Connection Configuration
 *
 * One pool per store: the relational store and the pgvector store may live in
 * different databases, and each fails independently.
 */

import { Pool, type PoolConfig } from 'pg';
import type { Logger } from 'pino';
import { logger as rootLogger } from '../utils/logger.js';
import { withTimeout } from '../utils/withTimeout.js';
import { StoreConnectionError, type StoreName } from '../utils/pipelineErrors.js';

/**
 * Result shape the stores read from a query
 */
export interface SqlResult {
  rows: unknown[];
  rowCount: number | null;
}

export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<SqlResult>;
}

export interface SqlPoolClient extends SqlClient {
  release(): void;
}

/**
 * The part of pg.Pool the stores use
 */
export interface SqlPool extends SqlClient {
  connect(): Promise<SqlPoolClient>;
  end(): Promise<void>;
}

/**
 * Create a PostgreSQL connection pool for one store
 */
export function createPostgresPool(store: StoreName, config: PoolConfig, logger: Logger = rootLogger): Pool {
  const pool = new Pool({
    keepAliveInitialDelayMillis: 10000,
    allowExitOnIdle: false,
    ...config,
  });

  pool.on('error', (err) => {
    logger.error(
      {
        store,
        error: err,
        poolTotal: pool.totalCount,
        poolIdle: pool.idleCount,
        poolWaiting: pool.waitingCount,
      },
      'Unexpected error on idle PostgreSQL client, will retry on next query'
    );
  });

  pool.on('connect', () => {
    logger.debug({ store }, 'PostgreSQL client connected to pool');
  });

  return pool;
}

/**
 * Run SELECT 1 against a pool
 *
 * @throws StoreConnectionError with a hint for the common failure codes
 */
export async function testPostgresConnection(
  store: StoreName,
  pool: SqlClient,
  timeoutMs: number,
  logger: Logger = rootLogger
): Promise<void> {
  try {
    await withTimeout(pool.query('SELECT 1'), timeoutMs, `${store} store connection test`);
    logger.info({ store }, 'PostgreSQL connection established');
  } catch (error) {
    const code = error && typeof error === 'object' && 'code' in error ? error.code : undefined;
    let hint: string | undefined;
    if (code === '28P01') {
      hint = 'Password authentication failed. Check DATABASE_PASSWORD / VECTOR_DATABASE_PASSWORD.';
    } else if (code === 'ECONNREFUSED') {
      hint = 'Connection refused. Is PostgreSQL running and reachable on the configured host and port?';
    } else if (code === '3D000') {
      hint = 'Database does not exist. Create it or fix DATABASE_NAME / VECTOR_DATABASE_NAME.';
    }
    logger.error({ store, error, code, hint }, 'PostgreSQL connection failed');
    throw new StoreConnectionError(store, error);
  }
}
