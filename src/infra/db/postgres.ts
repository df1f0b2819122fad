import pg from 'pg';
import type { QueryResult, QueryResultRow } from 'pg';
import type { DatabaseSettings } from '../config/config.js';
import type { Logger } from '../logger/logger.js';
import { describeError } from '../../core/errors.js';

/**
 * The slice of `pg` the stores use; `pg.Pool` and `pg.PoolClient` satisfy it.
 */
export interface SqlClient {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[],
  ): Promise<QueryResult<R>>;
  release(): void;
}

export interface SqlPool {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[],
  ): Promise<QueryResult<R>>;
  connect(): Promise<SqlClient>;
  end(): Promise<void>;
}

/**
 * Pool sized and timed from config. Each acquire, statement and round-trip is
 * bounded so a stalled connection fails one unit of work, not the process.
 */
export function createPostgresPool(settings: DatabaseSettings, logger: Logger): pg.Pool {
  if (!settings.url) {
    throw new Error('Postgres pool requires a connection url');
  }

  const pool = new pg.Pool({
    connectionString: settings.url,
    max: settings.maxConnections,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: settings.connectionTimeoutMs,
    statement_timeout: settings.queryTimeoutMs,
    query_timeout: settings.queryTimeoutMs,
  });

  pool.on('error', (error: Error) => {
    logger.error('postgres', `Idle client error: ${error.message}`);
  });

  logger.info('postgres', `Pool created (max ${settings.maxConnections} connections)`);
  return pool;
}

export async function withTransaction<T>(
  pool: SqlPool,
  logger: Logger,
  handler: (client: SqlClient) => Promise<T>,
): Promise<T> {
  const client = await pool.connect();

  try {
    await client.query('BEGIN');
    const result = await handler(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK').catch((rollbackError: unknown) => {
      logger.error('postgres', `Rollback failed: ${describeError(rollbackError)}`);
    });
    throw error;
  } finally {
    client.release();
  }
}
