/**
 * PostgreSQL Pool Configuration
 * Used for statements that need row locks, conditional updates and
 * multi-statement transactions
 */

import pg from 'pg';
import type { QueryResult, QueryResultRow } from 'pg';

import type { AppConfig } from './config.js';
import { DuplicateEventError, InfrastructureUnavailableError } from './errors.js';

/**
 * The part of a pg client the adapters use
 */
export interface SqlClient {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[]
  ): Promise<QueryResult<R>>;
}

export interface SqlTransactionClient extends SqlClient {
  release(err?: Error | boolean): void;
}

export interface SqlPool extends SqlClient {
  connect(): Promise<SqlTransactionClient>;
}

export function createPool(
  config: Pick<AppConfig, 'DATABASE_URL' | 'DATABASE_STATEMENT_TIMEOUT_MS'>
): pg.Pool {
  const pool = new pg.Pool({
    connectionString: config.DATABASE_URL,
    statement_timeout: config.DATABASE_STATEMENT_TIMEOUT_MS,
    connectionTimeoutMillis: 3000,
    max: 10,
  });

  // Idle client errors are emitted on the pool; without a listener they crash the process
  pool.on('error', (err) => {
    console.error('Postgres pool error:', err);
  });

  return pool;
}

/**
 * Wrap driver failures so callers see one retryable error type.
 * Domain errors raised inside a unit of work pass through untouched.
 */
export function toDatabaseError(err: unknown): Error {
  if (
    err instanceof DuplicateEventError ||
    err instanceof InfrastructureUnavailableError
  ) {
    return err;
  }
  return new InfrastructureUnavailableError('database', err);
}
