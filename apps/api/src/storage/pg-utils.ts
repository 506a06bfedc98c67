import { readFile } from 'node:fs/promises';

import type { Pool, PoolClient } from 'pg';

import { StorageError } from '../errors.js';
import { logger } from '../utils/logger.js';

const UNIQUE_VIOLATION = '23505';

function pgErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Runs a store operation, turning any database failure into StorageError
 */
export async function withStorageErrors<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof StorageError) {
      throw error;
    }
    const code = pgErrorCode(error);
    logger.error({ err: error, operation, code }, 'Database operation failed');
    throw new StorageError(`${operation} failed`, error, {
      code,
      duplicate: code === UNIQUE_VIOLATION,
    });
  }
}

export async function inTransaction<T>(pool: Pick<Pool, 'connect'>, fn: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  let brokenConnection: Error | undefined;
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      logger.error({ err: rollbackError, cause: error }, 'Transaction rollback failed');
      brokenConnection = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
    }
    throw error;
  } finally {
    // A client that could not roll back is discarded rather than returned to the pool
    client.release(brokenConnection);
  }
}

/**
 * Creates the tables if they do not exist yet
 */
export async function ensureSchema(pool: Pick<Pool, 'query'>): Promise<void> {
  const sql = await readFile(new URL('../../sql/schema.sql', import.meta.url), 'utf8');
  await withStorageErrors('Create schema', () => pool.query(sql));
  logger.info('Database schema is up to date');
}
