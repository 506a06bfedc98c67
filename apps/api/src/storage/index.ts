import pg from 'pg';

import { logger } from '../utils/logger.js';

import { PgCommitStore } from './pg-commit-store.js';
import { PgTestResultsStore } from './pg-test-results-store.js';
import { ensureSchema } from './pg-utils.js';
import type { Stores } from './types.js';

export type { CommitStore, Stores, TestResultsStore } from './types.js';

export interface PgStores extends Stores {
  ping: () => Promise<void>;
  close: () => Promise<void>;
}

/**
 * Connects to PostgreSQL, creating the tables on first use
 */
export async function createPgStores(databaseUrl: string): Promise<PgStores> {
  const pool = new pg.Pool({ connectionString: databaseUrl });
  pool.on('error', (error) => {
    logger.error({ err: error }, 'Idle database client failed');
  });

  await ensureSchema(pool);

  return {
    results: new PgTestResultsStore(pool),
    commits: new PgCommitStore(pool),
    ping: async () => {
      await pool.query('SELECT 1');
    },
    close: () => pool.end(),
  };
}
