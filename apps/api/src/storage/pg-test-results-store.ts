import type { RunListing, RunMetadataMap, TestOutcome } from '@runstreak/shared';
import type { Pool } from 'pg';

import { StorageError } from '../errors.js';
import { classifyResult } from '../ingestion/result-classifier.js';
import { runIndexTime } from '../ingestion/run-metadata.js';

import { inTransaction, withStorageErrors } from './pg-utils.js';
import type { TestResultsStore } from './types.js';

const UNIQUE_JOB_EXPR = `(account || ',' || repo || ',' || origin || ',' || uniquejobname)`;

const UNIQUE_JOBS_SQL = `
  SELECT DISTINCT ${UNIQUE_JOB_EXPR} AS uniquejob, repo, origin, uniquejobname, account
  FROM testruns
  WHERE repo = $1 AND time >= $2
  ORDER BY repo, origin, uniquejobname, account`;

// Includes pull request runs; the run loader drops those
const RUNS_BY_UNIQUE_JOB_SQL = `
  SELECT id, time FROM testruns
  WHERE ${UNIQUE_JOB_EXPR} = $1 AND time >= $2 AND time < $3
  ORDER BY time DESC`;

const INSERT_RUN_SQL = `
  INSERT INTO testruns (time, repo, origin, account, runid, uniquejobname, ingesttime)
  VALUES ($1, $2, $3, $4, $5, $6, $7)
  RETURNING id`;

const INSERT_META_SQL = `
  INSERT INTO testrunmeta (id, name, value)
  SELECT $1, name, value FROM unnest($2::text[], $3::text[]) AS m(name, value)`;

const INSERT_RESULTS_SQL = `
  INSERT INTO testresults (id, testid, result, resulttext, runtime)
  SELECT $1, testid, result, resulttext, runtime
  FROM unnest($2::text[], $3::smallint[], $4::text[], $5::bigint[]) AS r(testid, result, resulttext, runtime)`;

interface RunRow {
  id: number;
  // BIGINT columns arrive as strings
  time: string;
}

interface ResultRow {
  testid: string;
  result: number;
  resulttext: string;
  runtime: string;
}

export class PgTestResultsStore implements TestResultsStore {
  constructor(private readonly pool: Pick<Pool, 'query' | 'connect'>) {}

  async listUniqueJobs(repo: string, sinceTime: number): Promise<string[]> {
    const result = await withStorageErrors('List unique jobs', () =>
      this.pool.query<{ uniquejob: string }>(UNIQUE_JOBS_SQL, [repo, sinceTime])
    );
    return result.rows.map((row) => row.uniquejob);
  }

  async listRuns(uniqueJob: string, fromTime: number, toTime: number): Promise<RunListing[]> {
    const result = await withStorageErrors('List runs', () =>
      this.pool.query<RunRow>(RUNS_BY_UNIQUE_JOB_SQL, [uniqueJob, fromTime, toTime])
    );
    return result.rows.map((row) => ({ runId: row.id, time: Number(row.time) }));
  }

  async getRunMetadata(runId: number): Promise<RunMetadataMap> {
    const result = await withStorageErrors('Read run metadata', () =>
      this.pool.query<{ name: string; value: string }>('SELECT name, value FROM testrunmeta WHERE id = $1', [runId])
    );
    const meta: Record<string, string> = {};
    for (const row of result.rows) {
      meta[row.name] = row.value;
    }
    return meta;
  }

  async getTestOutcomes(runId: number): Promise<TestOutcome[]> {
    const result = await withStorageErrors('Read test results', () =>
      this.pool.query<ResultRow>(
        'SELECT testid, result, resulttext, runtime FROM testresults WHERE id = $1',
        [runId]
      )
    );
    return result.rows.map((row) => ({
      name: row.testid,
      result: classifyResult(row.result),
      reason: row.resulttext,
      duration: Number(row.runtime),
    }));
  }

  async storeRun(meta: RunMetadataMap, outcomes: readonly TestOutcome[]): Promise<number> {
    const time = runIndexTime(meta);
    const { checkrepo, origin, runid, uniquejobname } = meta;
    if (time === null || !checkrepo || !origin || !runid || !uniquejobname) {
      throw new StorageError('Malformed run metadata', undefined, { runid, checkrepo });
    }
    const names = Object.keys(meta);

    return withStorageErrors('Store run', () =>
      inTransaction(this.pool, async (client) => {
        const inserted = await client.query<{ id: number }>(INSERT_RUN_SQL, [
          time,
          checkrepo,
          origin,
          meta.account ?? '',
          runid,
          uniquejobname,
          Math.floor(Date.now() / 1000),
        ]);
        const id = inserted.rows[0]?.id;
        if (id === undefined) {
          throw new StorageError('Run insert returned no ID');
        }
        await client.query(INSERT_META_SQL, [id, names, names.map((name) => meta[name] ?? '')]);
        await client.query(INSERT_RESULTS_SQL, [
          id,
          outcomes.map((outcome) => outcome.name),
          outcomes.map((outcome) => outcome.result),
          outcomes.map((outcome) => outcome.reason),
          outcomes.map((outcome) => outcome.duration),
        ]);
        return id;
      })
    );
  }
}
