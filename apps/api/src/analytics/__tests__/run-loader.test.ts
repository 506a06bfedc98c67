import { TestResult } from '@runstreak/shared';
import { describe, it, expect, vi } from 'vitest';

import { StorageError } from '../../errors.js';
import { REPO, UNIQUE_JOB } from '../../__tests__/mocks/job-runs.js';
import { MemoryTestResultsStore } from '../../__tests__/mocks/memory-stores.js';
import { partitionOutcomes, RunLoader } from '../run-loader.js';

function outcome(name: string, result: TestResult) {
  return { name, result, reason: '', duration: 0 };
}

const META = {
  account: 'acme',
  checkrepo: REPO,
  origin: 'gha',
  uniquejobname: 'linux',
};

describe('partitionOutcomes', () => {
  it('should split outcomes into failed, attempted and succeeded names', () => {
    const result = partitionOutcomes([
      outcome('pass', TestResult.Pass),
      outcome('fail', TestResult.Fail),
      outcome('skip', TestResult.Skip),
      outcome('unknown', TestResult.Unknown),
      outcome('timeout', TestResult.Timeout),
      outcome('ignored', TestResult.FailIgnored),
      outcome('abort', TestResult.Abort),
      outcome('error', TestResult.Error),
    ]);

    expect(result).toEqual({
      failed: ['fail'],
      attempted: ['abort', 'error', 'fail', 'ignored', 'pass', 'timeout'],
      succeeded: ['pass'],
    });
  });

  it('should sort numeric test names before textual ones', () => {
    const result = partitionOutcomes([
      outcome('b', TestResult.Fail),
      outcome('100', TestResult.Fail),
      outcome('9', TestResult.Fail),
      outcome('a', TestResult.Fail),
    ]);

    expect(result.failed).toEqual(['9', '100', 'a', 'b']);
  });
});

describe('RunLoader', () => {
  it('should build runs newest first without pull request runs', async () => {
    const store = new MemoryTestResultsStore();
    await store.storeRun(
      { ...META, runid: '1', runtriggertime: '1000', commit: 'abc123', url: 'https://ci.example.com/1', testresult: 'failure' },
      [outcome('t1', TestResult.Fail), outcome('t2', TestResult.Pass)]
    );
    await store.storeRun(
      { ...META, runid: '2', runtriggertime: '2000', pullrequest: '12', testresult: 'success' },
      [outcome('t1', TestResult.Pass)]
    );
    await store.storeRun(
      { ...META, runid: '3', runtriggertime: '3000', runurl: 'https://ci.example.com/3', cistepresult: 'cancelled' },
      [outcome('t1', TestResult.Skip)]
    );

    const runs = await new RunLoader(store).load(UNIQUE_JOB, 0, 5000);

    expect(runs).toEqual([
      {
        id: 3,
        time: 3000,
        failed: [],
        attempted: [],
        succeeded: [],
        url: 'https://ci.example.com/3',
        checkRepo: REPO,
        commit: '',
        aborted: true,
        testResult: 'unknown',
      },
      {
        id: 1,
        time: 1000,
        failed: ['t1'],
        attempted: ['t1', 't2'],
        succeeded: ['t2'],
        url: 'https://ci.example.com/1',
        checkRepo: REPO,
        commit: 'abc123',
        aborted: false,
        testResult: 'failure',
      },
    ]);
  });

  it('should treat an unrecognized run result as unknown', async () => {
    const store = new MemoryTestResultsStore();
    await store.storeRun({ ...META, runid: '1', runtriggertime: '1000', testresult: 'exploded' }, []);

    const [run] = await new RunLoader(store).load(UNIQUE_JOB, 0, 5000);

    expect(run?.testResult).toBe('unknown');
  });

  it('should let storage errors through', async () => {
    const store = new MemoryTestResultsStore();
    vi.spyOn(store, 'listRuns').mockRejectedValue(new StorageError('List runs failed'));

    await expect(new RunLoader(store).load(UNIQUE_JOB, 0, 5000)).rejects.toThrow('List runs failed');
  });

  it('should refuse a run stored without its repository or origin', async () => {
    const store = new MemoryTestResultsStore();
    await store.storeRun({ ...META, runid: '1', runtriggertime: '1000', testresult: 'success' }, []);
    vi.spyOn(store, 'getRunMetadata').mockResolvedValue({ runid: '1', origin: 'gha' });

    const error = await new RunLoader(store).load(UNIQUE_JOB, 0, 5000).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(StorageError);
    expect(error).toMatchObject({ message: 'Malformed run metadata', details: { runId: 1, uniqueJob: UNIQUE_JOB } });
  });
});
