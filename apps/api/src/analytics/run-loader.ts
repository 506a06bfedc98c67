import { type JobRun, sortTestNames, type TestOutcome, TestResult } from '@runstreak/shared';

import { StorageError } from '../errors.js';
import { isAborted, isPullRequest, runResultCode, runUrl } from '../ingestion/run-metadata.js';
import type { TestResultsStore } from '../storage/types.js';
import { logger } from '../utils/logger.js';

interface PartitionedTests {
  failed: string[];
  attempted: string[];
  succeeded: string[];
}

/**
 * Splits the outcomes of one run into failed, attempted and succeeded names.
 * Anything that is not Unknown or Skip counts as attempted.
 */
export function partitionOutcomes(outcomes: readonly TestOutcome[]): PartitionedTests {
  const failed: string[] = [];
  const attempted: string[] = [];
  const succeeded: string[] = [];

  for (const { name, result } of outcomes) {
    if (result === TestResult.Pass) {
      succeeded.push(name);
    } else if (result === TestResult.Fail) {
      failed.push(name);
    }
    if (result !== TestResult.Unknown && result !== TestResult.Skip) {
      attempted.push(name);
    }
  }

  return {
    failed: sortTestNames(failed),
    attempted: sortTestNames(attempted),
    succeeded: sortTestNames(succeeded),
  };
}

/**
 * Builds the run history of a unique job from the test results store
 */
export class RunLoader {
  constructor(private readonly store: TestResultsStore) {}

  /**
   * Loads the mainline runs of a unique job in [fromTime, toTime), newest
   * first. Pull request runs are left out.
   */
  public async load(uniqueJob: string, fromTime: number, toTime: number): Promise<JobRun[]> {
    const listings = await this.store.listRuns(uniqueJob, fromTime, toTime);
    const runs: JobRun[] = [];

    for (const { runId, time } of listings) {
      const meta = await this.store.getRunMetadata(runId);
      const { checkrepo: checkRepo, origin } = meta;
      if (!checkRepo || !origin) {
        throw new StorageError('Malformed run metadata', undefined, { runId, uniqueJob });
      }
      if (isPullRequest(meta)) {
        continue;
      }

      let testResult = runResultCode(meta);
      if (testResult === null) {
        logger.warn({ runId, testresult: meta.testresult, uniqueJob }, 'Unrecognized run result code');
        testResult = 'unknown';
      }

      const outcomes = await this.store.getTestOutcomes(runId);
      runs.push({
        id: runId,
        time,
        ...partitionOutcomes(outcomes),
        url: runUrl(meta),
        checkRepo,
        commit: meta.commit ?? '',
        aborted: isAborted(meta),
        testResult,
      });
    }

    // The store already orders by time; ties keep the store's order
    runs.sort((a, b) => b.time - a.time);
    logger.debug({ uniqueJob, runs: runs.length }, 'Loaded job runs');
    return runs;
  }
}
