import type { JobRun } from '@runstreak/shared';

import { logger } from '../utils/logger.js';

/**
 * Finds the newest run older than `streakStart` in which the test succeeded.
 * Returns null when the history runs out first.
 */
export function findLastGoodRun(runs: readonly JobRun[], testName: string, streakStart: number): JobRun | null {
  for (let index = streakStart + 1; index < runs.length; index++) {
    const run = runs[index];
    if (run === undefined) {
      break;
    }
    if (run.succeeded.includes(testName)) {
      return run;
    }
    if (!run.attempted.includes(testName) && !run.failed.includes(testName)) {
      // The test may not have existed yet, or was skipped here
      logger.debug({ runId: run.id, testName }, 'Test not attempted while looking for its last success');
    }
  }
  return null;
}
