import { type AnalysisThresholds, type JobRun, sortTestNames, type StreakMap } from '@runstreak/shared';

import { streakOf } from './streaks.js';

/**
 * Tests failing in the latest run whose streak exceeds `permafailFailuresMin`,
 * sorted by test name. The job's own result is not looked at; a run marked
 * successful can still hold ignored failures.
 */
export function detectPermafails(
  latestRun: JobRun | undefined,
  latestStreaks: StreakMap | undefined,
  thresholds: Pick<AnalysisThresholds, 'permafailFailuresMin'>
): string[] {
  if (latestRun === undefined || latestStreaks === undefined) {
    return [];
  }
  return sortTestNames(
    latestRun.failed.filter((testName) => streakOf(latestStreaks, testName) > thresholds.permafailFailuresMin)
  );
}
