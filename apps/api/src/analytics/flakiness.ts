import type {
  AnalysisThresholds,
  FlakinessOutcome,
  FlakyTestEntry,
  JobRun,
  StreakMap,
} from '@runstreak/shared';

import { logger } from '../utils/logger.js';

type FlakinessThresholds = Pick<AnalysisThresholds, 'flakyBuildsMin' | 'flakyBuildsMax' | 'flakyFailuresMin'>;

/**
 * Counts, per test, the runs that contain it in the given name list. A name
 * listed twice in one run counts once.
 */
function countPerRun(runs: readonly JobRun[], names: (run: JobRun) => readonly string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const run of runs) {
    for (const name of new Set(names(run))) {
      counts.set(name, (counts.get(name) ?? 0) + 1);
    }
  }
  return counts;
}

/**
 * Tests that succeeded at least once in the most recent `numBuilds` runs
 */
export function findSuccesses(runs: readonly JobRun[], numBuilds: number): Set<string> {
  const successes = new Set<string>();
  for (const run of runs.slice(0, numBuilds)) {
    for (const name of run.succeeded) {
      successes.add(name);
    }
  }
  return successes;
}

/**
 * Flaky test detection over the run history of one unique job.
 *
 * A test is flaky when it both succeeds and fails within the recent window
 * and started failing afresh at least `flakyFailuresMin` times there. A test
 * broken for many runs in a row starts failing only once, so it is not
 * flaky however long it stays broken.
 */
export class FlakinessDetector {
  constructor(private readonly thresholds: FlakinessThresholds) {}

  /**
   * @param runs - Full loaded history, newest first
   * @param streaks - Streak maps of `runs`, same order
   */
  public detect(runs: readonly JobRun[], streaks: readonly StreakMap[]): FlakinessOutcome {
    const { flakyBuildsMin, flakyBuildsMax, flakyFailuresMin } = this.thresholds;
    const window = streaks.slice(0, flakyBuildsMax);

    if (window.length < flakyBuildsMin) {
      logger.info(
        { availableBuilds: window.length, requiredBuilds: flakyBuildsMin },
        'Not enough data to perform flakiness analysis'
      );
      return { status: 'insufficient-data', availableBuilds: window.length, requiredBuilds: flakyBuildsMin };
    }

    const onsets = this.countFailureOnsets(window);
    const successes = findSuccesses(runs, flakyBuildsMax);
    const failures = countPerRun(runs, (run) => run.failed);
    const attempts = countPerRun(runs, (run) => run.attempted);

    const flaky: FlakyTestEntry[] = [];
    for (const [testName, onsetCount] of onsets) {
      if (!successes.has(testName) || onsetCount < flakyFailuresMin) {
        continue;
      }
      const attempted = attempts.get(testName) ?? 0;
      flaky.push({
        testName,
        failureRatio: attempted > 0 ? (failures.get(testName) ?? 0) / attempted : 0,
      });
    }

    return { status: 'analyzed', sampledBuilds: window.length, flaky };
  }

  /**
   * Number of runs in which each test failed with a streak of exactly 1.
   * Only tests that failed in the run itself are looked at, so an unresolved
   * streak carried through runs that skipped the test is not counted again.
   */
  private countFailureOnsets(window: readonly StreakMap[]): Map<string, number> {
    const onsets = new Map<string, number>();
    for (const { failing } of window) {
      for (const [testName, count] of failing) {
        const previous = onsets.get(testName) ?? 0;
        onsets.set(testName, count === 1 ? previous + 1 : previous);
      }
    }
    return onsets;
  }
}
