import type { JobRun, StreakMap } from '@runstreak/shared';

/**
 * Computes one streak map per run.
 *
 * Runs are given newest first and walked oldest first. A failure extends the
 * streak a test carried in from the previous run. A test that was not
 * attempted keeps its count, unresolved; a test that was attempted without
 * failing drops out. The result has the same length and order as `runs`.
 */
export function countConsecutiveFailures(runs: readonly JobRun[]): StreakMap[] {
  const maps: StreakMap[] = new Array<StreakMap>(runs.length);
  let carried = new Map<string, number>();

  for (let index = runs.length - 1; index >= 0; index--) {
    const run = runs[index];
    if (run === undefined) {
      continue;
    }
    const failedNow = new Set(run.failed);
    const attempted = new Set(run.attempted);

    const failing = new Map<string, number>();
    for (const test of failedNow) {
      failing.set(test, (carried.get(test) ?? 0) + 1);
    }

    const pending = new Map<string, number>();
    for (const [test, count] of carried) {
      if (!failedNow.has(test) && !attempted.has(test)) {
        pending.set(test, count);
      }
    }

    maps[index] = { failing, pending };
    carried = new Map([...failing, ...pending]);
  }

  return maps;
}

/**
 * Streak of a test in one run, counting unresolved streaks; 0 if none
 */
export function streakOf(map: StreakMap, testName: string): number {
  return map.failing.get(testName) ?? map.pending.get(testName) ?? 0;
}

/**
 * Index of the oldest run in the streak the test is on at `runs[0]`, or null
 * if it is not failing there. Runs that did not attempt the test are passed
 * over; the streak ends at the first older run that attempted it without a
 * failure.
 */
export function findStreakStart(runs: readonly JobRun[], testName: string): number | null {
  let start: number | null = null;

  for (const [index, run] of runs.entries()) {
    if (run.failed.includes(testName)) {
      start = index;
    } else if (run.attempted.includes(testName)) {
      break;
    } else if (index === 0) {
      return null;
    }
  }

  return start;
}
