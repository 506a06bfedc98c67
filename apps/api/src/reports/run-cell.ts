import type { JobRun } from '@runstreak/shared';

export type RunCellClass = 'success' | 'successold' | 'failure' | 'failureold' | 'aborted' | 'unknown';

export interface RunCell {
  readonly cssClass: RunCellClass;
  /** Number of failed tests for failing runs, else successful tests */
  readonly count: number;
  /** '*' when `count` is a failure count */
  readonly prefix: '' | '*';
}

/**
 * How one run is shown in the job table. Runs before `oldBefore` (epoch
 * seconds) get the faded variant of success and failure.
 */
export function classifyRunCell(run: JobRun, oldBefore: number): RunCell {
  const failures: RunCell = { cssClass: 'failure', count: run.failed.length, prefix: '*' };
  const successes: RunCell = { cssClass: 'success', count: run.succeeded.length, prefix: '' };

  let cell: RunCell;
  if (run.testResult === 'success') {
    cell = successes;
  } else if (run.testResult === 'truncated' || run.aborted) {
    cell = run.failed.length === 0 ? { ...successes, cssClass: 'aborted' } : { ...failures, cssClass: 'aborted' };
  } else if (run.testResult === 'failure') {
    cell = failures;
  } else {
    // Older runs have no result code; go by the failures alone
    cell = run.failed.length === 0 ? successes : { ...failures, cssClass: 'unknown' };
  }

  if (run.time < oldBefore) {
    if (cell.cssClass === 'success') {
      return { ...cell, cssClass: 'successold' };
    }
    if (cell.cssClass === 'failure') {
      return { ...cell, cssClass: 'failureold' };
    }
  }
  return cell;
}
