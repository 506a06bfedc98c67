/**
 * Interpretation of stored run metadata
 *
 * Runs carry free-form key/value metadata written by the CI-specific ingesters.
 * These helpers read the few keys the analysis needs.
 */

import {
  ABORTED_STEP_RESULTS,
  RUN_TIME_KEYS,
  type RunMetadataMap,
  type RunResultCode,
  TRUNCATED_TEST_RESULT,
} from '@runstreak/shared';

const RESULT_CODES: ReadonlySet<string> = new Set<RunResultCode>(['success', 'failure', 'truncated', 'unknown']);

function isRunResultCode(value: string): value is RunResultCode {
  return RESULT_CODES.has(value);
}

/**
 * Whether the run was cancelled or timed out. Either the CI system says so,
 * or the log parser saw the log end early; both count.
 */
export function isAborted(meta: RunMetadataMap): boolean {
  const origin = meta.origin ?? '';
  const stepResult = ABORTED_STEP_RESULTS[origin];
  const abortedByCi = stepResult !== undefined && meta[stepResult.key] === stepResult.value;
  const truncated = meta.testresult === TRUNCATED_TEST_RESULT;
  return abortedByCi || truncated;
}

export function isPullRequest(meta: RunMetadataMap): boolean {
  const pullRequest = meta.pullrequest ?? '';
  return pullRequest !== '' && pullRequest !== '0';
}

/**
 * What the test suite reported, or null if it reported something unrecognized
 */
export function runResultCode(meta: RunMetadataMap): RunResultCode | null {
  const value = meta.testresult ?? 'unknown';
  return isRunResultCode(value) ? value : null;
}

export function runUrl(meta: RunMetadataMap): string {
  return meta.url ?? meta.runurl ?? '';
}

/**
 * Epoch seconds a run is indexed by: trigger time, else start time, else
 * finish time
 */
export function runIndexTime(meta: RunMetadataMap): number | null {
  for (const key of RUN_TIME_KEYS) {
    const value = meta[key];
    if (value !== undefined && /^\d+$/.test(value)) {
      return Number(value);
    }
  }
  return null;
}
