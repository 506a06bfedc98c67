import type { AnalysisThresholds } from '../types/analysis.js';

export const DEFAULT_ANALYSIS_THRESHOLDS: AnalysisThresholds = {
  reportConsecutiveFailures: 3,
  flakyBuildsMin: 10,
  // Bounded by the analysis window long before this
  flakyBuildsMax: 999_999_999,
  flakyFailuresMin: 2,
  permafailFailuresMin: 2,
  analysisHours: 24 * 90,
};

export const DEFAULT_REPORT_SETTINGS = {
  /** Runs older than this are shown in a faded colour */
  OLD_JOB_HOURS: 24 * 3,
  /** A job with no runs for this long is shown as disabled */
  DISABLED_JOB_HOURS: 24 * 14,
} as const;

/**
 * CI step results that mean a run was cancelled or timed out, by origin.
 * Appveyor has no unambiguous signal for this.
 */
export const ABORTED_STEP_RESULTS: Readonly<Record<string, { key: string; value: string }>> = {
  azure: { key: 'cistepresult', value: 'canceled' },
  circle: { key: 'cistepresult', value: 'timedout' },
  cirrus: { key: 'ciresult', value: 'aborted' },
  gha: { key: 'cistepresult', value: 'cancelled' },
};

/** Set by the log parsers when a log ends before the test suite does */
export const TRUNCATED_TEST_RESULT = 'truncated';

/** Number of hash characters shown in messages */
export const COMMIT_HASH_DISPLAY_LENGTH = 9;

export const UNIQUE_JOB_SEPARATOR = ',';
