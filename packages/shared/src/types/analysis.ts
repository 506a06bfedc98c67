/**
 * Analysis types
 *
 * Everything here is derived data: recomputed from the run list on every
 * analysis call and never persisted.
 */

import type { JobRun } from './test-results.js';

/**
 * Named thresholds the analysis core requires. See `analysisThresholdsSchema`
 * for the invariants between them.
 */
export interface AnalysisThresholds {
  /** Minimum number of builds needed to perform flakiness analysis */
  readonly flakyBuildsMin: number;
  /** Maximum number of recent builds looked at for flakiness analysis */
  readonly flakyBuildsMax: number;
  /** Minimum number of separate failure onsets before a test is flaky */
  readonly flakyFailuresMin: number;
  /** A test is a permafail once its streak exceeds this */
  readonly permafailFailuresMin: number;
  readonly reportConsecutiveFailures: number;
  /** Hours of history included in an analysis */
  readonly analysisHours: number;
}

/**
 * Consecutive-failure counts for one run.
 *
 * `failing` holds the tests that failed in the run itself. `pending` holds
 * tests whose streak is unresolved because they were not attempted in the run;
 * their count is carried unchanged to the next run.
 */
export interface StreakMap {
  readonly failing: ReadonlyMap<string, number>;
  readonly pending: ReadonlyMap<string, number>;
}

export interface FlakyTestEntry {
  readonly testName: string;
  /** Failures divided by attempts over the whole loaded history, in [0, 1] */
  readonly failureRatio: number;
}

export type FlakinessOutcome =
  | {
      readonly status: 'insufficient-data';
      readonly availableBuilds: number;
      readonly requiredBuilds: number;
    }
  | {
      readonly status: 'analyzed';
      readonly sampledBuilds: number;
      readonly flaky: readonly FlakyTestEntry[];
    };

export type UndeterminedReason = 'commit-not-found' | 'out-of-order';

export type BisectionOutcome =
  | {
      readonly kind: 'exact';
      readonly commit: string;
      readonly commitUrl: string;
      readonly lastGoodUrl: string;
    }
  | {
      readonly kind: 'range';
      /** First commit after the last known good one */
      readonly firstBadCommit: string;
      /** Commit of the first run seen failing */
      readonly lastBadCommit: string;
      readonly possibleCommits: number;
      readonly lastGoodUrl: string;
    }
  | { readonly kind: 'failing-too-long' }
  | { readonly kind: 'undetermined'; readonly reason: UndeterminedReason };

export interface PermafailEntry {
  readonly testName: string;
  readonly streak: number;
  readonly bisection: BisectionOutcome;
  readonly message: string;
}

export interface JobAnalysis {
  readonly uniqueJob: string;
  readonly fromTime: number;
  readonly toTime: number;
  /** Runs newest first */
  readonly runs: readonly JobRun[];
  /** One streak map per run, same order as `runs` */
  readonly streaks: readonly StreakMap[];
  readonly flakiness: FlakinessOutcome;
  readonly permafails: readonly PermafailEntry[];
}
