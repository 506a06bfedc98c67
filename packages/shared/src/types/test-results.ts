/**
 * Test result types
 *
 * Normalized per-test outcomes as produced by the log parsers, and the
 * per-run view of a unique job that the analysis core works on.
 */

/**
 * Result of a single test case. The numeric values are what the store
 * persists, so they must never be renumbered.
 */
export enum TestResult {
  Unknown = 0,
  Pass = 1,
  Fail = 2,
  Skip = 3,
  Timeout = 4,
  FailIgnored = 5,
  Abort = 6,
  Error = 7,
}

export interface TestOutcome {
  readonly name: string;
  readonly result: TestResult;
  /** Reason for the result, if the log gave one */
  readonly reason: string;
  /** Duration in microseconds */
  readonly duration: number;
}

/**
 * What the test suite itself thought about the run
 */
export type RunResultCode = 'success' | 'failure' | 'truncated' | 'unknown';

/**
 * Raw key/value metadata of one stored run, as written by the ingestion layer.
 * Provider-specific keys live here and are never threaded through the core.
 */
export type RunMetadataMap = Readonly<Record<string, string>>;

/**
 * One execution of a unique job, with its test names partitioned by outcome.
 * `attempted` includes `failed` and `succeeded`; it excludes skipped and
 * unknown tests.
 */
export interface JobRun {
  readonly id: number;
  /** Epoch seconds */
  readonly time: number;
  readonly failed: readonly string[];
  readonly attempted: readonly string[];
  readonly succeeded: readonly string[];
  readonly url: string;
  readonly checkRepo: string;
  /** Source commit hash, possibly abbreviated or empty */
  readonly commit: string;
  readonly aborted: boolean;
  readonly testResult: RunResultCode;
}

/**
 * Row returned when listing the runs of a unique job
 */
export interface RunListing {
  readonly runId: number;
  readonly time: number;
}

/**
 * The parts of a unique job key: account, repo, origin and job name
 */
export interface UniqueJobParts {
  readonly account: string;
  readonly repo: string;
  readonly origin: string;
  readonly jobName: string;
}
