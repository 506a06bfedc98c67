/**
 * Storage interfaces
 *
 * The analysis core only talks to storage through these. Every method either
 * resolves or rejects with StorageError; there is no retry or partial result.
 */

import type { CommitInfo, RunListing, RunMetadataMap, TestOutcome } from '@runstreak/shared';

export interface TestResultsStore {
  /** Unique job keys with at least one run of `repo` since `sinceTime` */
  listUniqueJobs(repo: string, sinceTime: number): Promise<string[]>;

  /** Runs of a unique job with fromTime <= time < toTime, newest first */
  listRuns(uniqueJob: string, fromTime: number, toTime: number): Promise<RunListing[]>;

  getRunMetadata(runId: number): Promise<RunMetadataMap>;

  getTestOutcomes(runId: number): Promise<TestOutcome[]>;

  /** Stores a run with its metadata and outcomes, returning its ID */
  storeRun(meta: RunMetadataMap, outcomes: readonly TestOutcome[]): Promise<number>;
}

export interface CommitStore {
  /**
   * The given commit followed by every newer commit on the branch, oldest
   * first. Empty if the commit is not known. The commit may be abbreviated.
   */
  commitsAfter(repo: string, branch: string, commitHash: string): Promise<CommitInfo[]>;

  /** The given commit followed by every older commit on the branch, newest first */
  commitsBefore(repo: string, branch: string, commitHash: string): Promise<CommitInfo[]>;

  storeCommits(repo: string, branch: string, commits: readonly CommitInfo[]): Promise<void>;
}

export interface Stores {
  readonly results: TestResultsStore;
  readonly commits: CommitStore;
}
