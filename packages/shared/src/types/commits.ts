/**
 * A commit in the singly-linked chain of one repository branch.
 * `prevHash` points toward the repository root; it is usually, but not
 * always, the parent commit.
 */
export interface CommitInfo {
  readonly commitHash: string;
  readonly prevHash: string;
  /** Epoch seconds */
  readonly commitTime: number;
  readonly title: string;
  readonly committerEmail: string;
  readonly authorEmail: string;
}
