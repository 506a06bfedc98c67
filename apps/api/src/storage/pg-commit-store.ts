import type { CommitInfo } from '@runstreak/shared';
import type { Pool } from 'pg';

import { inTransaction, withStorageErrors } from './pg-utils.js';
import type { CommitStore } from './types.js';

const COMMIT_COLUMNS = 'commithash, prevhash, committime, title, committeremail, authoremail';

// Guards against a corrupt chain that loops back on itself
const MAX_CHAIN_LENGTH = 100_000;

/**
 * The anchor matches by prefix so an abbreviated hash from a CI run finds its
 * commit. Each step follows one link of the chain: toward newer commits by
 * looking for the commit whose prevhash is the current one, toward older
 * commits by following prevhash.
 */
function chainSql(direction: 'newer' | 'older'): string {
  const join =
    direction === 'newer' ? 'next.prevhash = chain.commithash' : 'next.commithash = chain.prevhash';
  return `
    WITH RECURSIVE chain AS (
      SELECT anchor.*, 0 AS depth FROM (
        SELECT ${COMMIT_COLUMNS}, repo, branch FROM commitinfo
        WHERE repo = $1 AND branch = $2 AND left(commithash, length($3)) = $3
        ORDER BY committime DESC
        LIMIT 1
      ) AS anchor
      UNION ALL
      SELECT next.${COMMIT_COLUMNS.split(', ').join(', next.')}, next.repo, next.branch, chain.depth + 1
      FROM commitinfo AS next
      JOIN chain ON ${join} AND next.repo = chain.repo AND next.branch = chain.branch
      WHERE chain.depth < ${MAX_CHAIN_LENGTH}
    )
    SELECT ${COMMIT_COLUMNS} FROM chain ORDER BY depth`;
}

const COMMITS_AFTER_SQL = chainSql('newer');
const COMMITS_BEFORE_SQL = chainSql('older');

const INSERT_COMMIT_SQL = `
  INSERT INTO commitinfo (commithash, prevhash, repo, branch, committime, committeremail, authoremail, title)
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
  ON CONFLICT (commithash) DO NOTHING`;

interface CommitRow {
  commithash: string;
  prevhash: string;
  committime: string;
  title: string;
  committeremail: string;
  authoremail: string;
}

function toCommitInfo(row: CommitRow): CommitInfo {
  return {
    commitHash: row.commithash,
    prevHash: row.prevhash,
    commitTime: Number(row.committime),
    title: row.title,
    committerEmail: row.committeremail,
    authorEmail: row.authoremail,
  };
}

/**
 * Commit chain backed by PostgreSQL. A whole sub-chain is read in one
 * recursive query.
 */
export class PgCommitStore implements CommitStore {
  constructor(private readonly pool: Pick<Pool, 'query' | 'connect'>) {}

  async commitsAfter(repo: string, branch: string, commitHash: string): Promise<CommitInfo[]> {
    return this.readChain('Read commits after', COMMITS_AFTER_SQL, repo, branch, commitHash);
  }

  async commitsBefore(repo: string, branch: string, commitHash: string): Promise<CommitInfo[]> {
    return this.readChain('Read commits before', COMMITS_BEFORE_SQL, repo, branch, commitHash);
  }

  async storeCommits(repo: string, branch: string, commits: readonly CommitInfo[]): Promise<void> {
    await withStorageErrors('Store commits', () =>
      inTransaction(this.pool, async (client) => {
        for (const commit of commits) {
          await client.query(INSERT_COMMIT_SQL, [
            commit.commitHash,
            commit.prevHash,
            repo,
            branch,
            commit.commitTime,
            commit.committerEmail,
            commit.authorEmail,
            commit.title,
          ]);
        }
      })
    );
  }

  private async readChain(
    operation: string,
    sql: string,
    repo: string,
    branch: string,
    commitHash: string
  ): Promise<CommitInfo[]> {
    if (!commitHash) {
      return [];
    }
    const result = await withStorageErrors(operation, () =>
      this.pool.query<CommitRow>(sql, [repo, branch, commitHash])
    );
    return result.rows.map(toCommitInfo);
  }
}
