import { type BisectionOutcome, commitUrl, hashesMatch, type JobRun, shortHash } from '@runstreak/shared';

import { InvariantViolationError } from '../errors.js';
import type { CommitStore } from '../storage/types.js';
import { logger } from '../utils/logger.js';

/**
 * Narrows down the commits that may have introduced a failure by walking the
 * commit chain between the last good run and the first failing one.
 */
export class CommitBisector {
  constructor(
    private readonly commits: CommitStore,
    private readonly branch: string
  ) {}

  public async bisect(lastGood: JobRun, firstFail: JobRun): Promise<BisectionOutcome> {
    const repo = lastGood.checkRepo;
    const chain = await this.commits.commitsAfter(repo, this.branch, lastGood.commit);

    if (chain.length === 0) {
      logger.warn({ repo, branch: this.branch, commit: lastGood.commit }, 'Last good commit is not in the commit history');
      return { kind: 'undetermined', reason: 'commit-not-found' };
    }

    const failIndex = chain.findIndex((commit) => hashesMatch(commit.commitHash, firstFail.commit));
    if (failIndex === -1) {
      logger.warn(
        { repo, branch: this.branch, commit: firstFail.commit },
        'First failing commit is not in the commit history after the last good one'
      );
      return { kind: 'undetermined', reason: 'commit-not-found' };
    }
    if (failIndex === 0) {
      logger.warn(
        { repo, lastGoodCommit: lastGood.commit, firstFailCommit: firstFail.commit },
        'Failing run was built from the same commit as the last good run'
      );
      return { kind: 'undetermined', reason: 'out-of-order' };
    }

    // chain[0] is the last good commit itself
    const firstBad = chain[1];
    if (firstBad === undefined) {
      throw new InvariantViolationError('A failing run has no commit after its last good run', {
        repo,
        lastGoodCommit: lastGood.commit,
        firstFailCommit: firstFail.commit,
      });
    }

    const lastGoodUrl = lastGood.url;
    if (hashesMatch(firstBad.commitHash, firstFail.commit)) {
      return {
        kind: 'exact',
        commit: firstBad.commitHash,
        commitUrl: commitUrl(repo, firstBad.commitHash),
        lastGoodUrl,
      };
    }

    return {
      kind: 'range',
      firstBadCommit: firstBad.commitHash,
      lastBadCommit: firstFail.commit,
      // firstBad sits at index 1
      possibleCommits: failIndex,
      lastGoodUrl,
    };
  }
}

export function formatBisectionMessage(testName: string, outcome: BisectionOutcome): string {
  switch (outcome.kind) {
    case 'exact':
      return `Failures started with commit ${shortHash(outcome.commit)} (last success: ${outcome.lastGoodUrl})`;
    case 'range':
      return (
        `Failures started somewhere in the commit range ` +
        `${shortHash(outcome.firstBadCommit)}^..${shortHash(outcome.lastBadCommit)} ` +
        `(${outcome.possibleCommits} possible commits) (last success: ${outcome.lastGoodUrl})`
      );
    case 'failing-too-long':
      return `Test ${testName} has been failing too long to know when the problem started`;
    case 'undetermined':
      return outcome.reason === 'out-of-order'
        ? 'The commit that introduced this failure could not be determined (builds ran out of commit order)'
        : 'The commit that introduced this failure could not be determined (a commit is missing from the history)';
  }
}
