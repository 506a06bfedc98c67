import {
  analysisWindow,
  type AnalysisThresholds,
  type BisectionOutcome,
  type JobAnalysis,
  type JobRun,
  type PermafailEntry,
} from '@runstreak/shared';

import type { Stores } from '../storage/types.js';
import { logger } from '../utils/logger.js';

import { CommitBisector, formatBisectionMessage } from './bisection.js';
import { findLastGoodRun } from './first-failure.js';
import { FlakinessDetector } from './flakiness.js';
import { detectPermafails } from './permafail.js';
import { RunLoader } from './run-loader.js';
import { countConsecutiveFailures, findStreakStart, streakOf } from './streaks.js';

export interface DetectionEngineOptions {
  readonly stores: Stores;
  readonly thresholds: AnalysisThresholds;
  /** Branch whose commit chain is used for bisection */
  readonly branch: string;
}

/**
 * Runs the whole analysis for unique jobs: loads their runs, counts failure
 * streaks, and reports flaky and permanently failing tests with the commits
 * that may have broken them.
 */
export class RegressionDetectionEngine {
  private readonly loader: RunLoader;
  private readonly flakiness: FlakinessDetector;
  private readonly bisector: CommitBisector;

  constructor(private readonly options: DetectionEngineOptions) {
    this.loader = new RunLoader(options.stores.results);
    this.flakiness = new FlakinessDetector(options.thresholds);
    this.bisector = new CommitBisector(options.stores.commits, options.branch);
  }

  public async analyzeUniqueJob(uniqueJob: string, now: Date = new Date()): Promise<JobAnalysis> {
    const { fromTime, toTime } = analysisWindow(this.options.thresholds.analysisHours, now);
    logger.info({ uniqueJob, fromTime, toTime }, 'Analyzing unique job');

    const runs = await this.loader.load(uniqueJob, fromTime, toTime);
    const streaks = countConsecutiveFailures(runs);
    const flakiness = this.flakiness.detect(runs, streaks);

    const permafails: PermafailEntry[] = [];
    const latestStreaks = streaks[0];
    if (latestStreaks !== undefined) {
      for (const testName of detectPermafails(runs[0], latestStreaks, this.options.thresholds)) {
        const bisection = await this.bisectFailure(runs, testName);
        permafails.push({
          testName,
          streak: streakOf(latestStreaks, testName),
          bisection,
          message: formatBisectionMessage(testName, bisection),
        });
      }
    }

    logger.info(
      {
        uniqueJob,
        runs: runs.length,
        flaky: flakiness.status === 'analyzed' ? flakiness.flaky.length : null,
        permafails: permafails.length,
      },
      'Finished analyzing unique job'
    );
    return { uniqueJob, fromTime, toTime, runs, streaks, flakiness, permafails };
  }

  /**
   * Analyzes every unique job of the repository with a run in the analysis
   * window, in the store's job order
   */
  public async analyzeRepository(repo: string, now: Date = new Date()): Promise<JobAnalysis[]> {
    const { fromTime } = analysisWindow(this.options.thresholds.analysisHours, now);
    const uniqueJobs = await this.options.stores.results.listUniqueJobs(repo, fromTime);
    const analyses: JobAnalysis[] = [];
    for (const uniqueJob of uniqueJobs) {
      analyses.push(await this.analyzeUniqueJob(uniqueJob, now));
    }
    return analyses;
  }

  private async bisectFailure(runs: readonly JobRun[], testName: string): Promise<BisectionOutcome> {
    const start = findStreakStart(runs, testName);
    const firstFail = start === null ? undefined : runs[start];
    if (start === null || firstFail === undefined) {
      return { kind: 'failing-too-long' };
    }

    const lastGood = findLastGoodRun(runs, testName, start);
    if (lastGood === null) {
      return { kind: 'failing-too-long' };
    }
    return this.bisector.bisect(lastGood, firstFail);
  }
}
