import chalk from 'chalk';
import { Command, InvalidArgumentError, Option } from 'commander';

import { RegressionDetectionEngine } from '../analytics/index.js';
import { type AppConfig, validateThresholds } from '../config/index.js';
import { ConfigurationError } from '../errors.js';
import { formatJobReport, renderReport } from '../reports/index.js';
import type { Stores } from '../storage/types.js';

export interface CliDependencies {
  config: Pick<AppConfig, 'checkRepo' | 'branch' | 'thresholds' | 'report'>;
  openStores: () => Promise<Stores & { close: () => Promise<void> }>;
  /** Report output */
  write: (text: string) => void;
  /** Progress messages, kept apart from the report */
  status: (text: string) => void;
  now?: () => Date;
}

interface AnalyzeOptions {
  repo?: string;
  uniqueJob?: string;
  html?: boolean;
  hours?: number;
  branch?: string;
}

function parsePositiveInt(value: string): number {
  if (!/^\d+$/.test(value) || Number(value) === 0) {
    throw new InvalidArgumentError('Expected a positive whole number.');
  }
  return Number(value);
}

async function analyze(options: AnalyzeOptions, deps: CliDependencies): Promise<void> {
  const { config } = deps;
  const repo = options.repo ?? config.checkRepo;
  if (!options.uniqueJob && !repo) {
    throw new ConfigurationError('A repository is required: pass --repo or set CHECK_REPO');
  }
  const thresholds = validateThresholds({
    ...config.thresholds,
    analysisHours: options.hours ?? config.thresholds.analysisHours,
  });
  const now = deps.now?.() ?? new Date();

  const stores = await deps.openStores();
  try {
    const engine = new RegressionDetectionEngine({
      stores,
      thresholds,
      branch: options.branch ?? config.branch,
    });

    if (options.uniqueJob) {
      const analysis = await engine.analyzeUniqueJob(options.uniqueJob, now);
      deps.write(formatJobReport(analysis).join('\n'));
      return;
    }

    const analyses = await engine.analyzeRepository(repo, now);
    if (options.html) {
      deps.write(renderReport(repo, analyses, { thresholds, settings: config.report, now }));
    } else {
      for (const analysis of analyses) {
        deps.write(formatJobReport(analysis).join('\n'));
      }
    }
    deps.status(chalk.green(`Analyzed ${analyses.length} unique jobs of ${repo}`));
  } finally {
    await stores.close();
  }
}

export function createProgram(deps: CliDependencies, version: string): Command {
  const program = new Command();

  program.name('runstreak').description('Flaky and permanently failing test analysis for CI runs').version(version);

  program
    .command('analyze')
    .description('Report flaky and consistently failing tests')
    .option('-r, --repo <url>', 'source repository URL the runs were checked out from')
    .addOption(
      new Option('-u, --unique-job <key>', 'analyze only this unique job (account,repo,origin,jobname)').conflicts(
        'html'
      )
    )
    .option('--html', 'write an HTML table of all jobs of the repository')
    .option('--hours <n>', 'hours of history to analyze', parsePositiveInt)
    .option('-b, --branch <name>', 'branch whose commit history is used to find breaking commits')
    .action(async (options: AnalyzeOptions) => {
      await analyze(options, deps);
    });

  return program;
}
