import { type JobAnalysis, type JobRun, sortByTestName } from '@runstreak/shared';

/**
 * URL of the most recent run in which the test failed, or '' if none has one
 */
export function recentFailureUrl(runs: readonly JobRun[], testName: string): string {
  for (const run of runs) {
    if (run.failed.includes(testName) && run.url) {
      return run.url;
    }
  }
  return '';
}

export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

/**
 * Plain text summary of one unique job, one entry per line, ending with an
 * empty line
 */
export function formatJobReport(analysis: JobAnalysis): string[] {
  const { runs, flakiness, permafails } = analysis;
  const lines = [`Analyzing unique job ${analysis.uniqueJob}`];

  if (flakiness.status === 'analyzed' && flakiness.flaky.length > 0) {
    lines.push('These tests were found to be flaky:');
    for (const { testName, failureRatio } of sortByTestName(flakiness.flaky, (entry) => entry.testName)) {
      const url = recentFailureUrl(runs, testName);
      lines.push(`${testName} fails ${formatPercent(failureRatio)}${url ? ` (latest failure: ${url})` : ''}`);
    }
  }

  const latest = runs[0];
  if (latest !== undefined) {
    if (permafails.length > 0) {
      if (latest.testResult === 'success') {
        lines.push(
          'Some tests are failing but the test was marked as successful. ' +
            'These tests were likely marked to be ignored in this job.'
        );
      }
      lines.push('These tests are now consistently failing:');
      lines.push(...permafails.map((entry) => entry.testName));
      lines.push(...permafails.map((entry) => entry.message));
      lines.push(`Latest failure: ${latest.url}`);
    } else if (latest.aborted) {
      lines.push(
        'No tests are currently failing on this job but the last test run aborted, probably due to a timeout'
      );
    }
  }

  lines.push('');
  return lines;
}
