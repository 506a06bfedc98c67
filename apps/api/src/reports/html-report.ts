import {
  type AnalysisThresholds,
  formatRunTime,
  hoursBefore,
  type JobAnalysis,
  parseUniqueJobKey,
  sortByTestName,
} from '@runstreak/shared';

import type { ReportSettings } from '../config/index.js';

import { classifyRunCell } from './run-cell.js';
import { formatPercent } from './text-report.js';

export interface HtmlReportOptions {
  readonly thresholds: Pick<AnalysisThresholds, 'flakyBuildsMax'>;
  readonly settings: ReportSettings;
  readonly now?: Date;
}

const TITLE_LINE_BREAK = '&#10;';
const EMPTY_BADGE = '&nbsp;'.repeat(9);

export function escapeHtml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}

function jobDisplayName(uniqueJob: string): string {
  const parts = parseUniqueJobKey(uniqueJob);
  return parts ? `[${parts.origin}] ${parts.jobName}` : uniqueJob;
}

/**
 * Badge cell of a job: permafail wins over flaky. Permafails of a run marked
 * successful are ignored failures and get no badge.
 */
function renderBadge(analysis: JobAnalysis, flakyBuildsMax: number): string {
  const latest = analysis.runs[0];
  let title: string[] = [];
  let text = EMPTY_BADGE;

  if (analysis.permafails.length > 0 && latest?.testResult !== 'success') {
    title = [
      'These tests are now consistently failing:',
      ...analysis.permafails.map((entry) => escapeHtml(entry.testName)),
    ];
    text = 'permafail';
  } else if (analysis.flakiness.status === 'analyzed' && analysis.flakiness.flaky.length > 0) {
    const numBuilds = Math.min(analysis.runs.length, flakyBuildsMax);
    title = [
      `Over the past ${numBuilds} builds:`,
      ...sortByTestName(analysis.flakiness.flaky, (entry) => entry.testName).map(
        (entry) => `Test ${escapeHtml(entry.testName)} fails ${formatPercent(entry.failureRatio)}`
      ),
    ];
    text = 'flaky';
  }

  const cssClass = title.length > 0 ? 'jobfailure' : '';
  return `<td title="${title.join(TITLE_LINE_BREAK)}" class="${cssClass}">${text}</td>`;
}

/**
 * One table row for a unique job, or '' when the job has no runs
 */
export function renderJobRow(analysis: JobAnalysis, options: HtmlReportOptions): string {
  const latest = analysis.runs[0];
  if (latest === undefined) {
    return '';
  }
  const now = options.now ?? new Date();
  const oldBefore = hoursBefore(options.settings.oldJobHours, now);
  const disabled = latest.time < hoursBefore(options.settings.disabledJobHours, now) ? ' disabled' : '';

  const cells = analysis.runs.map((run) => {
    const cell = classifyRunCell(run, oldBefore);
    const title = [
      formatRunTime(run.time),
      `Success: ${run.succeeded.length}, Failed: ${run.failed.length}, Attempted: ${run.attempted.length}`,
      `Result: ${escapeHtml(run.testResult)}`,
    ].join(TITLE_LINE_BREAK);
    return (
      `<td class="${cell.cssClass}" title="${title}">` +
      `<a href="${escapeHtml(run.url)}">${cell.prefix}${cell.count}</a></td>`
    );
  });

  return [
    '<table class="testtable"><tbody>',
    `<tr><td class="jobname${disabled}">${escapeHtml(jobDisplayName(analysis.uniqueJob))}</td>`,
    renderBadge(analysis, options.thresholds.flakyBuildsMax),
    ...cells,
    '</tr>',
    '</tbody></table>',
  ].join('\n');
}

const STYLE = `
  table.testtable { border-collapse: collapse; }
  td { border: 1px solid #ccc; padding: 0 4px; text-align: center; }
  td a { color: inherit; text-decoration: none; }
  td.jobname { text-align: left; white-space: nowrap; }
  .success { background-color: #b0f0b0; }
  .successold { background-color: #d8f0d8; }
  .failure { background-color: #f08080; }
  .failureold { background-color: #f0c0c0; }
  .aborted { background-color: #c0c0f0; }
  .unknown { background-color: #f0f0a0; }
  .disabled { text-decoration: line-through; }
  .jobfailure { font-weight: bold; }`;

/**
 * Complete HTML page with one row per unique job of a repository
 */
export function renderReport(repo: string, analyses: readonly JobAnalysis[], options: HtmlReportOptions): string {
  const oldDays = Math.round(options.settings.oldJobHours / 24);
  const disabledDays = Math.round(options.settings.disabledJobHours / 24);
  const generated = (options.now ?? new Date()).toUTCString();

  return [
    '<!DOCTYPE html>',
    '<html><head><title>Test Job Failures</title>',
    `<style>${STYLE}\n</style>`,
    '</head><body>',
    `<h1>Test job failures for ${escapeHtml(repo)}</h1>`,
    `<p>Generated ${escapeHtml(generated)}</p>`,
    '<p>Legend:',
    '<br><span class="success">successful test run</span>',
    `  <span class="successold" title="Older than ${oldDays} days">successful older test run</span>`,
    '<br><span class="failure">*failed test run</span>',
    `  <span class="failureold" title="Older than ${oldDays} days">*failed older test run</span>`,
    '<br><span class="aborted" title="Test run did not complete">aborted test run</span>',
    '<br><span class="unknown" title="Test results were inconclusive">unknown test run</span>',
    `<br><span class="disabled" title="No results for ${disabledDays} days">disabled job</span>`,
    '</p>',
    ...analyses.map((analysis) => renderJobRow(analysis, options)).filter((row) => row.length > 0),
    '</body></html>',
    '',
  ].join('\n');
}
