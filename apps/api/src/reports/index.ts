export { formatJobReport, formatPercent, recentFailureUrl } from './text-report.js';
export { classifyRunCell, type RunCell, type RunCellClass } from './run-cell.js';
export { escapeHtml, renderJobRow, renderReport, type HtmlReportOptions } from './html-report.js';
