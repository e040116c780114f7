/**
 * Monthly Report Renderer
 *
 * Text table, Markdown table, or JSON for a MonthlyMetricsReport.
 */

import { FormatError } from '../errors.js';
import { formatLocalDateTime } from '../orchestrator/time-range.js';
import { OUTPUT_FORMATS } from './report-builder.js';
import type { OutputFormat } from '../types/pull-request.js';
import type { MonthlyMetrics, MonthlyMetricsReport, MonthlyMetricsSummary } from '../types/monthly.js';

const RULE_WIDTH = 90;
const EMPTY_MESSAGE = 'No pull requests found for this period.';
const NO_ACTIVITY_MESSAGE = 'No line changes in this period.';

/** Column widths; the month column is left-aligned, the rest right-aligned. */
const COLUMN_WIDTHS = [10, 5, 9, 9, 9, 6, 11, 12, 11] as const;

const COLUMN_TITLES = [
  'Month',
  'PRs',
  'Added',
  'Deleted',
  'Total',
  'Days',
  'Avg Added',
  'Avg Deleted',
  'Avg Total',
];

export interface MonthlyJsonDocument {
  user?: string;
  period: string;
  window: { start: string; end: string };
  workdaysPerWeek: number;
  totalPullRequests: number;
  months: MonthlyMetrics[];
  summary?: MonthlyMetricsSummary;
}

function formatCount(n: number): string {
  return n.toLocaleString('en-US');
}

function formatAverage(n: number): string {
  return n.toFixed(1);
}

function monthCells(m: MonthlyMetrics): string[] {
  return [
    m.label,
    formatCount(m.pullRequests),
    formatCount(m.additions),
    formatCount(m.deletions),
    formatCount(m.changed),
    String(m.activeDays),
    formatAverage(m.avgAdditions),
    formatAverage(m.avgDeletions),
    formatAverage(m.avgChanged),
  ];
}

function periodLine(report: MonthlyMetricsReport): string {
  return `${formatLocalDateTime(report.window.start)} to ${formatLocalDateTime(report.window.end)}`;
}

// ─── Text ────────────────────────────────────────────────────

function tableRow(cells: readonly string[]): string {
  return cells
    .map((cell, i) => {
      const width = COLUMN_WIDTHS[i] ?? cell.length;
      return i === 0 ? cell.padEnd(width) : cell.padStart(width);
    })
    .join(' ');
}

function summaryLine(label: string, value: string): string {
  return `${`${label}:`.padEnd(32)}${value}`;
}

const lines = (n: number) => `${formatAverage(n)} lines`;
const perWorkday = (n: number) => `${formatAverage(n)} lines/workday`;

function peakText(peak: { label: string; value: number }): string {
  return `${peak.label} (${perWorkday(peak.value)})`;
}

export function renderMonthlyText(report: MonthlyMetricsReport): string {
  const parts: string[] = [];

  parts.push('='.repeat(RULE_WIDTH));
  parts.push(`MONTHLY CODE METRICS: ${report.window.label}`);
  parts.push('='.repeat(RULE_WIDTH));
  parts.push(`Period: ${periodLine(report)}`);
  parts.push(`Averages per workday, ${report.workdaysPerWeek} workdays/week`);
  parts.push('');

  if (report.months.length === 0) {
    parts.push(EMPTY_MESSAGE);
    parts.push('='.repeat(RULE_WIDTH));
    return parts.join('\n');
  }

  parts.push(tableRow(COLUMN_TITLES));
  parts.push('-'.repeat(RULE_WIDTH));
  for (const m of report.months) {
    parts.push(tableRow(monthCells(m)));
  }
  parts.push('');

  parts.push('SUMMARY');
  parts.push('-'.repeat(RULE_WIDTH));

  const { summary } = report;
  if (!summary) {
    parts.push(NO_ACTIVITY_MESSAGE);
  } else {
    parts.push(summaryLine('Total pull requests', formatCount(summary.totalPullRequests)));
    parts.push(summaryLine('Lines added', formatCount(summary.additions)));
    parts.push(summaryLine('Lines deleted', formatCount(summary.deletions)));
    parts.push(summaryLine('Total changes', formatCount(summary.changed)));
    parts.push('');
    parts.push(summaryLine('Active months', String(summary.activeMonths)));
    parts.push(summaryLine('Average additions/workday', lines(summary.overall.additions)));
    parts.push(summaryLine('Average deletions/workday', lines(summary.overall.deletions)));
    parts.push(summaryLine('Average total/workday', lines(summary.overall.changed)));
    parts.push('');
    parts.push(summaryLine('Most additions', peakText(summary.peaks.additions)));
    parts.push(summaryLine('Most deletions', peakText(summary.peaks.deletions)));
    parts.push(summaryLine('Most total changes', peakText(summary.peaks.changed)));
    parts.push('');
    parts.push(summaryLine('Last 12 months avg additions', perWorkday(summary.recent.additions)));
    parts.push(summaryLine('Last 12 months avg deletions', perWorkday(summary.recent.deletions)));
    parts.push(summaryLine('Last 12 months avg total', perWorkday(summary.recent.changed)));
  }

  parts.push('='.repeat(RULE_WIDTH));
  return parts.join('\n');
}

// ─── Markdown ────────────────────────────────────────────────

export function renderMonthlyMarkdown(report: MonthlyMetricsReport): string {
  const parts: string[] = [];

  parts.push(`# Monthly Code Metrics: ${report.window.label}`);
  parts.push('');
  parts.push(`**Period:** ${periodLine(report)}`);
  parts.push(`**Workdays per week:** ${report.workdaysPerWeek}`);
  parts.push('');

  if (report.months.length === 0) {
    parts.push(`_${EMPTY_MESSAGE}_`);
    return parts.join('\n');
  }

  parts.push('## Months');
  parts.push('');
  parts.push(`| ${COLUMN_TITLES.join(' | ')} |`);
  parts.push(`| --- |${' ---: |'.repeat(COLUMN_TITLES.length - 1)}`);
  for (const m of report.months) {
    parts.push(`| ${monthCells(m).join(' | ')} |`);
  }
  parts.push('');

  parts.push('## Summary');
  parts.push('');

  const { summary } = report;
  if (!summary) {
    parts.push(`_${NO_ACTIVITY_MESSAGE}_`);
    return parts.join('\n');
  }

  parts.push(`- **Total pull requests:** ${formatCount(summary.totalPullRequests)}`);
  parts.push(`- **Lines added:** ${formatCount(summary.additions)}`);
  parts.push(`- **Lines deleted:** ${formatCount(summary.deletions)}`);
  parts.push(`- **Total changes:** ${formatCount(summary.changed)}`);
  parts.push(`- **Active months:** ${summary.activeMonths}`);
  parts.push(`- **Average per workday:**`);
  parts.push(`  - Added: ${formatAverage(summary.overall.additions)}`);
  parts.push(`  - Deleted: ${formatAverage(summary.overall.deletions)}`);
  parts.push(`  - Total: ${formatAverage(summary.overall.changed)}`);
  parts.push(`- **Most additions:** ${peakText(summary.peaks.additions)}`);
  parts.push(`- **Most deletions:** ${peakText(summary.peaks.deletions)}`);
  parts.push(`- **Most total changes:** ${peakText(summary.peaks.changed)}`);

  return parts.join('\n');
}

// ─── JSON ────────────────────────────────────────────────────

export function toMonthlyJsonDocument(report: MonthlyMetricsReport): MonthlyJsonDocument {
  const doc: MonthlyJsonDocument = {
    ...(report.user !== undefined ? { user: report.user } : {}),
    period: report.window.label,
    window: {
      start: report.window.start.toISOString(),
      end: report.window.end.toISOString(),
    },
    workdaysPerWeek: report.workdaysPerWeek,
    totalPullRequests: report.months.reduce((sum, m) => sum + m.pullRequests, 0),
    months: report.months.map((m) => ({ ...m })),
  };

  if (report.summary) {
    doc.summary = report.summary;
  }
  return doc;
}

export function renderMonthlyJson(report: MonthlyMetricsReport): string {
  return JSON.stringify(toMonthlyJsonDocument(report), null, 2);
}

// ─── Dispatch ────────────────────────────────────────────────

export function renderMonthlyReport(report: MonthlyMetricsReport, format: OutputFormat): string {
  switch (format) {
    case 'text':
      return renderMonthlyText(report);
    case 'markdown':
      return renderMonthlyMarkdown(report);
    case 'json':
      return renderMonthlyJson(report);
    default:
      throw new FormatError(
        'format',
        format,
        `Unsupported format "${String(format)}". Expected one of: ${OUTPUT_FORMATS.join(', ')}`
      );
  }
}
