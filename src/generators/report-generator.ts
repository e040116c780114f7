/**
 * Report Generator
 *
 * Renders a grouped report as plain text, Markdown, or JSON.
 * All functions are synchronous — no I/O, no API calls.
 */

import { FormatError } from '../errors.js';
import { formatLocalDateTime } from '../orchestrator/time-range.js';
import { OUTPUT_FORMATS, dateKey } from './report-builder.js';
import type {
  GroupedReport,
  OutputFormat,
  PullRequestRecord,
  PullRequestState,
  ReportStatistics,
} from '../types/pull-request.js';

const RULE_WIDTH = 90;
const EMPTY_MESSAGE = 'No pull requests found for this period.';

const STATE_SYMBOLS: Record<PullRequestState, string> = {
  MERGED: '✓',
  OPEN: '○',
  CLOSED: '✗',
};

const STATE_BADGES: Record<PullRequestState, string> = {
  MERGED: '🟢',
  OPEN: '🔵',
  CLOSED: '🔴',
};

/** Serialized shape of a JSON report. */
export interface JsonReportDocument {
  user?: string;
  period: string;
  window: { start: string; end: string };
  grouping: GroupedReport['grouping'];
  groups: Array<{ key: string; pullRequests: PullRequestRecord[] }>;
  statistics?: ReportStatistics;
}

function formatCount(n: number): string {
  return n.toLocaleString('en-US');
}

function recordCount(report: GroupedReport): number {
  return report.groups.reduce((sum, g) => sum + g.pullRequests.length, 0);
}

// ─── Text ────────────────────────────────────────────────────

function formatTextLine(pr: PullRequestRecord): string {
  return (
    `${STATE_SYMBOLS[pr.state]} ${pr.repository}#${pr.number} - ${pr.title}` +
    ` | ${dateKey(pr)} | +${pr.additions} -${pr.deletions} | ${pr.state} | ${pr.url}`
  );
}

export function renderText(report: GroupedReport): string {
  const { window, statistics } = report;
  const parts: string[] = [];

  parts.push('='.repeat(RULE_WIDTH));
  parts.push(`WORK SUMMARY: ${window.label}`);
  parts.push('='.repeat(RULE_WIDTH));
  parts.push(`Period: ${formatLocalDateTime(window.start)} to ${formatLocalDateTime(window.end)}`);
  parts.push('');

  if (statistics) {
    parts.push('STATISTICS');
    parts.push('-'.repeat(RULE_WIDTH));
    parts.push(`Total PRs:          ${formatCount(statistics.total)}`);
    parts.push(`  Merged:           ${formatCount(statistics.merged)}`);
    parts.push(`  Open:             ${formatCount(statistics.open)}`);
    parts.push(`  Closed:           ${formatCount(statistics.closed)}`);
    parts.push(`Lines added:        ${formatCount(statistics.additions)}`);
    parts.push(`Lines deleted:      ${formatCount(statistics.deletions)}`);
    parts.push(`Total changes:      ${formatCount(statistics.changed)}`);
    parts.push('');
  }

  parts.push('PULL REQUESTS');
  parts.push('-'.repeat(RULE_WIDTH));

  if (recordCount(report) === 0) {
    parts.push(EMPTY_MESSAGE);
  }

  for (const group of report.groups) {
    if (report.grouping !== 'none') {
      parts.push('');
      parts.push(`### ${group.key}`);
    }
    for (const pr of group.pullRequests) {
      parts.push(formatTextLine(pr));
    }
  }

  parts.push('='.repeat(RULE_WIDTH));
  return parts.join('\n');
}

// ─── Markdown ────────────────────────────────────────────────

function escapeLinkText(text: string): string {
  return text.replace(/[\\[\]]/g, (ch) => `\\${ch}`);
}

function escapeLinkTarget(url: string): string {
  return url.replace(/\(/g, '%28').replace(/\)/g, '%29').replace(/ /g, '%20');
}

function formatMarkdownItem(pr: PullRequestRecord): string[] {
  return [
    `- ${STATE_BADGES[pr.state]} [${escapeLinkText(pr.title)}](${escapeLinkTarget(pr.url)}) (${pr.repository}#${pr.number})`,
    `  - Date: ${dateKey(pr)}`,
    `  - Changes: +${pr.additions} -${pr.deletions}`,
    `  - Status: ${pr.state}`,
  ];
}

export function renderMarkdown(report: GroupedReport): string {
  const { window, statistics } = report;
  const parts: string[] = [];

  parts.push(`# Work Summary: ${window.label}`);
  parts.push('');
  parts.push(
    `**Period:** ${formatLocalDateTime(window.start)} to ${formatLocalDateTime(window.end)}`
  );
  parts.push('');

  if (statistics) {
    parts.push('## Statistics');
    parts.push('');
    parts.push(`- **Total PRs:** ${formatCount(statistics.total)}`);
    parts.push(`  - Merged: ${formatCount(statistics.merged)}`);
    parts.push(`  - Open: ${formatCount(statistics.open)}`);
    parts.push(`  - Closed: ${formatCount(statistics.closed)}`);
    parts.push(`- **Lines added:** ${formatCount(statistics.additions)}`);
    parts.push(`- **Lines deleted:** ${formatCount(statistics.deletions)}`);
    parts.push(`- **Total changes:** ${formatCount(statistics.changed)}`);
    parts.push('');
  }

  parts.push('## Pull Requests');
  parts.push('');

  if (recordCount(report) === 0) {
    parts.push(`_${EMPTY_MESSAGE}_`);
    parts.push('');
  }

  for (const group of report.groups) {
    if (report.grouping !== 'none') {
      parts.push(`### ${group.key}`);
      parts.push('');
    }
    for (const pr of group.pullRequests) {
      parts.push(...formatMarkdownItem(pr));
    }
    parts.push('');
  }

  return parts.join('\n').trimEnd();
}

// ─── JSON ────────────────────────────────────────────────────

export function toJsonDocument(report: GroupedReport): JsonReportDocument {
  const doc: JsonReportDocument = {
    ...(report.user !== undefined ? { user: report.user } : {}),
    period: report.window.label,
    window: {
      start: report.window.start.toISOString(),
      end: report.window.end.toISOString(),
    },
    grouping: report.grouping,
    groups: report.groups.map((g) => ({
      key: g.key,
      pullRequests: g.pullRequests.map((pr) => ({ ...pr })),
    })),
  };

  if (report.statistics) {
    doc.statistics = { ...report.statistics };
  }
  return doc;
}

export function renderJson(report: GroupedReport): string {
  return JSON.stringify(toJsonDocument(report), null, 2);
}

// ─── Dispatch ────────────────────────────────────────────────

export function renderReport(report: GroupedReport, format: OutputFormat): string {
  switch (format) {
    case 'text':
      return renderText(report);
    case 'markdown':
      return renderMarkdown(report);
    case 'json':
      return renderJson(report);
    default:
      throw new FormatError(
        'format',
        format,
        `Unsupported format "${String(format)}". Expected one of: ${OUTPUT_FORMATS.join(', ')}`
      );
  }
}

