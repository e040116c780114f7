/**
 * Report Builder
 *
 * Groups pre-fetched pull requests and attaches statistics.
 * No I/O and no mutation of the input records.
 */

import { FormatError } from '../errors.js';
import { formatLocalDate } from '../orchestrator/time-range.js';
import { calculateStatistics } from './metrics-calculator.js';
import type {
  GroupedReport,
  GroupingMode,
  OutputFormat,
  PullRequestRecord,
  ReportGroup,
  TimeWindow,
} from '../types/pull-request.js';

export const GROUPING_MODES: readonly GroupingMode[] = ['by-repository', 'by-date', 'none'];
export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'markdown', 'json'];

/** Key of the single group produced by grouping mode `none`. */
export const ALL_GROUP_KEY = 'all';

/** Short names accepted on the command line. */
const GROUPING_ALIASES: Record<string, GroupingMode> = {
  repo: 'by-repository',
  repository: 'by-repository',
  date: 'by-date',
};

export interface BuildReportInput {
  user?: string;
  window: TimeWindow;
  pullRequests: readonly PullRequestRecord[];
  grouping: GroupingMode;
  includeStatistics: boolean;
}

export function parseGroupingMode(value: string): GroupingMode {
  const normalized = value.trim().toLowerCase();
  const mode = GROUPING_ALIASES[normalized] ?? normalized;
  if (!isGroupingMode(mode)) {
    throw new FormatError(
      'grouping',
      value,
      `Unsupported grouping "${value}". Expected one of: ${GROUPING_MODES.join(', ')} (or repo, date)`
    );
  }
  return mode;
}

export function parseOutputFormat(value: string): OutputFormat {
  const normalized = value.trim().toLowerCase();
  if (!isOutputFormat(normalized)) {
    throw new FormatError(
      'format',
      value,
      `Unsupported format "${value}". Expected one of: ${OUTPUT_FORMATS.join(', ')}`
    );
  }
  return normalized;
}

function isGroupingMode(value: string): value is GroupingMode {
  return (GROUPING_MODES as readonly string[]).includes(value);
}

function isOutputFormat(value: string): value is OutputFormat {
  return (OUTPUT_FORMATS as readonly string[]).includes(value);
}

/**
 * Calendar date (local time) a record is filed under when grouping by date.
 * Falls back to the raw prefix when the timestamp does not parse.
 */
export function dateKey(pr: PullRequestRecord): string {
  const created = new Date(pr.createdAt);
  if (isNaN(created.getTime())) {
    return pr.createdAt.split('T')[0] ?? pr.createdAt;
  }
  return formatLocalDate(created);
}

/**
 * Partition records into ordered groups.
 * by-repository: ascending key; by-date: descending key; none: one "all" group.
 * Records inside a group keep their input order.
 */
export function groupPullRequests(
  pullRequests: readonly PullRequestRecord[],
  grouping: GroupingMode
): ReportGroup[] {
  if (grouping === 'none') {
    return pullRequests.length > 0 ? [{ key: ALL_GROUP_KEY, pullRequests: [...pullRequests] }] : [];
  }

  const keyOf = grouping === 'by-repository' ? (pr: PullRequestRecord) => pr.repository : dateKey;
  const buckets = new Map<string, PullRequestRecord[]>();

  for (const pr of pullRequests) {
    const key = keyOf(pr);
    let bucket = buckets.get(key);
    if (!bucket) {
      bucket = [];
      buckets.set(key, bucket);
    }
    bucket.push(pr);
  }

  const keys = Array.from(buckets.keys()).sort(compareKeys);
  if (grouping === 'by-date') keys.reverse();

  return keys.map((key) => ({ key, pullRequests: buckets.get(key) ?? [] }));
}

function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function buildReport(input: BuildReportInput): GroupedReport {
  if (!isGroupingMode(input.grouping)) {
    throw new FormatError(
      'grouping',
      input.grouping,
      `Unsupported grouping "${String(input.grouping)}". Expected one of: ${GROUPING_MODES.join(', ')}`
    );
  }

  const report: GroupedReport = {
    ...(input.user !== undefined ? { user: input.user } : {}),
    window: input.window,
    grouping: input.grouping,
    groups: groupPullRequests(input.pullRequests, input.grouping),
  };

  return input.includeStatistics
    ? { ...report, statistics: calculateStatistics(input.pullRequests) }
    : report;
}
