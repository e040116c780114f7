/**
 * Monthly Code Metrics
 *
 * Buckets pull requests by the local calendar month they were opened in and
 * normalizes line changes to a per-workday figure. A month's workdays are
 * estimated from the days that saw a pull request: each active day counts as
 * one seventh of a week, and a week holds `workdaysPerWeek` workdays.
 */

import { formatLocalDate } from '../orchestrator/time-range.js';
import type { PullRequestRecord, TimeWindow } from '../types/pull-request.js';
import type {
  MetricAverages,
  MonthlyMetrics,
  MonthlyMetricsReport,
  MonthlyMetricsSummary,
  PeakMonth,
} from '../types/monthly.js';

export const DEFAULT_WORKDAYS_PER_WEEK = 5;

/** How many of the latest active months the "recent" averages cover. */
const RECENT_MONTHS = 12;

const MONTH_NAMES = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

interface MonthBucket {
  pullRequests: number;
  additions: number;
  deletions: number;
  days: Set<string>;
}

/** "2025-01" → "Jan 2025" */
export function monthLabel(month: string): string {
  const [year, monthNumber] = month.split('-');
  const name = MONTH_NAMES[Number(monthNumber) - 1];
  return name && year ? `${name} ${year}` : month;
}

export function calculateMonthlyMetrics(
  pullRequests: readonly PullRequestRecord[],
  workdaysPerWeek: number = DEFAULT_WORKDAYS_PER_WEEK
): MonthlyMetrics[] {
  const buckets = new Map<string, MonthBucket>();

  for (const pr of pullRequests) {
    const created = new Date(pr.createdAt);
    if (isNaN(created.getTime())) continue;

    const day = formatLocalDate(created);
    const month = day.slice(0, 7);

    let bucket = buckets.get(month);
    if (!bucket) {
      bucket = { pullRequests: 0, additions: 0, deletions: 0, days: new Set<string>() };
      buckets.set(month, bucket);
    }
    bucket.pullRequests++;
    bucket.additions += pr.additions;
    bucket.deletions += pr.deletions;
    bucket.days.add(day);
  }

  return Array.from(buckets.entries())
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([month, bucket]) => {
      const activeDays = bucket.days.size;
      const changed = bucket.additions + bucket.deletions;
      // lines / (activeDays / 7 * workdaysPerWeek), kept in integers until the last step
      const perWorkday = (lines: number) => (lines * 7) / (activeDays * workdaysPerWeek);

      return {
        month,
        label: monthLabel(month),
        pullRequests: bucket.pullRequests,
        additions: bucket.additions,
        deletions: bucket.deletions,
        changed,
        activeDays,
        weekFraction: activeDays / 7,
        avgAdditions: perWorkday(bucket.additions),
        avgDeletions: perWorkday(bucket.deletions),
        avgChanged: perWorkday(changed),
      };
    });
}

function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length;
}

function averages(months: readonly MonthlyMetrics[]): MetricAverages {
  return {
    additions: mean(months.map((m) => m.avgAdditions)),
    deletions: mean(months.map((m) => m.avgDeletions)),
    changed: mean(months.map((m) => m.avgChanged)),
  };
}

/** First month with the highest value; ties go to the earlier month. */
function peak(months: readonly MonthlyMetrics[], value: (m: MonthlyMetrics) => number): PeakMonth {
  let best: PeakMonth = { label: '', value: 0 };
  for (const m of months) {
    if (best.label === '' || value(m) > best.value) {
      best = { label: m.label, value: value(m) };
    }
  }
  return best;
}

export function summarizeMonthlyMetrics(
  months: readonly MonthlyMetrics[]
): MonthlyMetricsSummary | undefined {
  const active = months.filter((m) => m.avgChanged > 0);
  if (active.length === 0) {
    return undefined;
  }

  return {
    totalPullRequests: months.reduce((sum, m) => sum + m.pullRequests, 0),
    additions: months.reduce((sum, m) => sum + m.additions, 0),
    deletions: months.reduce((sum, m) => sum + m.deletions, 0),
    changed: months.reduce((sum, m) => sum + m.changed, 0),
    activeMonths: active.length,
    overall: averages(active),
    recent: averages(active.slice(-RECENT_MONTHS)),
    peaks: {
      additions: peak(months, (m) => m.avgAdditions),
      deletions: peak(months, (m) => m.avgDeletions),
      changed: peak(months, (m) => m.avgChanged),
    },
  };
}

export interface BuildMonthlyReportInput {
  user?: string;
  window: TimeWindow;
  pullRequests: readonly PullRequestRecord[];
  workdaysPerWeek?: number;
}

export function buildMonthlyReport(input: BuildMonthlyReportInput): MonthlyMetricsReport {
  const workdaysPerWeek = input.workdaysPerWeek ?? DEFAULT_WORKDAYS_PER_WEEK;
  const months = calculateMonthlyMetrics(input.pullRequests, workdaysPerWeek);
  const summary = summarizeMonthlyMetrics(months);

  return {
    ...(input.user !== undefined ? { user: input.user } : {}),
    window: input.window,
    workdaysPerWeek,
    months,
    ...(summary ? { summary } : {}),
  };
}
