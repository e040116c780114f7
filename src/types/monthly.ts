/**
 * Monthly code metrics types
 */

import type { TimeWindow } from './pull-request.js';

/** One calendar month of pull request line changes. */
export interface MonthlyMetrics {
  /** YYYY-MM, local time */
  readonly month: string;
  /** e.g. "Jan 2025" */
  readonly label: string;
  readonly pullRequests: number;
  readonly additions: number;
  readonly deletions: number;
  readonly changed: number;
  /** Distinct days with at least one pull request opened */
  readonly activeDays: number;
  /** activeDays / 7 */
  readonly weekFraction: number;
  readonly avgAdditions: number;
  readonly avgDeletions: number;
  readonly avgChanged: number;
}

export interface MetricAverages {
  readonly additions: number;
  readonly deletions: number;
  readonly changed: number;
}

export interface PeakMonth {
  readonly label: string;
  readonly value: number;
}

export interface MonthlyMetricsSummary {
  readonly totalPullRequests: number;
  readonly additions: number;
  readonly deletions: number;
  readonly changed: number;
  /** Months whose average total change per workday is above zero */
  readonly activeMonths: number;
  /** Mean of the per-workday averages over active months */
  readonly overall: MetricAverages;
  /** Same, over the last 12 active months */
  readonly recent: MetricAverages;
  readonly peaks: {
    readonly additions: PeakMonth;
    readonly deletions: PeakMonth;
    readonly changed: PeakMonth;
  };
}

export interface MonthlyMetricsReport {
  readonly user?: string;
  readonly window: TimeWindow;
  readonly workdaysPerWeek: number;
  /** Ascending by month */
  readonly months: readonly MonthlyMetrics[];
  /** Absent when no month has any line changes */
  readonly summary?: MonthlyMetricsSummary;
}
