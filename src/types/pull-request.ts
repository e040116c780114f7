/**
 * Pull request and report types
 */

export type PullRequestState = 'OPEN' | 'MERGED' | 'CLOSED';

export interface PullRequestRecord {
  readonly repository: string;
  readonly number: number;
  readonly title: string;
  readonly url: string;
  readonly state: PullRequestState;
  readonly createdAt: string;
  readonly updatedAt?: string;
  readonly mergedAt?: string;
  readonly closedAt?: string;
  readonly additions: number;
  readonly deletions: number;
  readonly isPrivate?: boolean;
}

/** Start inclusive, end exclusive. */
export interface TimeWindow {
  readonly start: Date;
  readonly end: Date;
  readonly label: string;
}

export type GroupingMode = 'by-repository' | 'by-date' | 'none';

export type OutputFormat = 'text' | 'markdown' | 'json';

export interface ReportGroup {
  readonly key: string;
  readonly pullRequests: readonly PullRequestRecord[];
}

export interface ReportStatistics {
  readonly total: number;
  readonly merged: number;
  readonly open: number;
  readonly closed: number;
  readonly additions: number;
  readonly deletions: number;
  readonly changed: number;
}

export interface GroupedReport {
  /** GitHub login the report is about, when known */
  readonly user?: string;
  readonly window: TimeWindow;
  readonly grouping: GroupingMode;
  readonly groups: readonly ReportGroup[];
  readonly statistics?: ReportStatistics;
}
