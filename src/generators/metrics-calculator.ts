/**
 * Metrics Calculator
 *
 * Pure function computing aggregate pull request statistics.
 * Always runs over the full record list, independent of grouping.
 */

import type { PullRequestRecord, ReportStatistics } from '../types/pull-request.js';

export function calculateStatistics(pullRequests: readonly PullRequestRecord[]): ReportStatistics {
  let merged = 0;
  let open = 0;
  let closed = 0;
  let additions = 0;
  let deletions = 0;

  for (const pr of pullRequests) {
    if (pr.state === 'MERGED') merged++;
    else if (pr.state === 'OPEN') open++;
    else closed++;

    additions += pr.additions;
    deletions += pr.deletions;
  }

  return {
    total: pullRequests.length,
    merged,
    open,
    closed,
    additions,
    deletions,
    changed: additions + deletions,
  };
}
