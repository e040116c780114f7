/**
 * Data Fetcher
 *
 * Pages through a user's pull requests (newest first) and keeps the ones
 * created or updated inside the time window.
 */

import type { GitHubClient } from '../clients/github-client.js';
import type { PullRequestRecord, TimeWindow } from '../types/pull-request.js';
import { isWithinWindow } from './time-range.js';

/** Hard cap on pages fetched per invocation (100 PRs each). */
const DEFAULT_MAX_PAGES = 50;

export interface FetchOptions {
  maxPages?: number;
  onPage?: (page: number, kept: number) => void;
}

/**
 * Fetch pull requests authored by `login` that were created or updated in the window.
 *
 * Paging stops at the first PR created and last updated before the window
 * start, when the API reports no next page, or after maxPages.
 */
export async function fetchPullRequestsForWindow(
  client: Pick<GitHubClient, 'getUserPullRequestsPage'>,
  login: string,
  window: TimeWindow,
  options: FetchOptions = {}
): Promise<PullRequestRecord[]> {
  const maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
  const kept: PullRequestRecord[] = [];
  let cursor: string | null = null;

  for (let page = 1; page <= maxPages; page++) {
    const result = await client.getUserPullRequestsPage(login, cursor);
    let reachedOlder = false;

    for (const pr of result.pullRequests) {
      if (isWithinWindow(pr.createdAt, window) || isWithinWindow(pr.updatedAt, window)) {
        kept.push(pr);
      }
      if (isBeforeWindow(pr, window)) {
        reachedOlder = true;
        break;
      }
    }

    options.onPage?.(page, kept.length);

    if (reachedOlder || !result.hasNextPage || !result.endCursor) {
      break;
    }
    cursor = result.endCursor;
  }

  return kept;
}

function isBeforeWindow(pr: PullRequestRecord, window: TimeWindow): boolean {
  const start = window.start.getTime();
  const created = new Date(pr.createdAt).getTime();
  const updated = pr.updatedAt ? new Date(pr.updatedAt).getTime() : created;
  return created < start && updated < start;
}
