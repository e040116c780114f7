import type { PullRequestRecord } from '../types/pull-request.js';

export function makePullRequest(overrides: Partial<PullRequestRecord> = {}): PullRequestRecord {
  return {
    repository: 'org/alpha',
    number: 1,
    title: 'Example change',
    url: 'https://github.com/org/alpha/pull/1',
    state: 'OPEN',
    createdAt: '2025-01-15T12:00:00Z',
    additions: 0,
    deletions: 0,
    ...overrides,
  };
}

/** Three PRs across two repos, newest first as the API returns them. */
export const SAMPLE_PULL_REQUESTS: readonly PullRequestRecord[] = [
  makePullRequest({
    repository: 'org/beta',
    number: 7,
    title: 'Add cache layer',
    url: 'https://github.com/org/beta/pull/7',
    state: 'MERGED',
    createdAt: '2025-01-20T09:00:00Z',
    updatedAt: '2025-01-21T10:00:00Z',
    mergedAt: '2025-01-21T10:00:00Z',
    closedAt: '2025-01-21T10:00:00Z',
    additions: 10,
    deletions: 2,
    isPrivate: false,
  }),
  makePullRequest({
    repository: 'org/alpha',
    number: 3,
    title: 'Fix [flaky] test',
    url: 'https://github.com/org/alpha/pull/3',
    state: 'MERGED',
    createdAt: '2025-01-18T15:30:00Z',
    mergedAt: '2025-01-19T08:00:00Z',
    additions: 5,
    deletions: 1,
  }),
  makePullRequest({
    repository: 'org/alpha',
    number: 4,
    title: 'Draft: new API',
    url: 'https://github.com/org/alpha/pull/4',
    state: 'OPEN',
    createdAt: '2025-01-18T08:00:00Z',
    additions: 0,
    deletions: 0,
  }),
];

/**
 * Newest first across three months: the sample January, two February PRs
 * opened on the same day, and a March PR with no line changes.
 */
export const MONTHLY_PULL_REQUESTS: readonly PullRequestRecord[] = [
  makePullRequest({ number: 20, createdAt: '2025-03-05T10:00:00Z' }),
  makePullRequest({ number: 11, createdAt: '2025-02-03T15:00:00Z' }),
  makePullRequest({ number: 10, createdAt: '2025-02-03T10:00:00Z', additions: 40, deletions: 10 }),
  ...SAMPLE_PULL_REQUESTS,
];
