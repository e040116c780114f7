/**
 * GitHub API Client
 *
 * Uses native fetch (Node 18+). REST for token validation, GraphQL for a
 * user's pull requests. Responses are mapped to our internal types.
 */

import type {
  GitHubApiUser,
  GitHubGraphQLPullRequest,
  GitHubGraphQLUserPullRequests,
  GraphQLResponse,
} from './types.js';
import type { PullRequestRecord } from '../types/pull-request.js';

const GITHUB_API = 'https://api.github.com';
const DEFAULT_TIMEOUT_MS = 30_000;
const PAGE_SIZE = 100;

const USER_PULL_REQUESTS_QUERY = `
query($login: String!, $first: Int!, $after: String) {
  user(login: $login) {
    pullRequests(first: $first, after: $after, orderBy: {field: CREATED_AT, direction: DESC}) {
      totalCount
      pageInfo {
        hasNextPage
        endCursor
      }
      nodes {
        number
        title
        url
        state
        createdAt
        updatedAt
        mergedAt
        closedAt
        additions
        deletions
        repository {
          name
          nameWithOwner
          isPrivate
        }
      }
    }
  }
}
`;

export class GitHubClientError extends Error {
  constructor(
    message: string,
    public statusCode: number,
    public retryable: boolean
  ) {
    super(message);
    this.name = 'GitHubClientError';
  }
}

export interface PullRequestPage {
  pullRequests: PullRequestRecord[];
  hasNextPage: boolean;
  endCursor: string | null;
}

export function mapPullRequest(node: GitHubGraphQLPullRequest): PullRequestRecord {
  return {
    repository: node.repository.nameWithOwner,
    number: node.number,
    title: node.title,
    url: node.url,
    state: node.state,
    createdAt: node.createdAt,
    updatedAt: node.updatedAt,
    mergedAt: node.mergedAt ?? undefined,
    closedAt: node.closedAt ?? undefined,
    additions: node.additions,
    deletions: node.deletions,
    isPrivate: node.repository.isPrivate,
  };
}

export class GitHubClient {
  private getToken: () => Promise<string>;

  constructor(tokenOrProvider: string | (() => Promise<string>)) {
    if (typeof tokenOrProvider === 'string') {
      const token = tokenOrProvider;
      this.getToken = () => Promise.resolve(token);
    } else {
      this.getToken = tokenOrProvider;
    }
  }

  /**
   * Get the authenticated user's profile.
   * Used to validate the token is working.
   */
  async getAuthenticatedUser(): Promise<{ login: string; name: string | null }> {
    const user = await this.request<GitHubApiUser>('/user');
    return { login: user.login, name: user.name };
  }

  /**
   * One page of a user's pull requests, newest first by creation date.
   */
  async getUserPullRequestsPage(login: string, after?: string | null): Promise<PullRequestPage> {
    const data = await this.graphql<GitHubGraphQLUserPullRequests>(USER_PULL_REQUESTS_QUERY, {
      login,
      first: PAGE_SIZE,
      after: after ?? null,
    });

    if (!data.user) {
      throw new GitHubClientError(`GitHub user not found: ${login}`, 404, false);
    }

    const { nodes, pageInfo } = data.user.pullRequests;
    return {
      pullRequests: nodes
        .filter((n): n is GitHubGraphQLPullRequest => n !== null)
        .map(mapPullRequest),
      hasNextPage: pageInfo.hasNextPage,
      endCursor: pageInfo.endCursor,
    };
  }

  // ─── HTTP Layer ──────────────────────────────────────────

  private async graphql<T>(query: string, variables: Record<string, unknown>): Promise<T> {
    const body = await this.request<GraphQLResponse<T>>('/graphql', {
      method: 'POST',
      body: JSON.stringify({ query, variables }),
    });

    if (body.errors && body.errors.length > 0) {
      const messages = body.errors.map((e) => e.message).join('; ');
      const notFound = body.errors.some((e) => e.type === 'NOT_FOUND');
      throw new GitHubClientError(`GitHub GraphQL error: ${messages}`, notFound ? 404 : 200, false);
    }
    if (!body.data) {
      throw new GitHubClientError('GitHub GraphQL response had no data', 200, true);
    }
    return body.data;
  }

  private async request<T>(path: string, init: { method?: string; body?: string } = {}): Promise<T> {
    const url = `${GITHUB_API}${path}`;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), DEFAULT_TIMEOUT_MS);
    const token = await this.getToken();

    try {
      const response = await fetch(url, {
        method: init.method ?? 'GET',
        body: init.body,
        headers: {
          Authorization: `Bearer ${token}`,
          Accept: 'application/vnd.github+json',
          'X-GitHub-Api-Version': '2022-11-28',
          ...(init.body ? { 'Content-Type': 'application/json' } : {}),
        },
        signal: controller.signal,
      });

      if (!response.ok) {
        const retryable = response.status === 429 || response.status >= 500;
        throw new GitHubClientError(
          `GitHub API error: ${response.status} ${response.statusText} for ${path}`,
          response.status,
          retryable
        );
      }

      return (await response.json()) as T;
    } finally {
      clearTimeout(timeout);
    }
  }
}
