/**
 * API Response Types
 *
 * TypeScript types for raw GitHub REST and GraphQL responses.
 * These get mapped to our internal types (src/types/) by the client.
 */

// ─── REST ────────────────────────────────────────────────────

export interface GitHubApiUser {
  login: string;
  id: number;
  name: string | null;
  email: string | null;
  avatar_url: string;
}

// ─── GraphQL ─────────────────────────────────────────────────

export interface GraphQLError {
  message: string;
  type?: string;
  path?: Array<string | number>;
}

export interface GraphQLResponse<T> {
  data?: T | null;
  errors?: GraphQLError[];
}

export interface GitHubGraphQLPullRequest {
  number: number;
  title: string;
  url: string;
  state: 'OPEN' | 'MERGED' | 'CLOSED';
  createdAt: string;
  updatedAt: string;
  mergedAt: string | null;
  closedAt: string | null;
  additions: number;
  deletions: number;
  repository: {
    name: string;
    nameWithOwner: string;
    isPrivate: boolean;
  };
}

export interface GitHubGraphQLUserPullRequests {
  user: {
    pullRequests: {
      totalCount: number;
      pageInfo: {
        hasNextPage: boolean;
        endCursor: string | null;
      };
      nodes: Array<GitHubGraphQLPullRequest | null>;
    };
  } | null;
}
