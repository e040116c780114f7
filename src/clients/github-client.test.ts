import { describe, it, expect, vi, beforeEach } from 'vitest';
import { GitHubClient, GitHubClientError } from './github-client.js';

// Mock global fetch
const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

function jsonResponse(data: unknown, status = 200): Response {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: status === 200 ? 'OK' : 'Error',
    json: () => Promise.resolve(data),
    headers: new Headers(),
  } as Response;
}

function pullRequestNode(overrides: Record<string, unknown> = {}) {
  return {
    number: 42,
    title: 'Fix login redirect',
    url: 'https://github.com/org/repo/pull/42',
    state: 'MERGED',
    createdAt: '2026-02-06T09:00:00Z',
    updatedAt: '2026-02-07T10:00:00Z',
    mergedAt: '2026-02-07T10:00:00Z',
    closedAt: '2026-02-07T10:00:00Z',
    additions: 12,
    deletions: 3,
    repository: { name: 'repo', nameWithOwner: 'org/repo', isPrivate: true },
    ...overrides,
  };
}

function pageResponse(nodes: unknown[], hasNextPage = false, endCursor: string | null = null) {
  return jsonResponse({
    data: {
      user: {
        pullRequests: {
          totalCount: nodes.length,
          pageInfo: { hasNextPage, endCursor },
          nodes,
        },
      },
    },
  });
}

describe('GitHubClient', () => {
  let client: GitHubClient;

  beforeEach(() => {
    vi.clearAllMocks();
    client = new GitHubClient('test-token');
  });

  describe('getAuthenticatedUser', () => {
    it('returns login and name', async () => {
      mockFetch.mockResolvedValue(
        jsonResponse({ login: 'octo', id: 1, name: 'Octo Cat', email: null, avatar_url: '' })
      );

      const user = await client.getAuthenticatedUser();

      expect(user).toEqual({ login: 'octo', name: 'Octo Cat' });
      expect(mockFetch).toHaveBeenCalledWith(
        'https://api.github.com/user',
        expect.objectContaining({
          method: 'GET',
          // eslint-disable-next-line @typescript-eslint/no-unsafe-assignment
          headers: expect.objectContaining({ Authorization: 'Bearer test-token' }),
        })
      );
    });

    it('accepts a token provider', async () => {
      const provider = vi.fn(() => Promise.resolve('provided-token'));
      const providedClient = new GitHubClient(provider);
      mockFetch.mockResolvedValue(
        jsonResponse({ login: 'octo', id: 1, name: null, email: null, avatar_url: '' })
      );

      await providedClient.getAuthenticatedUser();

      expect(provider).toHaveBeenCalledOnce();
      expect(mockFetch).toHaveBeenCalledWith(
        'https://api.github.com/user',
        expect.objectContaining({
          // eslint-disable-next-line @typescript-eslint/no-unsafe-assignment
          headers: expect.objectContaining({ Authorization: 'Bearer provided-token' }),
        })
      );
    });
  });

  describe('getUserPullRequestsPage', () => {
    it('maps GraphQL nodes to pull request records', async () => {
      mockFetch.mockResolvedValue(pageResponse([pullRequestNode()], true, 'cursor-1'));

      const page = await client.getUserPullRequestsPage('octo');

      expect(page.hasNextPage).toBe(true);
      expect(page.endCursor).toBe('cursor-1');
      expect(page.pullRequests).toEqual([
        {
          repository: 'org/repo',
          number: 42,
          title: 'Fix login redirect',
          url: 'https://github.com/org/repo/pull/42',
          state: 'MERGED',
          createdAt: '2026-02-06T09:00:00Z',
          updatedAt: '2026-02-07T10:00:00Z',
          mergedAt: '2026-02-07T10:00:00Z',
          closedAt: '2026-02-07T10:00:00Z',
          additions: 12,
          deletions: 3,
          isPrivate: true,
        },
      ]);
    });

    it('turns null timestamps into absent fields and drops null nodes', async () => {
      mockFetch.mockResolvedValue(
        pageResponse([pullRequestNode({ state: 'OPEN', mergedAt: null, closedAt: null }), null])
      );

      const page = await client.getUserPullRequestsPage('octo');

      expect(page.pullRequests).toHaveLength(1);
      expect(page.pullRequests[0]?.mergedAt).toBeUndefined();
      expect(page.pullRequests[0]?.closedAt).toBeUndefined();
    });

    it('posts the login and cursor as GraphQL variables', async () => {
      mockFetch.mockResolvedValue(pageResponse([]));

      await client.getUserPullRequestsPage('octo', 'cursor-2');

      const [url, init] = mockFetch.mock.calls[0] as [string, { method: string; body: string }];
      const body = JSON.parse(init.body) as { variables: Record<string, unknown> };
      expect(url).toBe('https://api.github.com/graphql');
      expect(init.method).toBe('POST');
      expect(body.variables).toEqual({ login: 'octo', first: 100, after: 'cursor-2' });
    });

    it('throws a 404 GitHubClientError for an unknown user', async () => {
      mockFetch.mockResolvedValue(
        jsonResponse({
          data: { user: null },
          errors: [{ type: 'NOT_FOUND', message: "Could not resolve to a User with the login of 'ghost'." }],
        })
      );

      await expect(client.getUserPullRequestsPage('ghost')).rejects.toMatchObject({
        name: 'GitHubClientError',
        statusCode: 404,
        retryable: false,
      });
    });

    it('throws when the user is null without errors', async () => {
      mockFetch.mockResolvedValue(jsonResponse({ data: { user: null } }));

      await expect(client.getUserPullRequestsPage('ghost')).rejects.toThrow(
        'GitHub user not found: ghost'
      );
    });
  });

  describe('error handling', () => {
    it('throws GitHubClientError on API failure', async () => {
      mockFetch.mockResolvedValue(jsonResponse({}, 401));

      await expect(client.getAuthenticatedUser()).rejects.toThrow(GitHubClientError);
    });

    it('marks 429 as retryable', async () => {
      mockFetch.mockResolvedValue(jsonResponse({}, 429));

      await expect(client.getAuthenticatedUser()).rejects.toMatchObject({ retryable: true });
    });

    it('marks 500 as retryable', async () => {
      mockFetch.mockResolvedValue(jsonResponse({}, 502));

      await expect(client.getUserPullRequestsPage('octo')).rejects.toMatchObject({
        statusCode: 502,
        retryable: true,
      });
    });

    it('marks 403 as not retryable', async () => {
      mockFetch.mockResolvedValue(jsonResponse({}, 403));

      await expect(client.getAuthenticatedUser()).rejects.toMatchObject({ retryable: false });
    });
  });
});
