/**
 * MCP Tool Definitions and Handlers
 *
 * Kept apart from the stdio server in index.ts so handlers can be called
 * directly with an injected GitHub client.
 */

import { resolveGitHubCredentials } from './config/credentials.js';
import { resolveConfigDir } from './config/paths.js';
import { GitHubClient } from './clients/github-client.js';
import { parseSummaryOptions, runWorkSummary } from './commands/summary.js';
import { parseMonthlyOptions, runMonthlyMetrics, DEFAULT_MONTHS } from './commands/monthly.js';
import { PERIOD_SELECTORS } from './orchestrator/time-range.js';
import { GROUPING_MODES, OUTPUT_FORMATS } from './generators/report-builder.js';

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export interface ToolDeps {
  createClient: (token: string) => Pick<GitHubClient, 'getUserPullRequestsPage'>;
  resolveToken: () => string | null;
  now?: () => Date;
}

export const defaultToolDeps: ToolDeps = {
  createClient: (token) => new GitHubClient(token),
  resolveToken: () => resolveGitHubCredentials()?.token ?? null,
};

export const TOOL_DEFINITIONS = [
  {
    name: 'work_summary',
    description:
      'Summarize a GitHub user\'s pull requests for a period (today, yesterday, last week, this month, a custom date range...). Groups by repository or date and can include PR counts and line totals. Use when the user asks: "what did I work on", "my PRs this week", "work summary", "status report".',
    inputSchema: {
      type: 'object' as const,
      properties: {
        user: {
          type: 'string' as const,
          description: 'GitHub username',
        },
        period: {
          type: 'string' as const,
          enum: [...PERIOD_SELECTORS],
          description: 'Time period to summarize',
        },
        start: {
          type: 'string' as const,
          description: 'Start date YYYY-MM-DD (period "custom" only)',
        },
        end: {
          type: 'string' as const,
          description: 'End date YYYY-MM-DD, inclusive (period "custom" only)',
        },
        format: {
          type: 'string' as const,
          enum: [...OUTPUT_FORMATS],
          description: 'Output format (default: text)',
        },
        grouping: {
          type: 'string' as const,
          enum: [...GROUPING_MODES],
          description: 'How to group pull requests (default: by-repository)',
        },
        includeStatistics: {
          type: 'boolean' as const,
          description: 'Include PR counts by state and line totals',
        },
      },
      required: ['user', 'period'],
    },
  },
  {
    name: 'monthly_metrics',
    description:
      'Lines added and deleted in a GitHub user\'s pull requests per calendar month, with per-workday averages, peak months and a last-12-months trend. Use when the user asks about code output over months, productivity trends, or "how much code did I ship".',
    inputSchema: {
      type: 'object' as const,
      properties: {
        user: {
          type: 'string' as const,
          description: 'GitHub username',
        },
        months: {
          type: 'number' as const,
          description: `Current month plus the n-1 before it (default: ${DEFAULT_MONTHS})`,
        },
        workdaysPerWeek: {
          type: 'number' as const,
          description: 'Workdays per week used for the averages, 1-7 (default: 5)',
        },
        format: {
          type: 'string' as const,
          enum: [...OUTPUT_FORMATS],
          description: 'Output format (default: text)',
        },
      },
      required: ['user'],
    },
  },
  {
    name: 'get_capabilities',
    description: 'Show available tools and whether GitHub credentials are configured.',
    inputSchema: {
      type: 'object' as const,
      properties: {},
    },
  },
];

function text(value: string): ToolResult {
  return { content: [{ type: 'text', text: value }] };
}

export async function handleToolCall(
  name: string,
  args: Record<string, unknown> | undefined,
  deps: ToolDeps = defaultToolDeps
): Promise<ToolResult> {
  try {
    switch (name) {
      case 'work_summary':
        return await handleWorkSummary(args, deps);
      case 'monthly_metrics':
        return await handleMonthlyMetrics(args, deps);
      case 'get_capabilities':
        return handleGetCapabilities(deps);
      default:
        throw new Error(`Unknown tool: ${name}`);
    }
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    return {
      content: [{ type: 'text', text: `Error: ${errorMessage}` }],
      isError: true,
    };
  }
}

async function handleWorkSummary(
  args: Record<string, unknown> | undefined,
  deps: ToolDeps
): Promise<ToolResult> {
  const options = parseSummaryOptions(args ?? {});
  const result = await runWorkSummary(options, clientFor(deps), { now: deps.now?.() });
  return text(result.output);
}

async function handleMonthlyMetrics(
  args: Record<string, unknown> | undefined,
  deps: ToolDeps
): Promise<ToolResult> {
  const options = parseMonthlyOptions(args ?? {});
  const result = await runMonthlyMetrics(options, clientFor(deps), { now: deps.now?.() });
  return text(result.output);
}

function clientFor(deps: ToolDeps): Pick<GitHubClient, 'getUserPullRequestsPage'> {
  const token = deps.resolveToken();
  if (!token) {
    throw new Error('GitHub credentials required. Set GITHUB_TOKEN or run "work-summary login".');
  }
  return deps.createClient(token);
}

function handleGetCapabilities(deps: ToolDeps): ToolResult {
  const configured = deps.resolveToken() !== null;
  const parts: string[] = [];

  parts.push('# work-summary');
  parts.push('');
  parts.push(`**Config directory:** ${resolveConfigDir()}`);
  parts.push(
    `**GitHub:** ${configured ? 'Configured' : 'Not configured — set GITHUB_TOKEN in the MCP server env'}`
  );
  parts.push('');
  parts.push('## Tools');
  parts.push('- **work_summary** — Pull request summary for a period')
  parts.push('- **monthly_metrics** — Lines changed per month, per workday');
  parts.push('- **get_capabilities** — This overview');
  parts.push('');
  parts.push(`**Periods:** ${PERIOD_SELECTORS.join(', ')}`);
  parts.push(`**Formats:** ${OUTPUT_FORMATS.join(', ')}`);
  parts.push(`**Grouping:** ${GROUPING_MODES.join(', ')}`);

  return text(parts.join('\n'));
}
