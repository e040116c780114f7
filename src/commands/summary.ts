/**
 * Work Summary Command
 *
 * Shared by the CLI and the MCP server: validate options, resolve the
 * window, fetch pull requests, then build and render the report.
 */

import { z } from 'zod';
import { ValidationError } from '../errors.js';
import { parseOptions } from './options.js';
import { resolveTimeWindow, formatLocalDateTime, isPeriodSelector } from '../orchestrator/time-range.js';
import type { PeriodSelector } from '../orchestrator/time-range.js';
import { fetchPullRequestsForWindow } from '../orchestrator/data-fetcher.js';
import { buildReport, parseGroupingMode, parseOutputFormat } from '../generators/report-builder.js';
import { renderReport } from '../generators/report-generator.js';
import type { GitHubClient } from '../clients/github-client.js';
import type { GroupingMode, OutputFormat, TimeWindow } from '../types/pull-request.js';

export interface SummaryOptions {
  user: string;
  period: PeriodSelector;
  start?: string;
  end?: string;
  format: OutputFormat;
  grouping: GroupingMode;
  includeStatistics: boolean;
}

export interface SummaryResult {
  output: string;
  window: TimeWindow;
  count: number;
}

export interface RunSummaryOptions {
  now?: Date;
  /** Suppress progress lines on stderr */
  quiet?: boolean;
}

const RawSummaryOptionsSchema = z.object({
  user: z.string().trim().min(1, 'a GitHub username is required'),
  period: z.string().trim().min(1, 'a period is required'),
  start: z.string().optional(),
  end: z.string().optional(),
  format: z.string().default('text'),
  grouping: z.string().default('by-repository'),
  includeStatistics: z.boolean().default(false),
});

/**
 * Validate loosely-typed options (CLI flags, MCP tool arguments).
 * Throws ValidationError for bad fields and FormatError for an unknown
 * format or grouping.
 */
export function parseSummaryOptions(raw: unknown): SummaryOptions {
  const { user, period, start, end, format, grouping, includeStatistics } = parseOptions(
    RawSummaryOptionsSchema,
    raw
  );

  if (!isPeriodSelector(period)) {
    throw new ValidationError('period', period, `Unknown period "${period}"`);
  }

  return {
    user,
    period,
    start,
    end,
    format: parseOutputFormat(format),
    grouping: parseGroupingMode(grouping),
    includeStatistics,
  };
}

export async function runWorkSummary(
  options: SummaryOptions,
  client: Pick<GitHubClient, 'getUserPullRequestsPage'>,
  runOptions: RunSummaryOptions = {}
): Promise<SummaryResult> {
  const log = (msg: string): void => {
    if (!runOptions.quiet) console.error(`[work-summary] ${msg}`);
  };

  const window = resolveTimeWindow(options.period, {
    start: options.start,
    end: options.end,
    now: runOptions.now,
  });

  log(`Fetching work summary for ${options.user}`);
  log(`Period: ${window.label}`);
  log(`Date range: ${formatLocalDateTime(window.start)} to ${formatLocalDateTime(window.end)}`);

  const pullRequests = await fetchPullRequestsForWindow(client, options.user, window, {
    onPage: (page, kept) => log(`Page ${page}: ${kept} matching PRs so far`),
  });

  log(`Found ${pullRequests.length} PRs in this period`);

  const report = buildReport({
    user: options.user,
    window,
    pullRequests,
    grouping: options.grouping,
    includeStatistics: options.includeStatistics,
  });

  return {
    output: renderReport(report, options.format),
    window,
    count: pullRequests.length,
  };
}
