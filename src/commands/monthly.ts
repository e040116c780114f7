/**
 * Monthly Code Metrics Command
 *
 * Fetches the user's pull requests for the last N calendar months and
 * reports line changes per month, normalized per workday.
 */

import { z } from 'zod';
import { parseOptions } from './options.js';
import {
  resolveMonthsWindow,
  formatLocalDateTime,
  isWithinWindow,
} from '../orchestrator/time-range.js';
import { fetchPullRequestsForWindow } from '../orchestrator/data-fetcher.js';
import { parseOutputFormat } from '../generators/report-builder.js';
import { buildMonthlyReport, DEFAULT_WORKDAYS_PER_WEEK } from '../generators/monthly-metrics.js';
import { renderMonthlyReport } from '../generators/monthly-report.js';
import type { GitHubClient } from '../clients/github-client.js';
import type { OutputFormat } from '../types/pull-request.js';
import type { RunSummaryOptions, SummaryResult } from './summary.js';

export const DEFAULT_MONTHS = 12;

export interface MonthlyOptions {
  user: string;
  months: number;
  workdaysPerWeek: number;
  format: OutputFormat;
}

const RawMonthlyOptionsSchema = z.object({
  user: z.string().trim().min(1, 'a GitHub username is required'),
  months: z.number().int().min(1).max(600).default(DEFAULT_MONTHS),
  workdaysPerWeek: z.number().int().min(1).max(7).default(DEFAULT_WORKDAYS_PER_WEEK),
  format: z.string().default('text'),
});

/**
 * Validate loosely-typed options. Throws ValidationError for bad fields
 * and FormatError for an unknown format.
 */
export function parseMonthlyOptions(raw: unknown): MonthlyOptions {
  const { user, months, workdaysPerWeek, format } = parseOptions(RawMonthlyOptionsSchema, raw);
  return { user, months, workdaysPerWeek, format: parseOutputFormat(format) };
}

export async function runMonthlyMetrics(
  options: MonthlyOptions,
  client: Pick<GitHubClient, 'getUserPullRequestsPage'>,
  runOptions: RunSummaryOptions = {}
): Promise<SummaryResult> {
  const log = (msg: string): void => {
    if (!runOptions.quiet) console.error(`[work-summary] ${msg}`);
  };

  const window = resolveMonthsWindow(options.months, runOptions.now);

  log(`Fetching monthly code metrics for ${options.user}`);
  log(`Period: ${window.label}`);
  log(`Date range: ${formatLocalDateTime(window.start)} to ${formatLocalDateTime(window.end)}`);

  const fetched = await fetchPullRequestsForWindow(client, options.user, window, {
    onPage: (page, kept) => log(`Page ${page}: ${kept} matching PRs so far`),
  });
  // months are keyed by creation date; PRs only updated in the window belong to earlier months
  const pullRequests = fetched.filter((pr) => isWithinWindow(pr.createdAt, window));

  log(`Found ${pullRequests.length} PRs opened in this period`);

  const report = buildMonthlyReport({
    user: options.user,
    window,
    pullRequests,
    workdaysPerWeek: options.workdaysPerWeek,
  });

  return {
    output: renderMonthlyReport(report, options.format),
    window,
    count: pullRequests.length,
  };
}
