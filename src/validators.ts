/**
 * Zod schemas for pull request records and exported JSON reports.
 *
 * These mirror the TypeScript interfaces in src/types/ so a JSON report
 * written by renderJson() can be read back and checked.
 */

import { z } from 'zod';
import type { JsonReportDocument } from './generators/report-generator.js';
import type { MonthlyJsonDocument } from './generators/monthly-report.js';

export const PullRequestRecordSchema = z.object({
  repository: z.string(),
  number: z.number().int().nonnegative(),
  title: z.string(),
  url: z.string(),
  state: z.enum(['OPEN', 'MERGED', 'CLOSED']),
  createdAt: z.string(),
  updatedAt: z.string().optional(),
  mergedAt: z.string().optional(),
  closedAt: z.string().optional(),
  additions: z.number().int().nonnegative(),
  deletions: z.number().int().nonnegative(),
  isPrivate: z.boolean().optional(),
});

const StatisticsSchema = z.object({
  total: z.number().int().nonnegative(),
  merged: z.number().int().nonnegative(),
  open: z.number().int().nonnegative(),
  closed: z.number().int().nonnegative(),
  additions: z.number().int().nonnegative(),
  deletions: z.number().int().nonnegative(),
  changed: z.number().int().nonnegative(),
});

export const JsonReportSchema = z.object({
  user: z.string().optional(),
  period: z.string(),
  window: z.object({
    start: z.string().datetime(),
    end: z.string().datetime(),
  }),
  grouping: z.enum(['by-repository', 'by-date', 'none']),
  groups: z.array(
    z.object({
      key: z.string(),
      pullRequests: z.array(PullRequestRecordSchema),
    })
  ),
  statistics: StatisticsSchema.optional(),
});

/**
 * Parse the text of a JSON report.
 * Throws a SyntaxError for invalid JSON and a ZodError for a wrong shape.
 */
export function parseJsonReport(text: string): JsonReportDocument {
  const parsed: unknown = JSON.parse(text);
  return JsonReportSchema.parse(parsed);
}

const AveragesSchema = z.object({
  additions: z.number().nonnegative(),
  deletions: z.number().nonnegative(),
  changed: z.number().nonnegative(),
});

const PeakSchema = z.object({ label: z.string(), value: z.number().nonnegative() });

export const MonthlyReportSchema = z.object({
  user: z.string().optional(),
  period: z.string(),
  window: z.object({
    start: z.string().datetime(),
    end: z.string().datetime(),
  }),
  workdaysPerWeek: z.number().int().min(1).max(7),
  totalPullRequests: z.number().int().nonnegative(),
  months: z.array(
    z.object({
      month: z.string().regex(/^\d{4}-\d{2}$/),
      label: z.string(),
      pullRequests: z.number().int().nonnegative(),
      additions: z.number().int().nonnegative(),
      deletions: z.number().int().nonnegative(),
      changed: z.number().int().nonnegative(),
      activeDays: z.number().int().positive(),
      weekFraction: z.number().positive(),
      avgAdditions: z.number().nonnegative(),
      avgDeletions: z.number().nonnegative(),
      avgChanged: z.number().nonnegative(),
    })
  ),
  summary: z
    .object({
      totalPullRequests: z.number().int().nonnegative(),
      additions: z.number().int().nonnegative(),
      deletions: z.number().int().nonnegative(),
      changed: z.number().int().nonnegative(),
      activeMonths: z.number().int().positive(),
      overall: AveragesSchema,
      recent: AveragesSchema,
      peaks: z.object({ additions: PeakSchema, deletions: PeakSchema, changed: PeakSchema }),
    })
    .optional(),
});

/** Parse the text of a monthly metrics JSON report. */
export function parseMonthlyJsonReport(text: string): MonthlyJsonDocument {
  const parsed: unknown = JSON.parse(text);
  return MonthlyReportSchema.parse(parsed);
}
