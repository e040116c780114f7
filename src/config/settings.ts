/**
 * Report Defaults
 *
 * Reads ~/.work-summary/config.json. Every field is optional; missing
 * fields fall back to the built-in defaults. Command-line flags override
 * whatever is read here.
 */

import { z } from 'zod';
import type { SummarySettings } from './types.js';
import { settingsPath } from './paths.js';
import { readJsonFile } from './json-file.js';

const SettingsSchema = z.object({
  user: z.string().min(1).optional(),
  format: z.enum(['text', 'markdown', 'json']).default('text'),
  groupBy: z.enum(['repo', 'date', 'none', 'by-repository', 'by-date']).default('repo'),
  includeStats: z.boolean().default(false),
});

export const DEFAULT_SETTINGS: SummarySettings = SettingsSchema.parse({});

/**
 * Read report defaults, or the built-in defaults when there is no file.
 * Throws on invalid JSON or a value the schema rejects.
 */
export function readSettings(): SummarySettings {
  return readJsonFile(settingsPath(), SettingsSchema) ?? DEFAULT_SETTINGS;
}
