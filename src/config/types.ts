/**
 * Configuration Types
 *
 * Shapes of the credentials file and the report defaults file.
 * Zod schemas in credentials.ts and settings.ts validate against these.
 */

import type { OutputFormat } from '../types/pull-request.js';

/** GitHub credentials. */
export interface GitHubCredentials {
  token: string;
  source: 'flag' | 'env' | 'file';
}

/** Root credentials — stored in ~/.work-summary/credentials.json */
export interface CredentialsFile {
  github?: { token: string };
}

/** Report defaults — stored in ~/.work-summary/config.json */
export interface SummarySettings {
  user?: string;
  format: OutputFormat;
  groupBy: string;
  includeStats: boolean;
}
