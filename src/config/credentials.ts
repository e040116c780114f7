/**
 * GitHub token lookup. The first one found wins:
 *   --token flag, then GITHUB_TOKEN, then credentials.json.
 *
 * Callers hand the token to GitHubClient themselves.
 */

import { writeFileSync, chmodSync } from 'node:fs';
import { z } from 'zod';
import type { CredentialsFile, GitHubCredentials } from './types.js';
import { ensureConfigDir, credentialsPath } from './paths.js';
import { readJsonFile } from './json-file.js';

const CredentialsSchema = z.object({
  github: z.object({ token: z.string().min(1) }).optional(),
});

export function resolveGitHubCredentials(explicitToken?: string): GitHubCredentials | null {
  if (explicitToken) {
    return { token: explicitToken, source: 'flag' };
  }

  const envToken = process.env['GITHUB_TOKEN'];
  if (envToken) {
    return { token: envToken, source: 'env' };
  }

  // throws on a malformed file rather than reporting "not configured"
  const stored = readJsonFile(credentialsPath(), CredentialsSchema);
  return stored?.github ? { token: stored.github.token, source: 'file' } : null;
}

/** Saved owner read/write only (0600). */
export function writeCredentials(credentials: CredentialsFile): void {
  ensureConfigDir();
  const filePath = credentialsPath();
  writeFileSync(filePath, JSON.stringify(credentials, null, 2) + '\n', 'utf-8');
  chmodSync(filePath, 0o600);
}
