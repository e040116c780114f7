/**
 * work-summary keeps two files in one directory: `$WORK_SUMMARY_HOME`,
 * or `~/.work-summary` when that is unset.
 */

import { mkdirSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

export const CONFIG_HOME_ENV = 'WORK_SUMMARY_HOME';

export type ConfigFileName = 'credentials.json' | 'config.json';

export function resolveConfigDir(): string {
  return process.env[CONFIG_HOME_ENV] || join(homedir(), '.work-summary');
}

export function configFilePath(name: ConfigFileName): string {
  return join(resolveConfigDir(), name);
}

/** Create the directory owner-only if it is missing; returns its path. */
export function ensureConfigDir(): string {
  const dir = resolveConfigDir();
  mkdirSync(dir, { recursive: true, mode: 0o700 });
  return dir;
}

export function credentialsPath(): string {
  return configFilePath('credentials.json');
}

export function settingsPath(): string {
  return configFilePath('config.json');
}
