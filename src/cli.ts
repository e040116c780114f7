#!/usr/bin/env node

/**
 * Work Summary CLI
 *
 * Summarize a GitHub user's pull requests over a time period.
 *
 * Usage:
 *   work-summary -u octocat --last-week [--format markdown] [--group-by date]
 *   work-summary monthly -u octocat [--months 6] [--workdays-per-week 6]
 *   work-summary login --token <token>
 *   work-summary status
 */

import { writeFileSync } from 'node:fs';
import { resolveGitHubCredentials, writeCredentials } from './config/credentials.js';
import { readSettings } from './config/settings.js';
import { resolveConfigDir, credentialsPath, settingsPath } from './config/paths.js';
import { GitHubClient } from './clients/github-client.js';
import { parseArgs, summaryInputFromFlags, monthlyInputFromFlags } from './commands/args.js';
import { parseSummaryOptions, runWorkSummary } from './commands/summary.js';
import { parseMonthlyOptions, runMonthlyMetrics } from './commands/monthly.js';
import type { SummaryResult } from './commands/summary.js';
import { WorkSummaryError } from './errors.js';

const VERSION = '1.0.0';

// ─── Commands ───────────────────────────────────────────────

function createClient(flags: Record<string, string>): GitHubClient {
  const creds = resolveGitHubCredentials(flags['token'] || undefined);
  if (!creds) {
    throw new Error(
      'GitHub token required. Provide via -t/--token, GITHUB_TOKEN, or "work-summary login".'
    );
  }
  return new GitHubClient(creds.token);
}

async function runSummary(flags: Record<string, string>): Promise<string> {
  const options = parseSummaryOptions(summaryInputFromFlags(flags, readSettings()));
  return exportResult(flags, await runWorkSummary(options, createClient(flags)));
}

async function runMonthly(flags: Record<string, string>): Promise<string> {
  const options = parseMonthlyOptions(monthlyInputFromFlags(flags, readSettings()));
  return exportResult(flags, await runMonthlyMetrics(options, createClient(flags)));
}

/** Write the report to --export as well, when given. */
function exportResult(flags: Record<string, string>, result: SummaryResult): string {
  const exportPath = flags['export'];
  if (exportPath) {
    writeFileSync(exportPath, result.output + '\n', 'utf-8');
    console.error(`[work-summary] Report exported to ${exportPath}`);
  }

  return result.output;
}

async function runLogin(flags: Record<string, string>): Promise<string> {
  const token = flags['token'];
  if (!token) {
    throw new Error('Usage: work-summary login --token <token>');
  }

  const user = await new GitHubClient(token).getAuthenticatedUser();
  writeCredentials({ github: { token } });
  return `Authenticated as ${user.login}. Token saved to ${credentialsPath()}`;
}

function runStatus(): string {
  const creds = resolveGitHubCredentials();
  const settings = readSettings();
  const sources = { flag: '--token flag', env: 'GITHUB_TOKEN', file: credentialsPath() };

  const lines: string[] = [];
  lines.push(`work-summary v${VERSION}`);
  lines.push('');
  lines.push(`Config dir:  ${resolveConfigDir()}`);
  lines.push(`Settings:    ${settingsPath()}`);
  lines.push(
    `GitHub:      ${creds ? `Configured (${sources[creds.source]})` : 'Not configured (run "work-summary login" or set GITHUB_TOKEN)'}`
  );
  lines.push('');
  lines.push('Defaults:');
  lines.push(`  user:          ${settings.user ?? '(none)'}`);
  lines.push(`  format:        ${settings.format}`);
  lines.push(`  group-by:      ${settings.groupBy}`);
  lines.push(`  include-stats: ${settings.includeStats ? 'yes' : 'no'}`);

  return lines.join('\n');
}

function showHelp(topic?: string): string {
  const help = topic ? COMMAND_HELP[topic] : undefined;
  if (help) {
    return help;
  }

  if (topic) {
    return `Unknown command: ${topic}\n\n${MAIN_HELP}`;
  }

  return MAIN_HELP;
}

const MAIN_HELP = `work-summary - GitHub pull request work summaries

Usage:
  work-summary [summary] -u <user> <period> [options]
  work-summary <command>
  work-summary help <command>

Commands:
  summary           Summarize pull requests for a period (default)
  monthly           Lines added/deleted per month, averaged per workday
  login             Validate and save a GitHub token
  status            Show config directory, credentials, and defaults
  help [command]    Show help for a specific command

Periods (choose one):
  --today           Work done today
  --yesterday       Work done yesterday
  --last-week       Last 7 days
  --last-month      Last 30 days
  --last-year       Last 365 days
  --this-week       Monday through now
  --this-month      First of the month through now
  --custom          Custom range, requires --start and --end (YYYY-MM-DD)

Examples:
  work-summary -u octocat --today
  work-summary -u octocat --last-week --format markdown
  work-summary -u octocat --custom --start 2025-01-01 --end 2025-01-31
  work-summary -u octocat --this-month --group-by date --include-stats
  work-summary -u octocat --today --format json --export summary.json
  work-summary monthly -u octocat --months 6 --format markdown

Environment Variables:
  GITHUB_TOKEN        GitHub personal access token (alternative to -t)
  WORK_SUMMARY_HOME   Config directory (default: ~/.work-summary)`;

const COMMAND_HELP: Record<string, string> = {
  summary: `work-summary summary — Pull Request Work Summary

  Fetch the user's pull requests created or updated in the period and render
  them as text, Markdown, or JSON.

  Usage:
    work-summary [summary] -u <user> <period> [options]

  Options:
    -u, --user <login>        GitHub username to summarize
    -t, --token <token>       GitHub token (overrides GITHUB_TOKEN and saved token)
    --period <name>           Alternative to the period flags (e.g. last-week)
    --start <YYYY-MM-DD>      Start date for --custom
    --end <YYYY-MM-DD>        End date for --custom (whole day included)
    -f, --format <fmt>        text | markdown | json (default: text)
    --group-by <mode>         repo | date | none (default: repo)
    --include-stats           Add PR counts and line totals
    -o, --export <file>       Also write the report to a file

  Defaults for --user, --format, --group-by and --include-stats can be saved
  in ~/.work-summary/config.json.`,

  monthly: `work-summary monthly — Monthly Code Metrics

  Count lines added and deleted in the user's pull requests per calendar
  month. Averages are per workday: each day with a pull request opened counts
  as a seventh of a week of --workdays-per-week workdays.

  Usage:
    work-summary monthly -u <user> [options]

  Options:
    -u, --user <login>        GitHub username to analyze
    -t, --token <token>       GitHub token (overrides GITHUB_TOKEN and saved token)
    --months <n>              Current month plus the n-1 before it (default: 12)
    --workdays-per-week <n>   1-7 (default: 5)
    -f, --format <fmt>        text | markdown | json (default: text)
    -o, --export <file>       Also write the report to a file`,

  login: `work-summary login — Save a GitHub Token

  Validate a personal access token against the GitHub API and store it in
  ~/.work-summary/credentials.json (600 permissions).

  Usage:
    work-summary login --token <token>`,

  status: `work-summary status — Show Configuration Status

  Display the config directory, where the GitHub token comes from, and the
  saved report defaults.

  Usage:
    work-summary status`,
};

// ─── Main ───────────────────────────────────────────────────

async function main() {
  const { command, flags } = parseArgs(process.argv);

  try {
    let output: string;

    switch (command) {
      case 'summary':
        output = await runSummary(flags);
        break;
      case 'monthly':
        output = await runMonthly(flags);
        break;
      case 'login':
        output = await runLogin(flags);
        break;
      case 'status':
        output = runStatus();
        break;
      case 'help':
        output = showHelp();
        break;
      default:
        if (command.startsWith('help-')) {
          output = showHelp(command.slice(5));
          break;
        }
        console.error(`Unknown command: ${command}\n`);
        output = showHelp();
        process.exitCode = 1;
    }

    console.log(output);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    const prefix = error instanceof WorkSummaryError ? `${error.name}: ` : 'Error: ';
    console.error(`${prefix}${message}`);
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
