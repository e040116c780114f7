/**
 * Command-line argument parsing for the work-summary CLI.
 */

import { ValidationError } from '../errors.js';
import { PERIOD_SELECTORS } from '../orchestrator/time-range.js';
import type { SummarySettings } from '../config/types.js';

export interface ParsedArgs {
  command: string;
  flags: Record<string, string>;
}

/** Flags that never take a value. */
const BOOLEAN_FLAGS = new Set<string>([...PERIOD_SELECTORS, 'include-stats', 'help']);

const SHORT_FLAGS: Record<string, string> = {
  '-u': 'user',
  '-t': 'token',
  '-f': 'format',
  '-o': 'export',
  '-h': 'help',
};

export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  let command = 'summary';
  let flagStart = 0;

  // "work-summary -u octo --today" runs the default summary command
  const first = args[0];
  if (first !== undefined && !first.startsWith('-')) {
    command = first;
    flagStart = 1;
  }
  if (first === undefined) {
    command = 'help';
  }

  // "help summary" → "help-summary"
  const second = args[1];
  if (command === 'help' && second !== undefined && !second.startsWith('-')) {
    command = `help-${second}`;
    flagStart = 2;
  }

  const flags: Record<string, string> = {};

  for (let i = flagStart; i < args.length; i++) {
    const arg = args[i] ?? '';
    const key = SHORT_FLAGS[arg] ?? (arg.startsWith('--') ? arg.slice(2) : undefined);
    if (key === undefined) continue;

    const next = args[i + 1];
    if (!BOOLEAN_FLAGS.has(key) && next !== undefined && !next.startsWith('-')) {
      flags[key] = next;
      i++;
    } else {
      flags[key] = '';
    }
  }

  if (flags['help'] !== undefined && !command.startsWith('help')) {
    command = `help-${command}`;
  }

  return { command, flags };
}

/**
 * Exactly one period: either one of the period flags or --period <name>.
 */
export function selectPeriod(flags: Record<string, string>): string {
  const chosen: string[] = PERIOD_SELECTORS.filter((p) => flags[p] !== undefined);
  const named = flags['period'];
  if (named) chosen.push(named);

  if (chosen.length !== 1) {
    throw new ValidationError(
      'period',
      chosen.join(', ') || undefined,
      `Choose exactly one period: ${PERIOD_SELECTORS.map((p) => `--${p}`).join(', ')}`
    );
  }
  return chosen[0] ?? '';
}

/**
 * Merge flags over saved defaults into the raw shape parseSummaryOptions() takes.
 */
export function summaryInputFromFlags(
  flags: Record<string, string>,
  settings: SummarySettings
): Record<string, unknown> {
  return {
    user: flags['user'] ?? settings.user ?? '',
    period: selectPeriod(flags),
    start: flags['start'],
    end: flags['end'],
    format: flags['format'] || settings.format,
    grouping: flags['group-by'] || settings.groupBy,
    includeStatistics: flags['include-stats'] !== undefined || settings.includeStats,
  };
}

/**
 * Same for parseMonthlyOptions(). Numeric flags stay unchecked here so the
 * schema reports them.
 */
export function monthlyInputFromFlags(
  flags: Record<string, string>,
  settings: SummarySettings
): Record<string, unknown> {
  return {
    user: flags['user'] ?? settings.user ?? '',
    months: numberFlag(flags['months']),
    workdaysPerWeek: numberFlag(flags['workdays-per-week']),
    format: flags['format'] || settings.format,
  };
}

function numberFlag(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}
