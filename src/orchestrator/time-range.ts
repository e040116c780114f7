/**
 * Time Window Resolution
 *
 * Pure functions that turn a period selector into a concrete [start, end)
 * window. Calendar arithmetic (midnight, Monday, first of month, YYYY-MM-DD
 * parsing) happens in the local time zone of the process.
 */

import { ValidationError } from '../errors.js';
import type { TimeWindow } from '../types/pull-request.js';

export const PERIOD_SELECTORS = [
  'today',
  'yesterday',
  'last-week',
  'last-month',
  'last-year',
  'this-week',
  'this-month',
  'custom',
] as const;

export type PeriodSelector = (typeof PERIOD_SELECTORS)[number];

export interface ResolveWindowOptions {
  /** YYYY-MM-DD, required for `custom` */
  start?: string;
  /** YYYY-MM-DD, required for `custom`; the whole day is included */
  end?: string;
  now?: Date;
}

const DAY_MS = 24 * 60 * 60 * 1000;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export function isPeriodSelector(value: string): value is PeriodSelector {
  return (PERIOD_SELECTORS as readonly string[]).includes(value);
}

/**
 * Local midnight of year/month/day. Uses setFullYear so years 0-99 are not
 * read as 1900-1999 the way the Date constructor reads them.
 */
export function localDate(year: number, monthIndex: number, day: number): Date {
  const date = new Date(0);
  date.setFullYear(year, monthIndex, day);
  date.setHours(0, 0, 0, 0);
  return date;
}

/** Local midnight of the given instant's calendar day. */
export function startOfLocalDay(date: Date): Date {
  return localDate(date.getFullYear(), date.getMonth(), date.getDate());
}

/** Calendar-day arithmetic in local time (keeps midnight across DST changes). */
export function addLocalDays(date: Date, days: number): Date {
  return localDate(date.getFullYear(), date.getMonth(), date.getDate() + days);
}

/** YYYY-MM-DD of the instant in local time. */
export function formatLocalDate(date: Date): string {
  const y = String(date.getFullYear()).padStart(4, '0');
  const m = String(date.getMonth() + 1).padStart(2, '0');
  const d = String(date.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

/** YYYY-MM-DD HH:MM of the instant in local time. */
export function formatLocalDateTime(date: Date): string {
  const h = String(date.getHours()).padStart(2, '0');
  const min = String(date.getMinutes()).padStart(2, '0');
  return `${formatLocalDate(date)} ${h}:${min}`;
}

/**
 * Parse a YYYY-MM-DD string to local midnight of that date.
 * Rejects strings that are not real calendar dates (e.g. 2025-02-30).
 */
export function parseCalendarDate(value: string, field: string): Date {
  const match = DATE_PATTERN.exec(value.trim());
  if (!match) {
    throw new ValidationError(field, value, `Invalid ${field} date "${value}". Use YYYY-MM-DD.`);
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = localDate(year, month - 1, day);

  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    throw new ValidationError(field, value, `Invalid ${field} date "${value}": no such day.`);
  }
  return date;
}

export function isWithinWindow(timestamp: string | undefined, window: TimeWindow): boolean {
  if (!timestamp) return false;
  const time = new Date(timestamp).getTime();
  if (isNaN(time)) return false;
  return time >= window.start.getTime() && time < window.end.getTime();
}

/**
 * Resolve a period selector to a time window.
 * Throws ValidationError for an unknown selector or bad custom bounds.
 */
export function resolveTimeWindow(
  selector: string,
  options: ResolveWindowOptions = {}
): TimeWindow {
  const now = options.now ?? new Date();
  const todayStart = startOfLocalDay(now);

  if (!isPeriodSelector(selector)) {
    throw new ValidationError(
      'period',
      selector,
      `Unknown period "${selector}". Expected one of: ${PERIOD_SELECTORS.join(', ')}`
    );
  }

  switch (selector) {
    case 'today':
      return { start: todayStart, end: now, label: 'Today' };
    case 'yesterday':
      return { start: addLocalDays(todayStart, -1), end: todayStart, label: 'Yesterday' };
    case 'last-week':
      return rollingWindow(now, 7, 'Last 7 Days');
    case 'last-month':
      return rollingWindow(now, 30, 'Last 30 Days');
    case 'last-year':
      return rollingWindow(now, 365, 'Last Year');
    case 'this-week': {
      // getDay(): Sunday = 0, Monday = 1
      const daysSinceMonday = (todayStart.getDay() + 6) % 7;
      return { start: addLocalDays(todayStart, -daysSinceMonday), end: now, label: 'This Week' };
    }
    case 'this-month':
      return {
        start: localDate(now.getFullYear(), now.getMonth(), 1),
        end: now,
        label: 'This Month',
      };
    case 'custom':
      return customWindow(options.start, options.end);
  }
}

/**
 * The current calendar month plus the `months - 1` before it, up to now.
 */
export function resolveMonthsWindow(months: number, now: Date = new Date()): TimeWindow {
  if (!Number.isInteger(months) || months < 1) {
    throw new ValidationError(
      'months',
      months,
      `Invalid months "${months}". Use a whole number of at least 1.`
    );
  }

  return {
    start: localDate(now.getFullYear(), now.getMonth() - (months - 1), 1),
    end: now,
    label: months === 1 ? 'This Month' : `Last ${months} Months`,
  };
}

function rollingWindow(now: Date, days: number, label: string): TimeWindow {
  return { start: new Date(now.getTime() - days * DAY_MS), end: now, label };
}

function customWindow(start: string | undefined, end: string | undefined): TimeWindow {
  if (!start) {
    throw new ValidationError('start', start, 'Custom period requires a start date (YYYY-MM-DD)');
  }
  if (!end) {
    throw new ValidationError('end', end, 'Custom period requires an end date (YYYY-MM-DD)');
  }

  const startDate = parseCalendarDate(start, 'start');
  const endDate = parseCalendarDate(end, 'end');

  if (startDate.getTime() > endDate.getTime()) {
    throw new ValidationError(
      'start',
      start,
      `Start date ${start} is after end date ${end}`
    );
  }

  return {
    start: startDate,
    end: addLocalDays(endDate, 1),
    label: `${start.trim()} to ${end.trim()}`,
  };
}
