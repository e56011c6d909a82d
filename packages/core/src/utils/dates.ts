// src/utils/dates.ts
//
// Calendar helpers for daily batch jobs. Dates travel as 'YYYY-MM-DD'
// strings and all arithmetic happens in UTC.

export type DateInput = string | Date;

/**
 * A date, an offset from today (`{ days: -1 }` is yesterday), or nothing
 * (also yesterday).
 */
export type DateSpec = DateInput | { days: number } | undefined;

export interface DateWindow {
  start: string;
  end: string;
}

export interface DateBounds {
  start: DateInput;
  end: DateInput;
}

/**
 * D: every day. W: Sundays. MS: first day of each month. M: last day of
 * each month.
 */
export type Frequency = 'D' | 'W' | 'MS' | 'M';

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

function utcMidnight(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

function monthStart(year: number, month: number): Date {
  return new Date(Date.UTC(year, month, 1));
}

function monthEnd(year: number, month: number): Date {
  // Day 0 of the next month
  return new Date(Date.UTC(year, month + 1, 0));
}

export function isFrequency(value: string): value is Frequency {
  return value === 'D' || value === 'W' || value === 'MS' || value === 'M';
}

/**
 * Parse 'YYYY-MM-DD' (or take a Date) as a UTC midnight.
 * Impossible calendar dates such as '2018-01-32' are rejected.
 */
export function toDate(date: DateInput): Date {
  if (date instanceof Date) {
    if (Number.isNaN(date.getTime())) {
      throw new RangeError('Invalid Date');
    }
    return utcMidnight(date);
  }

  const match = DATE_PATTERN.exec(date);
  if (match) {
    const [, year, month, day] = match;
    const parsed = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
    if (formatDate(parsed) === date) {
      return parsed;
    }
  }
  throw new RangeError(`Invalid date string: '${date}'. Must be in YYYY-MM-DD format.`);
}

/**
 * Normalize a date spec to 'YYYY-MM-DD'
 */
export function validateDate(date?: DateSpec, now: Date = new Date()): string {
  if (date === undefined) {
    return formatDate(addDays(utcMidnight(now), -1));
  }
  if (typeof date === 'string' || date instanceof Date) {
    return formatDate(toDate(date));
  }
  if (!Number.isInteger(date.days)) {
    throw new RangeError(`Day offset must be an integer, got ${date.days}`);
  }
  return formatDate(addDays(utcMidnight(now), date.days));
}

/**
 * Window of `nDays` ending on `date` (lookback) or starting on it.
 *
 * @example
 * getWindow('2018-02-05', 1)        // { start: '2018-02-04', end: '2018-02-05' }
 * getWindow('2018-02-05', 1, false) // { start: '2018-02-05', end: '2018-02-06' }
 */
export function getWindow(date: DateInput, nDays: number, lookback = true): DateWindow {
  if (!Number.isInteger(nDays) || nDays < 0) {
    throw new RangeError(`nDays must be a non-negative integer, got ${nDays}`);
  }

  const anchor = toDate(date);
  if (lookback) {
    return { start: formatDate(addDays(anchor, -nDays)), end: formatDate(anchor) };
  }
  return { start: formatDate(anchor), end: formatDate(addDays(anchor, nDays)) };
}

/**
 * Dates between `start` and `end`, both inclusive, at the given frequency.
 * Yields nothing when start is after end.
 */
export function* dateRange(bounds: DateBounds, freq: Frequency = 'D'): Generator<string> {
  const start = toDate(bounds.start);
  const end = toDate(bounds.end);

  switch (freq) {
    case 'D':
      for (let day = start; day <= end; day = addDays(day, 1)) {
        yield formatDate(day);
      }
      return;

    case 'W': {
      // getUTCDay() is 0 on Sundays
      const first = addDays(start, (7 - start.getUTCDay()) % 7);
      for (let day = first; day <= end; day = addDays(day, 7)) {
        yield formatDate(day);
      }
      return;
    }

    case 'MS':
    case 'M': {
      const edge = freq === 'MS' ? monthStart : monthEnd;
      // Months counted from year 0, so stepping never needs a carry
      let index = start.getUTCFullYear() * 12 + start.getUTCMonth();
      const at = (i: number) => edge(Math.floor(i / 12), i % 12);
      if (at(index) < start) index++;

      for (let day = at(index); day <= end; day = at(++index)) {
        yield formatDate(day);
      }
      return;
    }
  }
}
