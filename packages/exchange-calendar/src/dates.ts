/**
 * Calendar date arithmetic on `YYYY-MM-DD` keys.
 *
 * Dates are converted to day numbers (days since 1970-01-01) for arithmetic
 * and back to keys for storage, so nothing here depends on the host time zone.
 */

import { CalendarError, WEEKDAYS } from '@xcal/contracts';
import type { DateInput, DateKey, Weekday } from '@xcal/contracts';

const MS_PER_DAY = 86_400_000;
const DATE_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Day number of a year/month/day triple (month is 1-based).
 */
export function dayNumberOf(year: number, month: number, day: number): number {
  return Math.floor(Date.UTC(year, month - 1, day) / MS_PER_DAY);
}

/**
 * Checks that a string is a well-formed, existing calendar date.
 *
 * @example
 * ```typescript
 * isDateKey('2024-02-29'); // true
 * isDateKey('2023-02-29'); // false
 * isDateKey('2024-2-1');   // false
 * ```
 */
export function isDateKey(value: string): boolean {
  const match = DATE_KEY_PATTERN.exec(value);
  if (!match) {
    return false;
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12 || day < 1) {
    return false;
  }
  return fromDayNumber(dayNumberOf(year, month, day)) === value;
}

/**
 * Converts a date key to its day number.
 *
 * @throws {CalendarError} INVALID_DATE if the key is malformed
 */
export function toDayNumber(key: DateKey): number {
  if (!isDateKey(key)) {
    throw new CalendarError('INVALID_DATE', { value: key }, `Invalid date: ${key}. Expected YYYY-MM-DD.`);
  }
  return Math.floor(Date.parse(`${key}T00:00:00.000Z`) / MS_PER_DAY);
}

/**
 * Converts a day number back to a date key.
 */
export function fromDayNumber(day: number): DateKey {
  return new Date(day * MS_PER_DAY).toISOString().slice(0, 10);
}

/**
 * Reduces a query input to a date key. `Date` values use their UTC date.
 *
 * @throws {CalendarError} INVALID_DATE for malformed strings or invalid Dates
 */
export function normalizeDate(input: DateInput): DateKey {
  if (input instanceof Date) {
    if (Number.isNaN(input.getTime())) {
      throw new CalendarError('INVALID_DATE', { value: String(input) }, 'Invalid date: Invalid Date');
    }
    return input.toISOString().slice(0, 10);
  }
  toDayNumber(input);
  return input;
}

export function addDays(key: DateKey, days: number): DateKey {
  return fromDayNumber(toDayNumber(key) + days);
}

/**
 * Weekday of a day number. Day 0 (1970-01-01) was a Thursday.
 */
export function weekdayOfDay(day: number): Weekday {
  const index = (((day + 3) % 7) + 7) % 7;
  return WEEKDAYS[index] ?? 'monday';
}

export function weekdayOf(key: DateKey): Weekday {
  return weekdayOfDay(toDayNumber(key));
}

export function yearOf(key: DateKey): number {
  return Number(key.slice(0, 4));
}

export function daysInMonth(year: number, month: number): number {
  return dayNumberOf(year, month + 1, 1) - dayNumberOf(year, month, 1);
}

/**
 * Gregorian Easter Sunday (anonymous Gregorian algorithm).
 *
 * @example
 * ```typescript
 * easterSunday(2024); // '2024-03-31'
 * ```
 */
export function easterSunday(year: number): DateKey {
  const a = year % 19;
  const b = Math.floor(year / 100);
  const c = year % 100;
  const d = Math.floor(b / 4);
  const e = b % 4;
  const f = Math.floor((b + 8) / 25);
  const g = Math.floor((b - f + 1) / 3);
  const h = (19 * a + b - d - g + 15) % 30;
  const i = Math.floor(c / 4);
  const k = c % 4;
  const l = (32 + 2 * e + 2 * i - h - k) % 7;
  const m = Math.floor((a + 11 * h + 22 * l) / 451);
  const month = Math.floor((h + l - 7 * m + 114) / 31);
  const day = ((h + l - 7 * m + 114) % 31) + 1;
  return fromDayNumber(dayNumberOf(year, month, day));
}

/**
 * The n-th given weekday of a month; `nth = -1` selects the last one.
 * Returns null when the month has no such day (e.g. a fifth Monday).
 *
 * @example
 * ```typescript
 * nthWeekdayOfMonth(2024, 1, 'monday', 3);  // '2024-01-15'
 * nthWeekdayOfMonth(2024, 5, 'monday', -1); // '2024-05-27'
 * ```
 */
export function nthWeekdayOfMonth(
  year: number,
  month: number,
  weekday: Weekday,
  nth: number
): DateKey | null {
  const target = WEEKDAYS.indexOf(weekday);
  const length = daysInMonth(year, month);

  if (nth === -1) {
    const last = dayNumberOf(year, month, length);
    const lastIndex = WEEKDAYS.indexOf(weekdayOfDay(last));
    return fromDayNumber(last - ((lastIndex - target + 7) % 7));
  }

  const first = dayNumberOf(year, month, 1);
  const firstIndex = WEEKDAYS.indexOf(weekdayOfDay(first));
  const offset = (target - firstIndex + 7) % 7 + 7 * (nth - 1);
  if (offset >= length) {
    return null;
  }
  return fromDayNumber(first + offset);
}
