/**
 * @fileoverview Core calendar types shared by the engine and the registry.
 *
 * Calendar dates are carried as `YYYY-MM-DD` strings; instants are `Date`
 * objects. All types are plain data with no behaviour.
 *
 * @module @xcal/contracts/calendar
 */

/**
 * A calendar date in `YYYY-MM-DD` form, without a time zone.
 *
 * @example "2024-01-02"
 */
export type DateKey = string;

/**
 * Anything a query accepts as a date. `Date` values are reduced to their UTC
 * calendar date.
 */
export type DateInput = DateKey | Date;

/**
 * A wall-clock time in `HH:MM` (24-hour) form, local to a calendar's zone.
 *
 * @example "09:00", "13:30", "18:01"
 */
export type LocalTime = string;

/**
 * Days of the week, lowercase.
 */
export type Weekday =
  | 'monday'
  | 'tuesday'
  | 'wednesday'
  | 'thursday'
  | 'friday'
  | 'saturday'
  | 'sunday';

/**
 * Weekdays in ISO order (Monday first).
 */
export const WEEKDAYS: readonly Weekday[] = [
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
  'sunday',
];

/**
 * A single trading session.
 *
 * @invariant open < close
 *
 * @example
 * ```typescript
 * const session: Session = {
 *   date: '2024-01-02',
 *   open: new Date('2024-01-02T01:00:00.000Z'),
 *   close: new Date('2024-01-02T05:30:00.000Z'),
 *   isSpecial: false,
 * };
 * ```
 */
export interface Session {
  /** Trading date the session belongs to */
  readonly date: DateKey;

  /** First instant of the session (inclusive) */
  readonly open: Date;

  /** End of the session (exclusive) */
  readonly close: Date;

  /** True when special hours (early close / late open) apply */
  readonly isSpecial: boolean;
}

/**
 * Inclusive range of calendar dates.
 */
export interface DateRange {
  start: DateKey;
  end: DateKey;
}

/**
 * Result of a next/previous session lookup.
 *
 * `clamped` means the requested date was beyond the covered range, so the
 * first or last session was returned instead.
 */
export type SessionLookup =
  | { kind: 'found'; session: Session }
  | { kind: 'clamped'; session: Session; boundary: 'first' | 'last' };

/**
 * Direction used when an instant falls outside every session.
 */
export type GapDirection = 'none' | 'next' | 'previous';
