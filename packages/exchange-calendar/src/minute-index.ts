/**
 * @fileoverview Minute-level view over a session index.
 *
 * Sessions are half-open `[open, close)` intervals. Open and close instants
 * are held as millisecond arrays so an instant resolves to its session with
 * one binary search.
 */

import { CalendarError, RangeGapError } from '@xcal/contracts';
import type { DateKey, GapDirection, Session } from '@xcal/contracts';
import { lowerBound, upperBound } from './search.js';

const MS_PER_MINUTE = 60_000;

/**
 * Frozen copy of a session with its own `Date` instances.
 */
export function copySession(session: Session): Session {
  return Object.freeze({
    date: session.date,
    open: new Date(session.open.getTime()),
    close: new Date(session.close.getTime()),
    isSpecial: session.isSpecial,
  });
}

export class MinuteIndex {
  private readonly opens: number[];
  private readonly closes: number[];
  private readonly sessions: readonly Session[];

  constructor(
    private readonly calendar: string,
    sessions: readonly Session[]
  ) {
    this.sessions = sessions.map(copySession);
    this.opens = this.sessions.map((session) => session.open.getTime());
    this.closes = this.sessions.map((session) => session.close.getTime());
  }

  /**
   * Total number of trading minutes across all sessions.
   */
  get totalMinutes(): number {
    let total = 0;
    this.opens.forEach((open, i) => {
      total += minutesBetween(open, this.closes[i] ?? open);
    });
    return total;
  }

  /**
   * True when the instant lies inside some session.
   */
  isOpenAt(instant: Date): boolean {
    return this.locate(instant.getTime()) !== null;
  }

  /**
   * True when the minute starting at the instant (floored to the minute) is
   * a trading minute.
   */
  isTradingMinute(instant: Date): boolean {
    const t = Math.floor(instant.getTime() / MS_PER_MINUTE) * MS_PER_MINUTE;
    return this.locate(t) !== null;
  }

  /**
   * Session containing the instant.
   *
   * An instant equal to a close belongs to the following session only when
   * that session opens at the same instant.
   *
   * @throws {RangeGapError} when the instant is outside every session and
   * `direction` is 'none', or there is no session in the given direction
   * @throws {CalendarError} INVALID_DATE for an invalid `Date`
   */
  minuteToSession(instant: Date, direction: GapDirection = 'none'): Session {
    const t = instant.getTime();
    if (Number.isNaN(t)) {
      throw new CalendarError('INVALID_DATE', { calendar: this.calendar }, 'Invalid instant: Invalid Date');
    }

    const index = upperBound(this.opens, t) - 1;
    const current = this.sessions[index];
    const currentClose = this.closes[index];

    if (current && currentClose !== undefined && t < currentClose) {
      return copySession(current);
    }

    const previous = current;
    const next = this.sessions[index + 1];

    if (direction === 'next' && next) {
      return copySession(next);
    }
    if (direction === 'previous' && previous) {
      return copySession(previous);
    }

    throw new RangeGapError({
      calendar: this.calendar,
      instant,
      position: previous === undefined ? 'before-first' : next === undefined ? 'after-last' : 'gap',
      previousClose: previous && new Date(previous.close.getTime()),
      nextOpen: next && new Date(next.open.getTime()),
    });
  }

  /**
   * Every trading minute of a session, from open up to (not including) close.
   */
  sessionMinutes(session: Session): Date[] {
    const minutes: Date[] = [];
    for (let t = session.open.getTime(); t < session.close.getTime(); t += MS_PER_MINUTE) {
      minutes.push(new Date(t));
    }
    return minutes;
  }

  minuteCount(session: Session): number {
    return minutesBetween(session.open.getTime(), session.close.getTime());
  }

  /**
   * Trading minutes in `[start, end)`, in order.
   */
  minutesInRange(start: Date, end: Date): Date[] {
    const from = start.getTime();
    const to = end.getTime();
    const minutes: Date[] = [];
    if (from >= to) {
      return minutes;
    }

    // First session whose close is after the start
    const first = upperBound(this.closes, from);
    const last = lowerBound(this.opens, to);

    for (let i = first; i < last; i++) {
      const open = this.opens[i];
      const close = this.closes[i];
      if (open === undefined || close === undefined) {
        continue;
      }
      const lo = Math.max(open, open + Math.ceil((from - open) / MS_PER_MINUTE) * MS_PER_MINUTE);
      const hi = Math.min(close, to);
      for (let t = lo; t < hi; t += MS_PER_MINUTE) {
        minutes.push(new Date(t));
      }
    }
    return minutes;
  }

  /**
   * Dates of the sessions that overlap `[start, end)`.
   */
  sessionsBetween(start: Date, end: Date): DateKey[] {
    const first = upperBound(this.closes, start.getTime());
    const last = lowerBound(this.opens, end.getTime());
    return this.sessions.slice(first, Math.max(first, last)).map((session) => session.date);
  }

  private locate(t: number): number | null {
    const index = upperBound(this.opens, t) - 1;
    const close = this.closes[index];
    return close !== undefined && t < close ? index : null;
  }
}

function minutesBetween(open: number, close: number): number {
  return Math.ceil((close - open) / MS_PER_MINUTE);
}
