/**
 * @fileoverview Immutable, ordered set of sessions for a date range.
 *
 * Built once by {@link buildSessionIndex}; every query afterwards is a lookup
 * or a binary search. The minute-level view is created on first use.
 * Sessions handed to callers are copies; the index keeps its own instants.
 */

import { ConstructionError, NotASessionError } from '@xcal/contracts';
import type { DateInput, DateKey, DateRange, GapDirection, Session, SessionLookup } from '@xcal/contracts';
import { normalizeDate } from './dates.js';
import { MinuteIndex, copySession } from './minute-index.js';
import { lowerBound, upperBound } from './search.js';
import type { ExecutionOffsets } from './schema.js';

const MS_PER_MINUTE = 60_000;

export interface SessionIndexInit {
  calendar: string;
  timezone: string;
  range: DateRange;
  sessions: readonly Session[];
  /** Trading weekdays removed by holiday rules */
  holidays: readonly DateKey[];
  executionOffsets?: ExecutionOffsets;
}

/**
 * Sessions of one calendar over one date range.
 *
 * @invariant sessions are sorted by date with no duplicates
 * @invariant every session has open < close
 * @invariant close of a session <= open of the next
 *
 * @example
 * ```typescript
 * const index = buildSessionIndex(config, '2024-01-01', '2024-12-31');
 * index.isSession('2024-01-02');           // true
 * index.nextSession('2024-01-05').session; // Monday 2024-01-08
 * index.minuteToSession(new Date('2024-01-02T02:00:00Z')).date;
 * ```
 */
export class SessionIndex {
  readonly calendar: string;
  readonly timezone: string;
  readonly range: Readonly<DateRange>;

  private readonly sessionList: readonly Session[];
  private readonly dates: readonly DateKey[];
  private readonly byDate: ReadonlyMap<DateKey, Session>;
  private readonly holidayList: readonly DateKey[];
  private readonly offsets: ExecutionOffsets;
  private minuteIndex: MinuteIndex | undefined;

  constructor(init: SessionIndexInit) {
    const first = init.sessions[0];
    const last = init.sessions[init.sessions.length - 1];
    if (!first || !last) {
      throw new ConstructionError('date range contains no sessions', {
        calendar: init.calendar,
        start: init.range.start,
        end: init.range.end,
      });
    }

    this.calendar = init.calendar;
    this.timezone = init.timezone;
    this.range = Object.freeze({ ...init.range });
    this.sessionList = Object.freeze(init.sessions.map(copySession));
    this.dates = Object.freeze(this.sessionList.map((session) => session.date));
    this.byDate = new Map(this.sessionList.map((session) => [session.date, session]));
    this.holidayList = Object.freeze([...init.holidays]);
    this.offsets = init.executionOffsets ?? { openMinutes: 0, closeMinutes: 0 };
  }

  get sessions(): readonly Session[] {
    return Object.freeze(this.sessionList.map(copySession));
  }

  get size(): number {
    return this.sessionList.length;
  }

  get firstSession(): Session {
    return this.at(0);
  }

  get lastSession(): Session {
    return this.at(this.sessionList.length - 1);
  }

  /**
   * Trading weekdays inside the range that are closed for a holiday.
   */
  get holidays(): readonly DateKey[] {
    return this.holidayList;
  }

  /**
   * Minute-level view, built on first access.
   */
  get minutes(): MinuteIndex {
    if (!this.minuteIndex) {
      this.minuteIndex = new MinuteIndex(this.calendar, this.sessionList);
    }
    return this.minuteIndex;
  }

  isSession(date: DateInput): boolean {
    return this.byDate.has(normalizeDate(date));
  }

  isHoliday(date: DateInput): boolean {
    const key = normalizeDate(date);
    const index = lowerBound(this.holidayList, key);
    return this.holidayList[index] === key;
  }

  /**
   * The session on a date.
   *
   * @param paramName - Name of the caller's parameter, quoted in the error
   * @throws {NotASessionError} when the date is not a session
   */
  sessionFor(date: DateInput, paramName?: string): Session {
    const key = normalizeDate(date);
    const session = this.byDate.get(key);
    if (!session) {
      throw new NotASessionError({
        calendar: this.calendar,
        date: key,
        firstSession: this.firstSession.date,
        lastSession: this.lastSession.date,
        paramName,
      });
    }
    return copySession(session);
  }

  /**
   * First session strictly after a date, or the last session (clamped) when
   * there is none.
   */
  nextSession(date: DateInput): SessionLookup {
    const index = upperBound(this.dates, normalizeDate(date));
    const session = this.sessionList[index];
    if (session) {
      return { kind: 'found', session: copySession(session) };
    }
    return { kind: 'clamped', session: this.lastSession, boundary: 'last' };
  }

  /**
   * Last session strictly before a date, or the first session (clamped) when
   * there is none.
   */
  previousSession(date: DateInput): SessionLookup {
    const index = lowerBound(this.dates, normalizeDate(date)) - 1;
    const session = this.sessionList[index];
    if (session) {
      return { kind: 'found', session: copySession(session) };
    }
    return { kind: 'clamped', session: this.firstSession, boundary: 'first' };
  }

  /**
   * Sessions with `from <= date <= to`. Empty when `from > to`.
   */
  sessionsInRange(from: DateInput, to: DateInput): Session[] {
    const start = normalizeDate(from);
    const end = normalizeDate(to);
    if (start > end) {
      return [];
    }
    return this.sessionList.slice(lowerBound(this.dates, start), upperBound(this.dates, end)).map(copySession);
  }

  /**
   * Session containing an instant. See {@link MinuteIndex.minuteToSession}.
   */
  minuteToSession(instant: Date, direction: GapDirection = 'none'): Session {
    return this.minutes.minuteToSession(instant, direction);
  }

  isOpenAt(instant: Date): boolean {
    return this.minutes.isOpenAt(instant);
  }

  /**
   * Every trading minute of the session on a date.
   */
  sessionMinutes(date: DateInput): Date[] {
    return this.minutes.sessionMinutes(this.sessionFor(date));
  }

  minuteCount(date: DateInput): number {
    return this.minutes.minuteCount(this.sessionFor(date));
  }

  /**
   * Instant orders may first execute in the session, `open + openMinutes`.
   */
  executionTimeFromOpen(date: DateInput): Date {
    const session = this.sessionFor(date);
    return new Date(session.open.getTime() + this.offsets.openMinutes * MS_PER_MINUTE);
  }

  /**
   * Last instant orders may execute in the session, `close + closeMinutes`.
   */
  executionTimeFromClose(date: DateInput): Date {
    const session = this.sessionFor(date);
    return new Date(session.close.getTime() + this.offsets.closeMinutes * MS_PER_MINUTE);
  }

  /**
   * Index restricted to a sub-range of this one.
   *
   * @throws {ConstructionError} when the sub-range is not covered or holds no sessions
   */
  slice(from: DateInput, to: DateInput): SessionIndex {
    const start = normalizeDate(from);
    const end = normalizeDate(to);
    if (start > end || start < this.range.start || end > this.range.end) {
      throw new ConstructionError(`range ${start}..${end} is not within ${this.range.start}..${this.range.end}`, {
        calendar: this.calendar,
      });
    }

    return new SessionIndex({
      calendar: this.calendar,
      timezone: this.timezone,
      range: { start, end },
      sessions: this.sessionsInRange(start, end),
      holidays: this.holidayList.filter((date) => date >= start && date <= end),
      executionOffsets: this.offsets,
    });
  }

  private at(index: number): Session {
    const session = this.sessionList[index];
    if (!session) {
      throw new RangeError(`No session at position ${index}`);
    }
    return copySession(session);
  }
}
