/**
 * @fileoverview Error taxonomy for exchange calendars.
 *
 * Every error carries a machine-readable code, a structured data payload and
 * an ISO timestamp. Messages are rendered from the structured fields the first
 * time `message` is read and stay fixed afterwards.
 *
 * Two families:
 * - {@link ConfigurationError} and subclasses: fatal, raised while
 *   registering or building a calendar.
 * - {@link NotASessionError} and {@link RangeGapError}: query-time failures the
 *   caller may recover from.
 *
 * @module @xcal/contracts/errors
 */

import type { DateKey } from './calendar.js';

/**
 * Base error class for all calendar errors.
 *
 * @invariant code is non-empty string
 * @invariant timestamp is valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new CalendarError('CUSTOM_ERROR', { context: 'value' }, 'Something went wrong');
 * ```
 */
export class CalendarError extends Error {
  /**
   * Machine-readable error code (e.g., 'CYCLIC_ALIAS').
   */
  readonly code: string;

  /**
   * Structured error data. Format varies by error type.
   */
  readonly data: Readonly<Record<string, unknown>>;

  /**
   * ISO 8601 timestamp when error was created.
   */
  readonly timestamp: string;

  private rendered: string | undefined;

  /**
   * @param code - Error code constant
   * @param data - Structured context data
   * @param message - Fixed message; when omitted the message comes from {@link render}
   */
  constructor(code: string, data: Record<string, unknown> = {}, message?: string) {
    super();
    this.name = 'CalendarError';
    this.code = code;
    this.data = Object.freeze({ ...data });
    this.timestamp = new Date().toISOString();
    this.rendered = message;

    Object.defineProperty(this, 'message', {
      configurable: true,
      enumerable: false,
      get: (): string => {
        if (this.rendered === undefined) {
          this.rendered = this.render();
        }
        return this.rendered;
      },
    });
  }

  /**
   * Builds the human-readable message from the structured fields.
   * Called at most once per error.
   */
  protected render(): string {
    return this.code;
  }

  /**
   * Serializes error to JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Fatal configuration problem found while registering or building a calendar.
 *
 * @example
 * ```typescript
 * throw new ConfigurationError('Invalid settings', { issues: ['logLevel: Invalid enum value'] });
 * ```
 */
export class ConfigurationError extends CalendarError {
  constructor(
    message: string | undefined,
    data: Record<string, unknown> = {},
    code: string = 'CONFIGURATION_ERROR'
  ) {
    super(code, data, message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Thrown when a name is already taken by a calendar or an alias.
 */
export class NameCollisionError extends ConfigurationError {
  readonly calendarName: string;

  /** What currently owns the name */
  readonly existing: 'calendar' | 'alias';

  constructor(data: { name: string; existing: 'calendar' | 'alias' }) {
    super(undefined, data, 'NAME_COLLISION');
    this.name = 'NameCollisionError';
    this.calendarName = data.name;
    this.existing = data.existing;
  }

  protected override render(): string {
    if (this.existing === 'alias') {
      return `The name ${this.calendarName} is already registered as a calendar alias.`;
    }
    return `A calendar with the name ${this.calendarName} is already registered.`;
  }
}

/**
 * Thrown when a calendar name (or an alias target) was never registered.
 */
export class UnknownNameError extends ConfigurationError {
  readonly calendarName: string;

  /** Alias whose target is missing, when the walk started from an alias */
  readonly via?: string;

  constructor(data: { name: string; via?: string }) {
    super(undefined, data, 'UNKNOWN_CALENDAR');
    this.name = 'UnknownNameError';
    this.calendarName = data.name;
    this.via = data.via;
  }

  protected override render(): string {
    const base = `The requested calendar, ${this.calendarName}, does not exist.`;
    return this.via === undefined ? base : `${base} (referenced by alias ${this.via})`;
  }
}

/**
 * Thrown when following aliases revisits a name.
 */
export class CyclicAliasError extends ConfigurationError {
  /** Names in walk order, ending with the first repeated name */
  readonly cycle: readonly string[];

  constructor(data: { cycle: string[] }) {
    super(undefined, data, 'CYCLIC_ALIAS');
    this.name = 'CyclicAliasError';
    this.cycle = [...data.cycle];
  }

  protected override render(): string {
    return `Cycle in calendar aliases: [${this.cycle.join(' -> ')}]`;
  }
}

/**
 * Thrown when a calendar configuration cannot produce a valid session index:
 * malformed rules, overlapping hour sub-ranges, an override on a non-trading
 * date, broken index invariants.
 */
export class ConstructionError extends ConfigurationError {
  readonly calendar?: string;
  readonly reason: string;
  readonly issues: readonly string[];

  constructor(
    reason: string,
    data: { calendar?: string; date?: DateKey; issues?: string[]; [key: string]: unknown } = {}
  ) {
    super(undefined, { ...data, reason }, 'CONSTRUCTION_ERROR');
    this.name = 'ConstructionError';
    this.calendar = data.calendar;
    this.reason = reason;
    this.issues = data.issues ?? [];
  }

  protected override render(): string {
    const head =
      this.calendar === undefined
        ? `Cannot build calendar: ${this.reason}`
        : `Cannot build calendar '${this.calendar}': ${this.reason}`;
    if (this.issues.length === 0) {
      return head;
    }
    return `${head}\n${this.issues.map((issue) => `  - ${issue}`).join('\n')}`;
  }
}

/**
 * Which side of the covered range a non-session date falls on.
 */
export type NotASessionCase = 'earlier-than-first' | 'later-than-last' | 'not-a-session';

/**
 * Thrown when a date expected to be a session is a valid date but not a
 * session of the calendar.
 *
 * @example
 * ```typescript
 * try {
 *   index.sessionFor('2024-01-01', 'start');
 * } catch (err) {
 *   if (isNotASessionError(err) && err.case === 'not-a-session') {
 *     // snap to the next session instead
 *   }
 * }
 * ```
 */
export class NotASessionError extends CalendarError {
  readonly calendar: string;
  readonly date: DateKey;
  readonly firstSession: DateKey;
  readonly lastSession: DateKey;
  readonly paramName?: string;
  readonly case: NotASessionCase;

  constructor(data: {
    calendar: string;
    date: DateKey;
    firstSession: DateKey;
    lastSession: DateKey;
    paramName?: string;
  }) {
    const kind: NotASessionCase =
      data.date < data.firstSession
        ? 'earlier-than-first'
        : data.date > data.lastSession
          ? 'later-than-last'
          : 'not-a-session';
    super('NOT_A_SESSION', { ...data, case: kind });
    this.name = 'NotASessionError';
    this.calendar = data.calendar;
    this.date = data.date;
    this.firstSession = data.firstSession;
    this.lastSession = data.lastSession;
    this.paramName = data.paramName;
    this.case = kind;
  }

  protected override render(): string {
    const subject =
      this.paramName === undefined
        ? `'${this.date}'`
        : `Parameter \`${this.paramName}\` takes a session although received input that parsed to '${this.date}' which`;

    switch (this.case) {
      case 'earlier-than-first':
        return `${subject} is earlier than the first session of calendar '${this.calendar}' ('${this.firstSession}').`;
      case 'later-than-last':
        return `${subject} is later than the last session of calendar '${this.calendar}' ('${this.lastSession}').`;
      case 'not-a-session':
        return `${subject} is not a session of calendar '${this.calendar}'.`;
    }
  }
}

/**
 * Where an instant that belongs to no session lies.
 */
export type RangeGapPosition = 'gap' | 'before-first' | 'after-last';

/**
 * Thrown when an instant falls outside every session's `[open, close)` window.
 */
export class RangeGapError extends CalendarError {
  readonly calendar: string;
  readonly instant: Date;
  readonly position: RangeGapPosition;

  constructor(data: {
    calendar: string;
    instant: Date;
    position: RangeGapPosition;
    previousClose?: Date;
    nextOpen?: Date;
  }) {
    super('RANGE_GAP', {
      calendar: data.calendar,
      instant: data.instant.toISOString(),
      position: data.position,
      previousClose: data.previousClose?.toISOString(),
      nextOpen: data.nextOpen?.toISOString(),
    });
    this.name = 'RangeGapError';
    this.calendar = data.calendar;
    this.instant = new Date(data.instant.getTime());
    this.position = data.position;
  }

  protected override render(): string {
    const at = `'${this.instant.toISOString()}'`;
    switch (this.position) {
      case 'before-first':
        return `${at} is earlier than the first open of calendar '${this.calendar}'.`;
      case 'after-last':
        return `${at} is at or after the last close of calendar '${this.calendar}'.`;
      case 'gap': {
        const previous = this.data['previousClose'];
        const next = this.data['nextOpen'];
        return `${at} falls between sessions of calendar '${this.calendar}' (closed ${String(previous)}, next open ${String(next)}).`;
      }
    }
  }
}

/**
 * Type guard to check if an error is a CalendarError.
 *
 * @example
 * ```typescript
 * catch (err) {
 *   if (isCalendarError(err)) {
 *     logger.warn('Calendar query failed', { error_code: err.code });
 *   }
 * }
 * ```
 */
export function isCalendarError(error: unknown): error is CalendarError {
  return error instanceof CalendarError;
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

export function isConstructionError(error: unknown): error is ConstructionError {
  return error instanceof ConstructionError;
}

export function isCyclicAliasError(error: unknown): error is CyclicAliasError {
  return error instanceof CyclicAliasError;
}

export function isNotASessionError(error: unknown): error is NotASessionError {
  return error instanceof NotASessionError;
}

export function isRangeGapError(error: unknown): error is RangeGapError {
  return error instanceof RangeGapError;
}
