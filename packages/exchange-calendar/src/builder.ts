/**
 * @fileoverview Builds a {@link SessionIndex} from a calendar configuration.
 *
 * 1. Validate the configuration
 * 2. Evaluate holiday rules over the range
 * 3. Walk every date; keep trading weekdays that are not holidays
 * 4. Resolve open/close in the calendar's zone, applying special hours
 * 5. Check the index invariants
 */

import { ConstructionError } from '@xcal/contracts';
import type { DateInput, DateKey, Session, Weekday } from '@xcal/contracts';
import { addDays, fromDayNumber, normalizeDate, toDayNumber, weekdayOfDay } from './dates.js';
import { collectHolidays } from './holidays.js';
import type { RuleContext } from './holidays.js';
import { parseCalendarConfig, tradingWeekdays } from './schema.js';
import type { CalendarConfig, CalendarConfigInput, HoursPeriod, SpecialHours } from './schema.js';
import { SessionIndex } from './session-index.js';
import { defaultZoneResolver } from './zones.js';
import type { ZoneResolver } from './zones.js';

export interface BuildOptions {
  zoneResolver?: ZoneResolver;
}

export function ruleContextFor(config: CalendarConfig): RuleContext {
  return {
    tradingWeekdays: tradingWeekdays(config),
    tieBreak: config.nearestWorkdayTieBreak,
    anchorTables: config.anchorTables,
  };
}

function hoursFor(periods: readonly HoursPeriod[], date: DateKey): HoursPeriod | undefined {
  return periods.find(
    (period) =>
      (period.from === undefined || date >= period.from) && (period.until === undefined || date <= period.until)
  );
}

/**
 * Builds the session index of a calendar over an inclusive date range.
 *
 * @throws {ConstructionError} when the configuration is invalid, the range is
 * empty or inverted, a trading day has no hours, special hours fall on a
 * closed day, or the resulting sessions break the index invariants
 *
 * @example
 * ```typescript
 * const index = buildSessionIndex(
 *   {
 *     name: 'TEST',
 *     timezone: 'UTC',
 *     hours: [{ open: '09:00', close: '17:00' }],
 *     holidays: [{ type: 'recurring', name: 'New Year', anchor: { kind: 'fixed', month: 1, day: 1 } }],
 *   },
 *   '2024-01-01',
 *   '2024-01-31'
 * );
 * index.firstSession.date; // '2024-01-02'
 * ```
 */
export function buildSessionIndex(
  input: CalendarConfigInput | CalendarConfig,
  start: DateInput,
  end: DateInput,
  options: BuildOptions = {}
): SessionIndex {
  const config = parseCalendarConfig(input);
  const calendar = config.name;
  const resolver = options.zoneResolver ?? defaultZoneResolver;

  const range = { start: normalizeDate(start), end: normalizeDate(end) };
  if (range.start > range.end) {
    throw new ConstructionError(`start ${range.start} is after end ${range.end}`, { calendar });
  }
  if (!resolver.isValidZone(config.timezone)) {
    throw new ConstructionError(`unknown time zone '${config.timezone}'`, { calendar });
  }

  const ctx = ruleContextFor(config);
  const holidays = collectHolidays(config.holidays, range, ctx);
  const specials = collectSpecialHours(config, range, holidays, ctx.tradingWeekdays);

  const sessions: Session[] = [];
  const closedWeekdays: DateKey[] = [];
  const lastDay = toDayNumber(range.end);

  for (let day = toDayNumber(range.start); day <= lastDay; day++) {
    if (!ctx.tradingWeekdays.has(weekdayOfDay(day))) {
      continue;
    }
    const date = fromDayNumber(day);
    if (holidays.has(date)) {
      closedWeekdays.push(date);
      continue;
    }

    const period = hoursFor(config.hours, date);
    if (!period) {
      throw new ConstructionError('no trading hours configured for date', { calendar, date });
    }
    const special = specials.get(date);

    const open = resolver.toInstant(addDays(date, config.openDayOffset), special?.open ?? period.open, config.timezone);
    const close = resolver.toInstant(
      addDays(date, config.closeDayOffset),
      special?.close ?? period.close,
      config.timezone
    );

    sessions.push(Object.freeze({ date, open, close, isSpecial: special !== undefined }));
  }

  assertSessionInvariants(calendar, sessions);

  return new SessionIndex({
    calendar,
    timezone: config.timezone,
    range,
    sessions,
    holidays: closedWeekdays,
    executionOffsets: config.executionOffsets,
  });
}

function collectSpecialHours(
  config: CalendarConfig,
  range: { start: DateKey; end: DateKey },
  holidays: ReadonlyMap<DateKey, string[]>,
  weekdays: ReadonlySet<Weekday>
): Map<DateKey, SpecialHours> {
  const specials = new Map<DateKey, SpecialHours>();
  for (const special of config.specialHours) {
    if (special.date < range.start || special.date > range.end) {
      continue;
    }
    if (!weekdays.has(weekdayOfDay(toDayNumber(special.date)))) {
      throw new ConstructionError('special hours fall on a non-trading weekday', {
        calendar: config.name,
        date: special.date,
      });
    }
    const names = holidays.get(special.date);
    if (names) {
      throw new ConstructionError(`special hours fall on a holiday (${names.join(', ')})`, {
        calendar: config.name,
        date: special.date,
      });
    }
    specials.set(special.date, special);
  }
  return specials;
}

function assertSessionInvariants(calendar: string, sessions: readonly Session[]): void {
  let previous: Session | undefined;
  for (const session of sessions) {
    if (session.open.getTime() >= session.close.getTime()) {
      throw new ConstructionError('session opens at or after its close', {
        calendar,
        date: session.date,
        open: session.open.toISOString(),
        close: session.close.toISOString(),
      });
    }
    if (previous && previous.close.getTime() > session.open.getTime()) {
      throw new ConstructionError(`session overlaps the session of ${previous.date}`, {
        calendar,
        date: session.date,
      });
    }
    previous = session;
  }
}
