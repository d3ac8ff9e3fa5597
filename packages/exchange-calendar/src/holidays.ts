/**
 * @fileoverview Holiday rule evaluation.
 *
 * Recurring rules are evaluated one year either side of the requested range
 * so that observances which move a date across a year boundary (a Saturday
 * January 1st observed on the Friday before) are still found.
 */

import type { DateKey, DateRange } from '@xcal/contracts';
import { dayNumberOf, daysInMonth, easterSunday, fromDayNumber, nthWeekdayOfMonth, toDayNumber, yearOf } from './dates.js';
import { applyObservance } from './observance.js';
import type { ObservanceContext } from './observance.js';
import type { HolidayAnchor, HolidayRule } from './schema.js';

export interface RuleContext extends ObservanceContext {
  anchorTables: Readonly<Record<string, readonly DateKey[]>>;
}

/**
 * Anchor dates of a rule for every year in `[fromYear, toYear]`.
 */
export function anchorDates(
  anchor: HolidayAnchor,
  fromYear: number,
  toYear: number,
  ctx: RuleContext
): DateKey[] {
  if (anchor.kind === 'table') {
    const table = ctx.anchorTables[anchor.table] ?? [];
    return table.filter((date) => {
      const year = yearOf(date);
      return year >= fromYear && year <= toYear;
    });
  }

  const dates: DateKey[] = [];
  for (let year = fromYear; year <= toYear; year++) {
    switch (anchor.kind) {
      case 'fixed':
        // Feb 29 only exists in leap years
        if (anchor.day <= daysInMonth(year, anchor.month)) {
          dates.push(fromDayNumber(dayNumberOf(year, anchor.month, anchor.day)));
        }
        break;
      case 'nth-weekday': {
        const date = nthWeekdayOfMonth(year, anchor.month, anchor.weekday, anchor.nth);
        if (date !== null) {
          dates.push(date);
        }
        break;
      }
      case 'easter':
        dates.push(fromDayNumber(toDayNumber(easterSunday(year)) + anchor.offset));
        break;
    }
  }
  return dates;
}

/**
 * Observed dates a rule produces inside a range.
 *
 * `validFrom`/`validUntil` bound the anchor date, not the observed date.
 */
export function evaluateRule(rule: HolidayRule, range: DateRange, ctx: RuleContext): DateKey[] {
  const inRange = (date: DateKey): boolean => date >= range.start && date <= range.end;

  if (rule.type === 'adhoc') {
    return [...new Set(rule.dates.filter(inRange))].sort();
  }

  const anchors = anchorDates(rule.anchor, yearOf(range.start) - 1, yearOf(range.end) + 1, ctx).filter(
    (date) =>
      (rule.validFrom === undefined || date >= rule.validFrom) &&
      (rule.validUntil === undefined || date <= rule.validUntil)
  );

  const observed = anchors.flatMap((anchor) => applyObservance(anchor, rule.observance, ctx));
  return [...new Set(observed.filter(inRange))].sort();
}

/**
 * Union of every rule's observed dates, mapped to the names of the rules that
 * produced them.
 *
 * @example
 * ```typescript
 * const holidays = collectHolidays(config.holidays, { start: '2024-01-01', end: '2024-12-31' }, ctx);
 * holidays.get('2024-01-01'); // ['New Year']
 * ```
 */
export function collectHolidays(
  rules: readonly HolidayRule[],
  range: DateRange,
  ctx: RuleContext
): Map<DateKey, string[]> {
  const holidays = new Map<DateKey, string[]>();
  for (const rule of rules) {
    for (const date of evaluateRule(rule, range, ctx)) {
      const names = holidays.get(date);
      if (names) {
        names.push(rule.name);
      } else {
        holidays.set(date, [rule.name]);
      }
    }
  }
  return holidays;
}
