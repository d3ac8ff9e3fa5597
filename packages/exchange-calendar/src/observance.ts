/**
 * @fileoverview Observance pipelines.
 *
 * An anchor date runs through its stages left to right. Each stage maps one
 * date to zero dates (dropped), one date (moved or kept) or two dates (kept
 * plus a bridge day). Every stage may carry a year guard; outside the guard
 * the date passes through unchanged.
 */

import type { DateKey, Weekday } from '@xcal/contracts';
import { fromDayNumber, toDayNumber, weekdayOfDay, yearOf } from './dates.js';
import type { ObservanceStage, YearGuard } from './schema.js';

export type TieBreak = 'earlier' | 'later';

export interface ObservanceContext {
  tradingWeekdays: ReadonlySet<Weekday>;
  tieBreak: TieBreak;
}

function inGuard(guard: YearGuard | undefined, year: number): boolean {
  if (!guard) {
    return true;
  }
  if (guard.from !== undefined && year < guard.from) {
    return false;
  }
  return guard.until === undefined || year <= guard.until;
}

function isTradingDay(day: number, ctx: ObservanceContext): boolean {
  return ctx.tradingWeekdays.has(weekdayOfDay(day));
}

function seek(day: number, step: 1 | -1, ctx: ObservanceContext): number {
  let candidate = day + step;
  for (let i = 0; i < 7 && !isTradingDay(candidate, ctx); i++) {
    candidate += step;
  }
  return candidate;
}

function nearestWorkday(day: number, ctx: ObservanceContext): number {
  if (isTradingDay(day, ctx)) {
    return day;
  }
  for (let distance = 1; distance <= 7; distance++) {
    const before = isTradingDay(day - distance, ctx);
    const after = isTradingDay(day + distance, ctx);
    if (before && after) {
      return ctx.tieBreak === 'earlier' ? day - distance : day + distance;
    }
    if (before) {
      return day - distance;
    }
    if (after) {
      return day + distance;
    }
  }
  return day;
}

/**
 * Applies a single stage to a date.
 */
export function applyStage(stage: ObservanceStage, date: DateKey, ctx: ObservanceContext): DateKey[] {
  const day = toDayNumber(date);
  const weekday = weekdayOfDay(day);
  const year = yearOf(date);

  switch (stage.kind) {
    case 'weekend-makeup':
      return [year < stage.fromYear ? date : fromDayNumber(nearestWorkday(day, ctx))];

    case 'bridge-monday':
    case 'bridge-friday': {
      // Tuesday holidays also close Monday, Thursday holidays also close Friday
      const [holidayWeekday, offset]: [Weekday, number] =
        stage.kind === 'bridge-monday' ? ['tuesday', -1] : ['thursday', 1];
      if (weekday !== holidayWeekday) {
        return [date];
      }
      const bridge = fromDayNumber(day + offset);
      if (!inGuard(stage.years, yearOf(bridge))) {
        return [date];
      }
      return offset < 0 ? [bridge, date] : [date, bridge];
    }

    default:
      break;
  }

  if (!inGuard(stage.years, year)) {
    return [date];
  }

  switch (stage.kind) {
    case 'nearest-workday':
      return [fromDayNumber(nearestWorkday(day, ctx))];

    case 'sunday-to-monday':
      return [weekday === 'sunday' ? fromDayNumber(day + 1) : date];

    case 'roll-forward':
      return [isTradingDay(day, ctx) ? date : fromDayNumber(seek(day, 1, ctx))];

    case 'roll-backward':
      return [isTradingDay(day, ctx) ? date : fromDayNumber(seek(day, -1, ctx))];

    case 'shift':
      return [fromDayNumber(day + stage.days)];

    case 'only-weekdays':
      return stage.weekdays.includes(weekday) ? [date] : [];
  }
}

/**
 * Runs an anchor through a pipeline. Output is sorted and de-duplicated.
 *
 * @example
 * ```typescript
 * // Tuesday 2019-01-01 with a Monday bridge
 * applyObservance('2019-01-01', [{ kind: 'bridge-monday' }], ctx);
 * // ['2018-12-31', '2019-01-01']
 * ```
 */
export function applyObservance(
  anchor: DateKey,
  stages: readonly ObservanceStage[],
  ctx: ObservanceContext
): DateKey[] {
  let dates: DateKey[] = [anchor];
  for (const stage of stages) {
    dates = dates.flatMap((date) => applyStage(stage, date, ctx));
  }
  return [...new Set(dates)].sort();
}

/**
 * Short, readable form of a pipeline, e.g. `weekend-makeup(2014+) > bridge-monday(2014-2023)`.
 */
export function describeObservance(stages: readonly ObservanceStage[]): string {
  if (stages.length === 0) {
    return 'as-is';
  }
  return stages
    .map((stage) => {
      switch (stage.kind) {
        case 'weekend-makeup':
          return `weekend-makeup(${stage.fromYear}+)`;
        case 'shift':
          return `shift(${stage.days >= 0 ? '+' : ''}${stage.days})${describeGuard(stage.years)}`;
        case 'only-weekdays':
          return `only-weekdays(${stage.weekdays.join(',')})${describeGuard(stage.years)}`;
        default:
          return `${stage.kind}${describeGuard(stage.years)}`;
      }
    })
    .join(' > ');
}

function describeGuard(guard: YearGuard | undefined): string {
  if (!guard || (guard.from === undefined && guard.until === undefined)) {
    return '';
  }
  if (guard.until === undefined) {
    return `(${guard.from}+)`;
  }
  if (guard.from === undefined) {
    return `(-${guard.until})`;
  }
  return `(${guard.from}-${guard.until})`;
}
