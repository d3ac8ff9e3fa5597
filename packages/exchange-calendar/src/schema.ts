/**
 * @fileoverview Calendar configuration schema.
 *
 * A calendar is plain data: zone, weekmask, holiday rules, trading hours and
 * overrides. The schema validates that data and fills in defaults; semantic
 * checks that need the date range (hours gaps, overrides on holidays) happen
 * in the builder.
 */

import { z } from 'zod';
import { ConstructionError, WEEKDAYS } from '@xcal/contracts';
import type { Weekday } from '@xcal/contracts';
import { daysInMonth, isDateKey } from './dates.js';

const DEFAULT_WEEKMASK: Weekday[] = ['monday', 'tuesday', 'wednesday', 'thursday', 'friday'];
const FIRST_DATE = '0000-01-01';
const LAST_DATE = '9999-12-31';

const weekdayValues = ['monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday'] as const;

export const weekdaySchema = z.enum(weekdayValues);

export const dateKeySchema = z
  .string()
  .refine(isDateKey, { message: 'Expected a valid date in YYYY-MM-DD form' });

export const localTimeSchema = z
  .string()
  .regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'Expected a time in HH:MM (24-hour) form');

const yearGuardSchema = z
  .object({
    from: z.number().int().optional(),
    until: z.number().int().optional(),
  })
  .strict()
  .refine((guard) => guard.from === undefined || guard.until === undefined || guard.from <= guard.until, {
    message: 'years.from must not be after years.until',
  });

// Observance stages

const nearestWorkdayStage = z
  .object({ kind: z.literal('nearest-workday'), years: yearGuardSchema.optional() })
  .strict();
const weekendMakeupStage = z
  .object({ kind: z.literal('weekend-makeup'), fromYear: z.number().int() })
  .strict();
const sundayToMondayStage = z
  .object({ kind: z.literal('sunday-to-monday'), years: yearGuardSchema.optional() })
  .strict();
const rollForwardStage = z
  .object({ kind: z.literal('roll-forward'), years: yearGuardSchema.optional() })
  .strict();
const rollBackwardStage = z
  .object({ kind: z.literal('roll-backward'), years: yearGuardSchema.optional() })
  .strict();
const shiftStage = z
  .object({ kind: z.literal('shift'), days: z.number().int(), years: yearGuardSchema.optional() })
  .strict();
const bridgeMondayStage = z
  .object({ kind: z.literal('bridge-monday'), years: yearGuardSchema.optional() })
  .strict();
const bridgeFridayStage = z
  .object({ kind: z.literal('bridge-friday'), years: yearGuardSchema.optional() })
  .strict();
const onlyWeekdaysStage = z
  .object({
    kind: z.literal('only-weekdays'),
    weekdays: z.array(weekdaySchema).min(1),
    years: yearGuardSchema.optional(),
  })
  .strict();

export const observanceStageSchema = z.discriminatedUnion('kind', [
  nearestWorkdayStage,
  weekendMakeupStage,
  sundayToMondayStage,
  rollForwardStage,
  rollBackwardStage,
  shiftStage,
  bridgeMondayStage,
  bridgeFridayStage,
  onlyWeekdaysStage,
]);

// Anchors

export const anchorSchema = z.discriminatedUnion('kind', [
  z
    .object({
      kind: z.literal('fixed'),
      month: z.number().int().min(1).max(12),
      day: z.number().int().min(1).max(31),
    })
    .strict(),
  z
    .object({
      kind: z.literal('nth-weekday'),
      month: z.number().int().min(1).max(12),
      weekday: weekdaySchema,
      nth: z.union([z.literal(-1), z.number().int().min(1).max(5)]),
    })
    .strict(),
  z
    .object({
      kind: z.literal('easter'),
      offset: z.number().int().default(0),
    })
    .strict(),
  z
    .object({
      kind: z.literal('table'),
      table: z.string().min(1),
    })
    .strict(),
]);

// Holiday rules

export const recurringHolidaySchema = z
  .object({
    type: z.literal('recurring'),
    name: z.string().min(1),
    anchor: anchorSchema,
    validFrom: dateKeySchema.optional(),
    validUntil: dateKeySchema.optional(),
    observance: z.array(observanceStageSchema).default([]),
  })
  .strict();

export const adHocHolidaySchema = z
  .object({
    type: z.literal('adhoc'),
    name: z.string().min(1),
    dates: z.array(dateKeySchema),
  })
  .strict();

export const holidayRuleSchema = z.discriminatedUnion('type', [recurringHolidaySchema, adHocHolidaySchema]);

// Hours

export const hoursPeriodSchema = z
  .object({
    from: dateKeySchema.optional(),
    until: dateKeySchema.optional(),
    open: localTimeSchema,
    close: localTimeSchema,
  })
  .strict();

export const specialHoursSchema = z
  .object({
    date: dateKeySchema,
    open: localTimeSchema.optional(),
    close: localTimeSchema.optional(),
    reason: z.string().optional(),
  })
  .strict()
  .refine((special) => special.open !== undefined || special.close !== undefined, {
    message: 'Special hours need an open or a close time',
  });

export const executionOffsetsSchema = z
  .object({
    openMinutes: z.number().int().default(0),
    closeMinutes: z.number().int().default(0),
  })
  .strict();

/**
 * Full calendar configuration.
 */
export const calendarConfigSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().optional(),
    timezone: z.string().min(1),
    weekmask: z.array(weekdaySchema).min(1).default(() => [...DEFAULT_WEEKMASK]),
    holidays: z.array(holidayRuleSchema).default([]),
    anchorTables: z.record(z.string(), z.array(dateKeySchema)).default({}),
    hours: z.array(hoursPeriodSchema).min(1),
    openDayOffset: z.number().int().min(-7).max(7).default(0),
    closeDayOffset: z.number().int().min(-7).max(7).default(0),
    specialHours: z.array(specialHoursSchema).default([]),
    nearestWorkdayTieBreak: z.enum(['earlier', 'later']).default('later'),
    executionOffsets: executionOffsetsSchema.optional(),
    aliases: z.array(z.string().min(1)).default([]),
  })
  .strict()
  .superRefine((config, ctx) => {
    // Hours periods must not overlap
    const periods = config.hours
      .map((period, index) => ({
        index,
        lo: period.from ?? FIRST_DATE,
        hi: period.until ?? LAST_DATE,
      }))
      .sort((a, b) => (a.lo < b.lo ? -1 : a.lo > b.lo ? 1 : 0));

    periods.forEach((period, position) => {
      if (period.lo > period.hi) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['hours', period.index],
          message: `Hours period starts after it ends (${period.lo} > ${period.hi})`,
        });
      }
      const previous = periods[position - 1];
      if (previous && period.lo <= previous.hi) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['hours', period.index],
          message: `Hours period overlaps hours[${previous.index}]`,
        });
      }
    });

    config.holidays.forEach((rule, index) => {
      if (rule.type !== 'recurring') {
        return;
      }
      const { anchor } = rule;
      if (anchor.kind === 'table' && config.anchorTables[anchor.table] === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['holidays', index, 'anchor', 'table'],
          message: `Unknown anchor table '${anchor.table}'`,
        });
      }
      // 2000 is a leap year, so Feb 29 passes here and is skipped in other years
      if (anchor.kind === 'fixed' && anchor.day > daysInMonth(2000, anchor.month)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['holidays', index, 'anchor', 'day'],
          message: `Month ${anchor.month} has no day ${anchor.day}`,
        });
      }
      if (rule.validFrom && rule.validUntil && rule.validFrom > rule.validUntil) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['holidays', index, 'validFrom'],
          message: 'validFrom must not be after validUntil',
        });
      }
    });

    const seen = new Set<string>();
    config.specialHours.forEach((special, index) => {
      if (seen.has(special.date)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['specialHours', index, 'date'],
          message: `Duplicate special hours for ${special.date}`,
        });
      }
      seen.add(special.date);
    });
  });

/** Configuration as written by callers (defaults optional) */
export type CalendarConfigInput = z.input<typeof calendarConfigSchema>;
/** Configuration after validation, with defaults filled in */
export type CalendarConfig = z.output<typeof calendarConfigSchema>;

export type ObservanceStage = z.output<typeof observanceStageSchema>;
export type HolidayAnchor = z.output<typeof anchorSchema>;
export type HolidayRule = z.output<typeof holidayRuleSchema>;
export type RecurringHoliday = z.output<typeof recurringHolidaySchema>;
export type AdHocHoliday = z.output<typeof adHocHolidaySchema>;
export type HoursPeriod = z.output<typeof hoursPeriodSchema>;
export type SpecialHours = z.output<typeof specialHoursSchema>;
export type ExecutionOffsets = z.output<typeof executionOffsetsSchema>;
export type YearGuard = z.output<typeof yearGuardSchema>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Validates a calendar configuration.
 *
 * @throws {ConstructionError} with one issue per schema violation
 *
 * @example
 * ```typescript
 * const config = parseCalendarConfig({
 *   name: 'TEST',
 *   timezone: 'UTC',
 *   hours: [{ open: '09:00', close: '17:00' }],
 * });
 * config.weekmask; // ['monday', ..., 'friday']
 * ```
 */
export function parseCalendarConfig(input: unknown): CalendarConfig {
  const result = calendarConfigSchema.safeParse(input);

  if (!result.success) {
    const name = isRecord(input) && typeof input['name'] === 'string' ? input['name'] : undefined;
    const issues = result.error.errors.map((err) => {
      const path = err.path.join('.');
      return path ? `${path}: ${err.message}` : err.message;
    });
    throw new ConstructionError('invalid configuration', { calendar: name, issues });
  }

  return result.data;
}

/**
 * Weekmask as a set, in ISO weekday order.
 */
export function tradingWeekdays(config: Pick<CalendarConfig, 'weekmask'>): ReadonlySet<Weekday> {
  return new Set(WEEKDAYS.filter((day) => config.weekmask.includes(day)));
}
