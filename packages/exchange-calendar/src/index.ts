/**
 * @fileoverview Public API exports for @xcal/exchange-calendar
 * Session engine: holiday rules, observances and session indexes
 */

// Builder
export { buildSessionIndex, ruleContextFor } from './builder.js';
export type { BuildOptions } from './builder.js';

// Indexes
export { SessionIndex } from './session-index.js';
export type { SessionIndexInit } from './session-index.js';
export { MinuteIndex } from './minute-index.js';

// Rules
export { anchorDates, evaluateRule, collectHolidays } from './holidays.js';
export type { RuleContext } from './holidays.js';
export { applyStage, applyObservance, describeObservance } from './observance.js';
export type { ObservanceContext, TieBreak } from './observance.js';

// Configuration
export {
  calendarConfigSchema,
  holidayRuleSchema,
  observanceStageSchema,
  anchorSchema,
  dateKeySchema,
  localTimeSchema,
  parseCalendarConfig,
  tradingWeekdays,
} from './schema.js';
export type {
  CalendarConfig,
  CalendarConfigInput,
  ObservanceStage,
  HolidayAnchor,
  HolidayRule,
  RecurringHoliday,
  AdHocHoliday,
  HoursPeriod,
  SpecialHours,
  ExecutionOffsets,
  YearGuard,
} from './schema.js';

// Dates and zones
export {
  isDateKey,
  normalizeDate,
  addDays,
  weekdayOf,
  easterSunday,
  nthWeekdayOfMonth,
} from './dates.js';
export { IntlZoneResolver, defaultZoneResolver, parseLocalTime } from './zones.js';
export type { ZoneResolver } from './zones.js';
