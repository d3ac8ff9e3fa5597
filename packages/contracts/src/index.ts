/**
 * @fileoverview Main entry point for @xcal/contracts package.
 *
 * Exports the calendar data types and the error taxonomy shared by the
 * calendar engine and the registry.
 *
 * @module @xcal/contracts
 */

// Calendar types
export { WEEKDAYS } from './calendar.js';
export type {
  DateKey,
  DateInput,
  LocalTime,
  Weekday,
  Session,
  DateRange,
  SessionLookup,
  GapDirection,
} from './calendar.js';

// Error classes and guards
export {
  CalendarError,
  ConfigurationError,
  NameCollisionError,
  UnknownNameError,
  CyclicAliasError,
  ConstructionError,
  NotASessionError,
  RangeGapError,
  isCalendarError,
  isConfigurationError,
  isConstructionError,
  isCyclicAliasError,
  isNotASessionError,
  isRangeGapError,
} from './errors.js';
export type { NotASessionCase, RangeGapPosition } from './errors.js';
