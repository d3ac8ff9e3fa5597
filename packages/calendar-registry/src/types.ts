/**
 * Core types for the calendar registry
 */

import type { DateRange } from '@xcal/contracts';
import type { CalendarConfig, CalendarConfigInput, SessionIndex, ZoneResolver } from '@xcal/exchange-calendar';
import type { Logger } from '@xcal/logger';

/**
 * Canonical calendar name or alias
 * Examples: "XTAI", "TWSE", "us_futures"
 */
export type CalendarName = string;

/**
 * Produces a calendar configuration on first use
 */
export type CalendarFactory = () => CalendarConfigInput | CalendarConfig;

/**
 * What gets registered under a canonical name
 */
export type CalendarSource = CalendarConfigInput | CalendarFactory;

export interface RegisterOptions {
  /** Overwrite an existing calendar or alias of the same name */
  replace?: boolean;
}

export interface CalendarRegistryOptions {
  /** Parent logger; a silent one is used when omitted */
  logger?: Logger;

  /** Range built when `get` is called without dates */
  defaultRange?: DateRange;

  zoneResolver?: ZoneResolver;
}

/**
 * Cached build for one date range of one calendar
 */
export interface CachedBuild {
  range: DateRange;
  promise: Promise<SessionIndex>;

  /** Set once the build has succeeded */
  settled: boolean;
}

/**
 * Registry entry for a canonical name
 */
export interface CalendarEntry {
  source: CalendarSource;

  /** Validated configuration, filled in on first build */
  config?: CalendarConfig;

  /** Builds keyed by `start..end` */
  builds: Map<string, CachedBuild>;
}
