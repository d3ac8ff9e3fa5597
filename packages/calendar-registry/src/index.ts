/**
 * @xcal/calendar-registry
 *
 * Named calendars, aliases and memoised session index builds
 */

// Registry
export { CalendarRegistry } from './registry.js';
export { createCalendarRegistry } from './create.js';

// Alias graph
export { resolveAliasChain } from './aliases.js';

// Settings
export { settingsSchema, loadSettings, DEFAULT_RANGE } from './settings.js';
export type { Settings } from './settings.js';

// Types
export type {
  CalendarName,
  CalendarFactory,
  CalendarSource,
  RegisterOptions,
  CalendarRegistryOptions,
  CachedBuild,
  CalendarEntry,
} from './types.js';
