/**
 * Registry construction from settings
 */

import { createLogger } from '@xcal/logger';
import type { Logger } from '@xcal/logger';
import { CalendarRegistry } from './registry.js';
import { loadSettings } from './settings.js';
import type { Settings } from './settings.js';

/**
 * Creates a registry whose logger and default range come from settings.
 *
 * @example
 * ```typescript
 * const registry = createCalendarRegistry();            // from process.env
 * const quiet = createCalendarRegistry(settings, logger); // explicit
 * ```
 */
export function createCalendarRegistry(settings: Settings = loadSettings(), logger?: Logger): CalendarRegistry {
  return new CalendarRegistry({
    logger: logger ?? createLogger({ level: settings.logLevel, json: settings.logFormat === 'json' }),
    defaultRange: settings.defaultRange,
  });
}
