/**
 * Registration of the built-in calendars on a registry
 */

import type { CalendarRegistry, RegisterOptions } from '@xcal/calendar-registry';
import { builtinAliases, builtinCalendarNames, loadExchangeDefinition } from './definitions.js';

/**
 * Registers every built-in calendar and its aliases. Each calendar is
 * registered as a factory; its data file is read on first use.
 *
 * @param registry - Registry to populate
 * @param options - Passed to `register` and `alias`
 * @returns Names registered (canonical names, then aliases)
 *
 * @example
 * ```typescript
 * const registry = new CalendarRegistry({ logger });
 * registerBuiltinCalendars(registry);
 * const index = await registry.get('TWSE', '2024-01-01', '2024-12-31');
 * ```
 */
export function registerBuiltinCalendars(registry: CalendarRegistry, options: RegisterOptions = {}): string[] {
  const registered: string[] = [];
  const aliases: Array<[string, string]> = [];

  for (const name of builtinCalendarNames) {
    registry.register(name, () => loadExchangeDefinition(name), options);
    registered.push(name);
    for (const alias of builtinAliases(name)) {
      aliases.push([alias, name]);
    }
  }

  for (const [alias, target] of aliases) {
    registry.alias(alias, target, options);
    registered.push(alias);
  }

  return registered;
}
