/**
 * @xcal/exchanges
 *
 * Built-in exchange calendars (XTAI, us_futures)
 */

export {
  builtinAliases,
  builtinCalendarNames,
  clearDefinitionCache,
  loadExchangeDefinition,
} from './definitions.js';
export { registerBuiltinCalendars } from './register.js';
