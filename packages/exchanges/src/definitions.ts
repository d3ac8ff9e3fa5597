/**
 * Built-in exchange definitions, stored as JSON under data/
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { UnknownNameError } from '@xcal/contracts';
import { parseCalendarConfig } from '@xcal/exchange-calendar';
import type { CalendarConfig } from '@xcal/exchange-calendar';

interface BuiltinDefinition {
  file: string;

  /** Same as the `aliases` of the data file, kept here so registering reads no file */
  aliases: readonly string[];
}

const DEFINITIONS: Readonly<Record<string, BuiltinDefinition>> = {
  XTAI: { file: 'xtai.json', aliases: ['TWSE'] },
  us_futures: { file: 'us_futures.json', aliases: [] },
};

const dataDir = join(dirname(fileURLToPath(import.meta.url)), '..', 'data');

const cache = new Map<string, CalendarConfig>();

/**
 * Names of the calendars shipped with this package, sorted
 */
export const builtinCalendarNames: readonly string[] = Object.freeze(Object.keys(DEFINITIONS).sort());

/**
 * Aliases of a built-in calendar, without loading its definition
 *
 * @throws {UnknownNameError} for names that are not built in
 */
export function builtinAliases(name: string): readonly string[] {
  return definitionOf(name).aliases;
}

/**
 * Load and validate a built-in calendar definition
 *
 * @param name - Built-in calendar name (e.g. 'XTAI')
 * @returns Validated configuration
 * @throws {UnknownNameError} for names that are not built in
 * @throws {ConstructionError} if the data file fails validation
 *
 * @example
 * ```typescript
 * const xtai = loadExchangeDefinition('XTAI');
 * xtai.timezone; // 'Asia/Taipei'
 * xtai.aliases;  // ['TWSE']
 * ```
 */
export function loadExchangeDefinition(name: string): CalendarConfig {
  const cached = cache.get(name);
  if (cached) {
    return cached;
  }

  const { file } = definitionOf(name);
  const raw: unknown = JSON.parse(readFileSync(join(dataDir, file), 'utf-8'));
  const config = parseCalendarConfig(raw);
  cache.set(name, config);
  return config;
}

/**
 * Forget loaded definitions. Mainly for tests.
 */
export function clearDefinitionCache(): void {
  cache.clear();
}

function definitionOf(name: string): BuiltinDefinition {
  const definition = DEFINITIONS[name];
  if (definition === undefined) {
    throw new UnknownNameError({ name });
  }
  return definition;
}
