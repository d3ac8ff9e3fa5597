/**
 * Alias graph walking
 */

import { CyclicAliasError, UnknownNameError } from '@xcal/contracts';
import type { CalendarName } from './types.js';

/**
 * Follows alias edges from a name until it reaches a canonical name.
 *
 * @param name - Name to resolve
 * @param isCanonical - True for names registered as calendars
 * @param edges - Alias to target edges
 * @returns The canonical name
 * @throws {CyclicAliasError} when the walk revisits a name
 * @throws {UnknownNameError} when the walk ends at a name nobody registered
 *
 * @example
 * ```typescript
 * const edges = new Map([['TWSE', 'XTAI']]);
 * resolveAliasChain('TWSE', (n) => n === 'XTAI', edges); // → 'XTAI'
 * ```
 */
export function resolveAliasChain(
  name: CalendarName,
  isCanonical: (name: CalendarName) => boolean,
  edges: ReadonlyMap<CalendarName, CalendarName>
): CalendarName {
  const path: CalendarName[] = [];
  const visited = new Set<CalendarName>();
  let current = name;

  while (!isCanonical(current)) {
    if (visited.has(current)) {
      throw new CyclicAliasError({ cycle: [...path.slice(path.indexOf(current)), current] });
    }

    const target = edges.get(current);
    if (target === undefined) {
      throw new UnknownNameError({ name: current, via: path[path.length - 1] });
    }

    visited.add(current);
    path.push(current);
    current = target;
  }

  return current;
}
