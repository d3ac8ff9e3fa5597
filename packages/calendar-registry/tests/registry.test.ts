/**
 * Tests for the calendar registry: names, aliases and cached builds
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  ConstructionError,
  CyclicAliasError,
  NameCollisionError,
  UnknownNameError,
  isCyclicAliasError,
} from '@xcal/contracts';
import { defaultZoneResolver } from '@xcal/exchange-calendar';
import type { CalendarConfigInput, ZoneResolver } from '@xcal/exchange-calendar';
import { createNullLogger } from '@xcal/logger';
import { CalendarRegistry } from '../src/registry.js';

const testCalendar: CalendarConfigInput = {
  name: 'TEST',
  timezone: 'UTC',
  hours: [{ open: '09:00', close: '17:00' }],
  holidays: [{ type: 'recurring', name: 'New Year', anchor: { kind: 'fixed', month: 1, day: 1 } }],
};

/**
 * Valid in January; an early close on a June closure breaks any build
 * that reaches June.
 */
const patchyCalendar: CalendarConfigInput = {
  ...testCalendar,
  name: 'PATCHY',
  holidays: [{ type: 'adhoc', name: 'Closure', dates: ['2024-06-14'] }],
  specialHours: [{ date: '2024-06-14', close: '12:00' }],
};

/**
 * Resolver that counts builds: every build checks the zone exactly once.
 */
function countingResolver() {
  const isValidZone = vi.fn((zone: string) => defaultZoneResolver.isValidZone(zone));
  const resolver: ZoneResolver = {
    isValidZone,
    toInstant: (date, time, zone) => defaultZoneResolver.toInstant(date, time, zone),
  };
  return { resolver, builds: () => isValidZone.mock.calls.length };
}

describe('CalendarRegistry', () => {
  let registry: CalendarRegistry;
  let builds: () => number;

  beforeEach(() => {
    const counting = countingResolver();
    builds = counting.builds;
    registry = new CalendarRegistry({
      logger: createNullLogger(),
      zoneResolver: counting.resolver,
      defaultRange: { start: '2024-01-01', end: '2024-01-31' },
    });
    registry.register('TEST', testCalendar);
  });

  // ===========================================================================
  // Names and aliases
  // ===========================================================================

  describe('resolve', () => {
    it('should return canonical names unchanged', () => {
      expect(registry.resolve('TEST')).toBe('TEST');
      expect(registry.resolve(registry.resolve('TEST'))).toBe('TEST');
    });

    it('should follow alias chains', () => {
      registry.alias('MAIN', 'TEST');
      registry.alias('PRIMARY', 'MAIN');

      expect(registry.resolve('PRIMARY')).toBe('TEST');
    });

    it('should report alias cycles with their path', () => {
      registry.alias('A', 'B');
      registry.alias('B', 'A');

      expect(() => registry.resolve('A')).toThrow(CyclicAliasError);
      try {
        registry.resolve('A');
      } catch (err) {
        expect(isCyclicAliasError(err) && err.cycle).toEqual(['A', 'B', 'A']);
        expect(err instanceof Error && err.message).toBe('Cycle in calendar aliases: [A -> B -> A]');
      }
    });

    it('should report a self-referencing alias', () => {
      registry.alias('LOOP', 'LOOP');

      expect(() => registry.resolve('LOOP')).toThrow('Cycle in calendar aliases: [LOOP -> LOOP]');
    });

    it('should report unknown names', () => {
      expect(() => registry.resolve('NOPE')).toThrow(UnknownNameError);
      expect(() => registry.resolve('NOPE')).toThrow('The requested calendar, NOPE, does not exist.');
    });

    it('should name the alias behind a dangling target', () => {
      registry.alias('TWSE', 'XTAI');

      expect(() => registry.resolve('TWSE')).toThrow(
        'The requested calendar, XTAI, does not exist. (referenced by alias TWSE)'
      );
    });
  });

  describe('register and alias', () => {
    it('should reject a second calendar under the same name', () => {
      expect(() => registry.register('TEST', testCalendar)).toThrow(NameCollisionError);
      expect(() => registry.register('TEST', testCalendar)).toThrow(
        'A calendar with the name TEST is already registered.'
      );
    });

    it('should reject an alias over a calendar name', () => {
      expect(() => registry.alias('TEST', 'OTHER')).toThrow(NameCollisionError);
    });

    it('should reject a calendar over an alias name', () => {
      registry.alias('MAIN', 'TEST');

      expect(() => registry.register('MAIN', testCalendar)).toThrow(
        'The name MAIN is already registered as a calendar alias.'
      );
    });

    it('should use the new configuration after a replace', async () => {
      const before = await registry.get('TEST');
      registry.register('TEST', { ...testCalendar, hours: [{ open: '10:00', close: '16:00' }] }, { replace: true });
      const after = await registry.get('TEST');

      expect(before.firstSession.open.toISOString()).toBe('2024-01-02T09:00:00.000Z');
      expect(after.firstSession.open.toISOString()).toBe('2024-01-02T10:00:00.000Z');
      expect(builds()).toBe(2);
    });

    it('should turn an alias into a calendar on replace', () => {
      registry.alias('MAIN', 'TEST');
      registry.register('MAIN', { ...testCalendar, name: 'MAIN' }, { replace: true });

      expect(registry.aliases()).toEqual({});
      expect(registry.names()).toEqual(['MAIN', 'TEST']);
      expect(registry.resolve('MAIN')).toBe('MAIN');
    });

    it('should report what is registered', () => {
      registry.alias('MAIN', 'TEST');

      expect(registry.has('TEST')).toBe(true);
      expect(registry.has('MAIN')).toBe(true);
      expect(registry.has('NOPE')).toBe(false);
      expect(registry.names()).toEqual(['TEST']);
      expect(registry.aliases()).toEqual({ MAIN: 'TEST' });
    });

    it('should deregister calendars and aliases', () => {
      registry.alias('MAIN', 'TEST');

      expect(registry.deregister('MAIN')).toBe(true);
      expect(registry.deregister('TEST')).toBe(true);
      expect(registry.deregister('TEST')).toBe(false);
      expect(registry.names()).toEqual([]);
    });

    it('should forget everything on reset', () => {
      registry.alias('MAIN', 'TEST');
      registry.reset();

      expect(registry.names()).toEqual([]);
      expect(registry.aliases()).toEqual({});
    });
  });

  describe('getConfig', () => {
    it('should run factories once, on first use', () => {
      const factory = vi.fn(() => ({ ...testCalendar, name: 'LAZY' }));
      registry.register('LAZY', factory);

      expect(factory).not.toHaveBeenCalled();
      expect(registry.getConfig('LAZY').name).toBe('LAZY');
      expect(registry.getConfig('LAZY').weekmask).toEqual(['monday', 'tuesday', 'wednesday', 'thursday', 'friday']);
      expect(factory).toHaveBeenCalledTimes(1);
    });

    it('should surface invalid configurations', () => {
      registry.register('BROKEN', () => ({ name: 'BROKEN', timezone: 'UTC', hours: [] }));

      expect(() => registry.getConfig('BROKEN')).toThrow(ConstructionError);
    });
  });

  // ===========================================================================
  // Cached builds
  // ===========================================================================

  describe('get', () => {
    it('should build the default range', async () => {
      const index = await registry.get('TEST');

      expect(index.range).toEqual({ start: '2024-01-01', end: '2024-01-31' });
      expect(index.size).toBe(22);
    });

    it('should resolve aliases before building', async () => {
      registry.alias('MAIN', 'TEST');

      const index = await registry.get('MAIN', '2024-01-02', '2024-01-05');

      expect(index.calendar).toBe('TEST');
      expect(index.size).toBe(4);
    });

    it('should build once for concurrent requests', async () => {
      const [first, second, third] = await Promise.all([
        registry.get('TEST', '2024-01-01', '2024-01-31'),
        registry.get('TEST', '2024-01-01', '2024-01-31'),
        registry.get('TEST', '2024-01-01', '2024-01-31'),
      ]);

      expect(builds()).toBe(1);
      expect(second).toBe(first);
      expect(third).toBe(first);
    });

    it('should serve sub-ranges from a wider cached index', async () => {
      await registry.get('TEST', '2024-01-01', '2024-01-31');
      const week = await registry.get('TEST', '2024-01-08', '2024-01-12');

      expect(builds()).toBe(1);
      expect(week.range).toEqual({ start: '2024-01-08', end: '2024-01-12' });
      expect(week.size).toBe(5);
    });

    it('should share an in-flight wider build with sub-range requests', async () => {
      const [month, week] = await Promise.all([
        registry.get('TEST', '2024-01-01', '2024-01-31'),
        registry.get('TEST', '2024-01-08', '2024-01-12'),
      ]);

      expect(builds()).toBe(1);
      expect(week.firstSession).toEqual(month.sessionFor('2024-01-08'));
    });

    it('should replace narrower cached ranges with a wider build', async () => {
      const narrow = await registry.get('TEST', '2024-01-08', '2024-01-12');
      await registry.get('TEST', '2024-01-01', '2024-01-31');
      const again = await registry.get('TEST', '2024-01-08', '2024-01-12');

      expect(builds()).toBe(2);
      expect(again).not.toBe(narrow);
      expect(again.size).toBe(5);
    });

    it('should keep cached ranges when a wider build fails', async () => {
      registry.register('PATCHY', patchyCalendar);
      const january = await registry.get('PATCHY', '2024-01-01', '2024-01-31');

      const year = registry.get('PATCHY', '2024-01-01', '2024-12-31');
      const again = registry.get('PATCHY', '2024-01-01', '2024-01-31');

      await expect(year).rejects.toThrow('special hours fall on a holiday (Closure)');
      await expect(again).resolves.toBe(january);
      await expect(registry.get('PATCHY', '2024-01-01', '2024-01-31')).resolves.toBe(january);
      expect(builds()).toBe(2);
    });

    it('should build a sub-range alone when the wider build it waited on fails', async () => {
      registry.register('PATCHY', patchyCalendar);

      const year = registry.get('PATCHY', '2024-01-01', '2024-12-31');
      const week = registry.get('PATCHY', '2024-01-08', '2024-01-12');

      await expect(year).rejects.toThrow(ConstructionError);
      expect((await week).size).toBe(5);
      expect(builds()).toBe(2);
    });

    it('should not cache failed builds', async () => {
      await expect(registry.get('TEST', '2024-01-06', '2024-01-07')).rejects.toThrow(ConstructionError);
      await expect(registry.get('TEST', '2024-01-06', '2024-01-07')).rejects.toThrow(
        'date range contains no sessions'
      );

      expect(builds()).toBe(2);
    });

    it('should reject unknown names', async () => {
      await expect(registry.get('NOPE')).rejects.toThrow(UnknownNameError);
    });

    it('should rebuild after clearCache', async () => {
      await registry.get('TEST');
      registry.clearCache('TEST');
      await registry.get('TEST');
      registry.clearCache();
      await registry.get('TEST');

      expect(builds()).toBe(3);
    });
  });
});
