/**
 * @fileoverview Calendar registry.
 *
 * Maps canonical names to calendar configurations (or factories producing
 * them) and aliases to their targets. Session indexes are built on the first
 * `get` for a range and cached per canonical name; concurrent requests share
 * one in-flight build, and a wider build replaces the cached ranges it covers
 * once it has succeeded.
 */

import { NameCollisionError, UnknownNameError } from '@xcal/contracts';
import type { DateInput, DateRange } from '@xcal/contracts';
import { buildSessionIndex, normalizeDate, parseCalendarConfig } from '@xcal/exchange-calendar';
import type { CalendarConfig, SessionIndex, ZoneResolver } from '@xcal/exchange-calendar';
import { createChildLogger, createNullLogger, measureSync } from '@xcal/logger';
import type { Logger } from '@xcal/logger';
import { resolveAliasChain } from './aliases.js';
import { DEFAULT_RANGE } from './settings.js';
import type {
  CachedBuild,
  CalendarEntry,
  CalendarName,
  CalendarRegistryOptions,
  CalendarSource,
  RegisterOptions,
} from './types.js';

function rangeKey(range: DateRange): string {
  return `${range.start}..${range.end}`;
}

function covers(outer: DateRange, inner: DateRange): boolean {
  return outer.start <= inner.start && outer.end >= inner.end;
}

/**
 * Registry of calendars and aliases.
 *
 * @example
 * ```typescript
 * const registry = new CalendarRegistry({ logger });
 * registry.register('XTAI', xtaiConfig);
 * registry.alias('TWSE', 'XTAI');
 *
 * const index = await registry.get('TWSE', '2024-01-01', '2024-12-31');
 * index.calendar; // 'XTAI'
 * ```
 */
export class CalendarRegistry {
  private readonly calendars = new Map<CalendarName, CalendarEntry>();
  private readonly aliasEdges = new Map<CalendarName, CalendarName>();
  private readonly logger: Logger;
  private readonly defaultRange: DateRange;
  private readonly zoneResolver: ZoneResolver | undefined;

  constructor(options: CalendarRegistryOptions = {}) {
    this.logger = createChildLogger(options.logger ?? createNullLogger(), { component: 'calendar-registry' });
    this.defaultRange = { ...(options.defaultRange ?? DEFAULT_RANGE) };
    this.zoneResolver = options.zoneResolver;
  }

  /**
   * Registers a calendar under a canonical name.
   *
   * @throws {NameCollisionError} if the name is taken, unless `replace` is set
   */
  register(name: CalendarName, source: CalendarSource, options: RegisterOptions = {}): void {
    this.claim(name, options);
    this.calendars.set(name, { source, builds: new Map() });
    this.logger.info('Calendar registered', {
      calendar: name,
      lazy: typeof source === 'function',
      replaced: options.replace === true,
    });
  }

  /**
   * Points an alias at another name. Cycles are reported by {@link resolve},
   * not here.
   *
   * @throws {NameCollisionError} if the name is taken, unless `replace` is set
   */
  alias(name: CalendarName, target: CalendarName, options: RegisterOptions = {}): void {
    this.claim(name, options);
    this.aliasEdges.set(name, target);
    this.logger.debug('Alias added', { alias: name, target });
  }

  /**
   * Canonical name behind a name or alias.
   *
   * @throws {CyclicAliasError} when aliases form a cycle
   * @throws {UnknownNameError} when the name (or an alias target) is not registered
   */
  resolve(name: CalendarName): CalendarName {
    return resolveAliasChain(name, (candidate) => this.calendars.has(candidate), this.aliasEdges);
  }

  /**
   * Session index of a calendar over `[start, end]` (inclusive). Defaults to
   * the registry's default range.
   *
   * A cached index covering the range answers directly, sliced to the range.
   */
  async get(name: CalendarName, start?: DateInput, end?: DateInput): Promise<SessionIndex> {
    const canonical = this.resolve(name);
    const entry = this.entryFor(canonical);
    const range: DateRange = {
      start: normalizeDate(start ?? this.defaultRange.start),
      end: normalizeDate(end ?? this.defaultRange.end),
    };
    const key = rangeKey(range);

    const exact = entry.builds.get(key);
    if (exact) {
      this.logger.debug('Session index cache hit', { calendar: canonical, requested: key });
      return exact.promise;
    }

    const covering = this.coveringBuild(entry, range);
    if (covering) {
      this.logger.debug('Session index served from wider range', {
        calendar: canonical,
        requested: key,
        cached: rangeKey(covering.range),
      });
      return covering.promise.then(
        (index) => index.slice(range.start, range.end),
        // The wider build failed and has left the cache; build this range alone
        () => this.get(canonical, range.start, range.end)
      );
    }

    // Cache the promise before anything awaits so concurrent callers share it
    const build: CachedBuild = {
      range,
      settled: false,
      promise: Promise.resolve()
        .then(() => this.build(canonical, entry, range))
        .then((index) => {
          build.settled = true;
          this.evictCovered(entry, build);
          return index;
        })
        .catch((error: unknown) => {
          if (entry.builds.get(key) === build) {
            entry.builds.delete(key);
          }
          this.logger.warn('Session index build failed', {
            calendar: canonical,
            requested: key,
            error: error instanceof Error ? error.message : String(error),
          });
          throw error;
        }),
    };
    entry.builds.set(key, build);

    return build.promise;
  }

  has(name: CalendarName): boolean {
    return this.calendars.has(name) || this.aliasEdges.has(name);
  }

  /**
   * Canonical calendar names, sorted.
   */
  names(): CalendarName[] {
    return [...this.calendars.keys()].sort();
  }

  /**
   * Alias edges as a plain object (alias → target).
   */
  aliases(): Record<CalendarName, CalendarName> {
    return Object.fromEntries(this.aliasEdges);
  }

  /**
   * Removes a calendar or an alias. Aliases pointing at a removed calendar
   * stay and fail to resolve.
   *
   * @returns True if something was removed
   */
  deregister(name: CalendarName): boolean {
    const removed = this.calendars.delete(name) || this.aliasEdges.delete(name);
    if (removed) {
      this.logger.info('Calendar deregistered', { calendar: name });
    }
    return removed;
  }

  /**
   * Drops cached indexes, for one calendar (by any of its names) or all.
   */
  clearCache(name?: CalendarName): void {
    if (name === undefined) {
      for (const entry of this.calendars.values()) {
        entry.builds.clear();
      }
      return;
    }
    this.entryFor(this.resolve(name)).builds.clear();
  }

  /**
   * Forgets every calendar, alias and cached index.
   */
  reset(): void {
    this.calendars.clear();
    this.aliasEdges.clear();
    this.logger.debug('Registry reset');
  }

  /**
   * Validated configuration of a calendar. Factories run once.
   *
   * @throws {ConstructionError} if the configuration is invalid
   */
  getConfig(name: CalendarName): CalendarConfig {
    const canonical = this.resolve(name);
    return this.configOf(this.entryFor(canonical));
  }

  private claim(name: CalendarName, options: RegisterOptions): void {
    const existing = this.calendars.has(name) ? 'calendar' : this.aliasEdges.has(name) ? 'alias' : undefined;
    if (existing === undefined) {
      return;
    }
    if (!options.replace) {
      throw new NameCollisionError({ name, existing });
    }
    this.calendars.delete(name);
    this.aliasEdges.delete(name);
  }

  /**
   * A cached build covering the range, preferring finished builds over ones
   * still in flight.
   */
  private coveringBuild(entry: CalendarEntry, range: DateRange): CachedBuild | undefined {
    let inFlight: CachedBuild | undefined;
    for (const cached of entry.builds.values()) {
      if (!covers(cached.range, range)) {
        continue;
      }
      if (cached.settled) {
        return cached;
      }
      if (!inFlight) {
        inFlight = cached;
      }
    }
    return inFlight;
  }

  /**
   * Drops the narrower ranges a finished build now answers.
   */
  private evictCovered(entry: CalendarEntry, wider: CachedBuild): void {
    const widerKey = rangeKey(wider.range);
    for (const [cachedKey, cached] of entry.builds) {
      if (cachedKey !== widerKey && covers(wider.range, cached.range)) {
        entry.builds.delete(cachedKey);
      }
    }
  }

  private entryFor(canonical: CalendarName): CalendarEntry {
    const entry = this.calendars.get(canonical);
    if (!entry) {
      throw new UnknownNameError({ name: canonical });
    }
    return entry;
  }

  private configOf(entry: CalendarEntry): CalendarConfig {
    if (!entry.config) {
      const source = entry.source;
      entry.config = parseCalendarConfig(typeof source === 'function' ? source() : source);
    }
    return entry.config;
  }

  private build(canonical: CalendarName, entry: CalendarEntry, range: DateRange): SessionIndex {
    const config = this.configOf(entry);
    const { result, duration_ms } = measureSync(() =>
      buildSessionIndex(config, range.start, range.end, { zoneResolver: this.zoneResolver })
    );
    this.logger.debug('Built session index', {
      calendar: canonical,
      start: range.start,
      end: range.end,
      count: result.size,
      duration_ms,
    });
    return result;
  }
}
