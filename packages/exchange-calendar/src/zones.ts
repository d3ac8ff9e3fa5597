/**
 * @fileoverview Wall-clock to instant conversion for IANA time zones.
 *
 * Uses Intl.DateTimeFormat to read the zone offset at a guessed instant and
 * corrects the guess once, which settles every transition except local times
 * that do not exist (spring-forward gaps land on the later offset).
 */

import type { DateKey, LocalTime } from '@xcal/contracts';

/**
 * Converts a local date and time in a zone to a UTC instant.
 */
export interface ZoneResolver {
  toInstant(date: DateKey, time: LocalTime, zone: string): Date;
  isValidZone(zone: string): boolean;
}

const LOCAL_TIME_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

/**
 * Parses `HH:MM`. Returns null on malformed input.
 */
export function parseLocalTime(time: LocalTime): { hours: number; minutes: number } | null {
  const match = LOCAL_TIME_PATTERN.exec(time);
  if (!match) {
    return null;
  }
  return { hours: Number(match[1]), minutes: Number(match[2]) };
}

export class IntlZoneResolver implements ZoneResolver {
  private readonly formatters = new Map<string, Intl.DateTimeFormat>();

  isValidZone(zone: string): boolean {
    try {
      this.formatterFor(zone);
      return true;
    } catch (error) {
      if (error instanceof RangeError) {
        return false;
      }
      throw error;
    }
  }

  toInstant(date: DateKey, time: LocalTime, zone: string): Date {
    const parsed = parseLocalTime(time);
    if (!parsed) {
      throw new RangeError(`Invalid local time: ${time}`);
    }
    const [year, month, day] = date.split('-').map(Number);
    const wallClock = Date.UTC(year ?? 0, (month ?? 1) - 1, day ?? 1, parsed.hours, parsed.minutes);

    const firstOffset = this.offsetAt(wallClock, zone);
    let instant = wallClock - firstOffset;
    const secondOffset = this.offsetAt(instant, zone);
    if (secondOffset !== firstOffset) {
      instant = wallClock - secondOffset;
    }
    return new Date(instant);
  }

  /**
   * Zone offset (local minus UTC, in ms) in effect at an instant.
   */
  private offsetAt(instant: number, zone: string): number {
    const parts = this.formatterFor(zone).formatToParts(new Date(instant));
    const field = (type: Intl.DateTimeFormatPartTypes): number =>
      Number(parts.find((part) => part.type === type)?.value ?? 0);

    const asUtc = Date.UTC(
      field('year'),
      field('month') - 1,
      field('day'),
      field('hour'),
      field('minute'),
      field('second')
    );
    return asUtc - Math.floor(instant / 1000) * 1000;
  }

  private formatterFor(zone: string): Intl.DateTimeFormat {
    let formatter = this.formatters.get(zone);
    if (!formatter) {
      formatter = new Intl.DateTimeFormat('en-US', {
        timeZone: zone,
        hourCycle: 'h23',
        year: 'numeric',
        month: '2-digit',
        day: '2-digit',
        hour: '2-digit',
        minute: '2-digit',
        second: '2-digit',
      });
      this.formatters.set(zone, formatter);
    }
    return formatter;
  }
}

export const defaultZoneResolver: ZoneResolver = new IntlZoneResolver();
