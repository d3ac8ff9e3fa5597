/**
 * @fileoverview Tests for building session indexes from configurations
 */

import { describe, it, expect } from 'vitest';
import { ConstructionError, isConstructionError } from '@xcal/contracts';
import { buildSessionIndex } from '../src/builder.js';
import { parseCalendarConfig } from '../src/schema.js';
import type { CalendarConfigInput } from '../src/schema.js';

const base: CalendarConfigInput = {
  name: 'TEST',
  timezone: 'UTC',
  hours: [{ open: '09:00', close: '17:00' }],
  holidays: [
    {
      type: 'recurring',
      name: 'New Year',
      anchor: { kind: 'fixed', month: 1, day: 1 },
      observance: [{ kind: 'weekend-makeup', fromYear: 2014 }],
    },
  ],
};

function captureConstructionError(fn: () => unknown): ConstructionError {
  try {
    fn();
  } catch (err) {
    if (isConstructionError(err)) {
      return err;
    }
    throw err;
  }
  throw new Error('expected a ConstructionError');
}

// =============================================================================
// Configuration validation
// =============================================================================

describe('parseCalendarConfig', () => {
  it('should fill in defaults', () => {
    const config = parseCalendarConfig(base);

    expect(config.weekmask).toEqual(['monday', 'tuesday', 'wednesday', 'thursday', 'friday']);
    expect(config.nearestWorkdayTieBreak).toBe('later');
    expect(config.openDayOffset).toBe(0);
    expect(config.specialHours).toEqual([]);
    expect(config.aliases).toEqual([]);
  });

  it('should report missing fields', () => {
    const error = captureConstructionError(() => parseCalendarConfig({ name: 'BROKEN', timezone: 'UTC' }));

    expect(error.calendar).toBe('BROKEN');
    expect(error.reason).toBe('invalid configuration');
    expect(error.issues).toEqual(['hours: Required']);
  });

  it('should reject overlapping hours periods', () => {
    const error = captureConstructionError(() =>
      parseCalendarConfig({
        ...base,
        hours: [
          { until: '2020-12-31', open: '09:00', close: '17:00' },
          { from: '2020-06-01', open: '09:00', close: '13:30' },
        ],
      })
    );

    expect(error.issues).toEqual(['hours.1: Hours period overlaps hours[0]']);
  });

  it('should reject unknown anchor tables', () => {
    const error = captureConstructionError(() =>
      parseCalendarConfig({
        ...base,
        holidays: [{ type: 'recurring', name: 'Lunar New Year', anchor: { kind: 'table', table: 'lunar' } }],
      })
    );

    expect(error.issues).toEqual(["holidays.0.anchor.table: Unknown anchor table 'lunar'"]);
  });

  it('should reject days a month never has', () => {
    const error = captureConstructionError(() =>
      parseCalendarConfig({
        ...base,
        holidays: [{ type: 'recurring', name: 'Never', anchor: { kind: 'fixed', month: 2, day: 30 } }],
      })
    );

    expect(error.issues).toEqual(['holidays.0.anchor.day: Month 2 has no day 30']);
  });

  it('should render issues into the message', () => {
    const error = captureConstructionError(() => parseCalendarConfig({ name: 'BROKEN', timezone: 'UTC' }));

    expect(error.message).toBe("Cannot build calendar 'BROKEN': invalid configuration\n  - hours: Required");
  });
});

// =============================================================================
// Session generation
// =============================================================================

describe('buildSessionIndex', () => {
  it('should drop weekends and observed holidays', () => {
    const index = buildSessionIndex(base, '2023-12-29', '2024-01-03');

    expect(index.sessions.map((session) => session.date)).toEqual(['2023-12-29', '2024-01-02', '2024-01-03']);
    expect(index.holidays).toEqual(['2024-01-01']);
  });

  it('should drop ad-hoc closures', () => {
    const index = buildSessionIndex(
      { ...base, holidays: [{ type: 'adhoc', name: 'Closure', dates: ['2021-04-02'] }] },
      '2021-03-29',
      '2021-04-09'
    );

    expect(index.size).toBe(9);
    expect(index.isSession('2021-04-02')).toBe(false);
    expect(index.isSession('2021-04-01')).toBe(true);
  });

  it('should resolve open and close in the calendar zone', () => {
    const index = buildSessionIndex(
      { name: 'TAIPEI', timezone: 'Asia/Taipei', hours: [{ open: '09:00', close: '13:30' }] },
      '2024-01-02',
      '2024-01-02'
    );

    expect(index.firstSession.open.toISOString()).toBe('2024-01-02T01:00:00.000Z');
    expect(index.firstSession.close.toISOString()).toBe('2024-01-02T05:30:00.000Z');
  });

  it('should open on the previous evening with openDayOffset', () => {
    const index = buildSessionIndex(
      {
        name: 'GLOBEX',
        timezone: 'America/New_York',
        hours: [{ open: '18:01', close: '18:00' }],
        openDayOffset: -1,
      },
      '2024-03-08',
      '2024-03-11'
    );

    const [friday, monday] = index.sessions;
    // Friday opens Thursday evening EST, Monday opens Sunday evening EDT
    expect(friday?.open.toISOString()).toBe('2024-03-07T23:01:00.000Z');
    expect(friday?.close.toISOString()).toBe('2024-03-08T23:00:00.000Z');
    expect(monday?.open.toISOString()).toBe('2024-03-10T22:01:00.000Z');
    expect(monday?.close.toISOString()).toBe('2024-03-11T22:00:00.000Z');
  });

  it('should switch hours by date', () => {
    const index = buildSessionIndex(
      {
        ...base,
        hours: [
          { until: '2024-01-02', open: '09:00', close: '17:00' },
          { from: '2024-01-03', open: '08:30', close: '13:30' },
        ],
      },
      '2024-01-02',
      '2024-01-03'
    );

    expect(index.sessionFor('2024-01-02').open.toISOString()).toBe('2024-01-02T09:00:00.000Z');
    expect(index.sessionFor('2024-01-03').open.toISOString()).toBe('2024-01-03T08:30:00.000Z');
    expect(index.sessionFor('2024-01-03').close.toISOString()).toBe('2024-01-03T13:30:00.000Z');
  });

  it('should apply special hours and flag the session', () => {
    const index = buildSessionIndex(
      { ...base, specialHours: [{ date: '2024-01-03', close: '13:00' }] },
      '2024-01-02',
      '2024-01-04'
    );

    const special = index.sessionFor('2024-01-03');
    expect(special.open.toISOString()).toBe('2024-01-03T09:00:00.000Z');
    expect(special.close.toISOString()).toBe('2024-01-03T13:00:00.000Z');
    expect(special.isSpecial).toBe(true);
    expect(index.sessionFor('2024-01-04').isSpecial).toBe(false);
  });

  it('should ignore special hours outside the range', () => {
    const index = buildSessionIndex(
      { ...base, specialHours: [{ date: '2024-01-06', close: '13:00' }] },
      '2024-01-02',
      '2024-01-04'
    );

    expect(index.size).toBe(3);
  });

  it('should accept Date bounds', () => {
    const index = buildSessionIndex(base, new Date('2024-01-02T12:00:00Z'), new Date('2024-01-03T00:00:00Z'));

    expect(index.range).toEqual({ start: '2024-01-02', end: '2024-01-03' });
  });
});

describe('buildSessionIndex failures', () => {
  it('should reject an inverted range', () => {
    const error = captureConstructionError(() => buildSessionIndex(base, '2024-01-05', '2024-01-01'));

    expect(error.reason).toBe('start 2024-01-05 is after end 2024-01-01');
  });

  it('should reject unknown time zones', () => {
    const error = captureConstructionError(() =>
      buildSessionIndex({ ...base, timezone: 'Mars/Olympus_Mons' }, '2024-01-02', '2024-01-03')
    );

    expect(error.reason).toBe("unknown time zone 'Mars/Olympus_Mons'");
  });

  it('should reject special hours on a holiday', () => {
    const error = captureConstructionError(() =>
      buildSessionIndex({ ...base, specialHours: [{ date: '2024-01-01', close: '13:00' }] }, '2024-01-01', '2024-01-05')
    );

    expect(error.reason).toBe('special hours fall on a holiday (New Year)');
    expect(error.data['date']).toBe('2024-01-01');
  });

  it('should reject special hours on a weekend', () => {
    const error = captureConstructionError(() =>
      buildSessionIndex({ ...base, specialHours: [{ date: '2024-01-06', open: '10:00' }] }, '2024-01-01', '2024-01-07')
    );

    expect(error.reason).toBe('special hours fall on a non-trading weekday');
  });

  it('should reject trading days without hours', () => {
    const error = captureConstructionError(() =>
      buildSessionIndex(
        { ...base, hours: [{ from: '2024-01-03', open: '09:00', close: '17:00' }] },
        '2024-01-02',
        '2024-01-05'
      )
    );

    expect(error.reason).toBe('no trading hours configured for date');
    expect(error.data['date']).toBe('2024-01-02');
  });

  it('should reject a range without sessions', () => {
    const error = captureConstructionError(() => buildSessionIndex(base, '2024-01-06', '2024-01-07'));

    expect(error.reason).toBe('date range contains no sessions');
  });

  it('should reject sessions that close before they open', () => {
    const error = captureConstructionError(() =>
      buildSessionIndex({ ...base, hours: [{ open: '17:00', close: '09:00' }] }, '2024-01-02', '2024-01-03')
    );

    expect(error.reason).toBe('session opens at or after its close');
  });

  it('should reject overlapping sessions', () => {
    const error = captureConstructionError(() =>
      buildSessionIndex({ ...base, closeDayOffset: 1 }, '2024-01-02', '2024-01-03')
    );

    expect(error.reason).toBe('session overlaps the session of 2024-01-02');
    expect(error.data['date']).toBe('2024-01-03');
  });

  it('should report errors as ConstructionError instances', () => {
    expect(() => buildSessionIndex(base, '2024-01-06', '2024-01-07')).toThrow(ConstructionError);
  });
});
