/**
 * Tests for environment settings and settings-driven registries
 */

import { describe, it, expect } from 'vitest';
import { isConfigurationError } from '@xcal/contracts';
import { createNullLogger } from '@xcal/logger';
import { createCalendarRegistry } from '../src/create.js';
import { loadSettings } from '../src/settings.js';

describe('loadSettings', () => {
  it('should fall back to defaults', () => {
    expect(loadSettings({})).toEqual({
      logLevel: 'info',
      logFormat: 'pretty',
      defaultRange: { start: '2020-01-01', end: '2030-12-31' },
    });
  });

  it('should read every variable', () => {
    const settings = loadSettings({
      XCAL_LOG_LEVEL: 'debug',
      XCAL_LOG_FORMAT: 'json',
      XCAL_DEFAULT_START: '2024-01-01',
      XCAL_DEFAULT_END: '2024-12-31',
      UNRELATED: 'ignored',
    });

    expect(settings).toEqual({
      logLevel: 'debug',
      logFormat: 'json',
      defaultRange: { start: '2024-01-01', end: '2024-12-31' },
    });
  });

  it('should list invalid values', () => {
    try {
      loadSettings({ XCAL_LOG_LEVEL: 'verbose' });
      expect.fail('should have thrown');
    } catch (err) {
      expect(isConfigurationError(err)).toBe(true);
      if (isConfigurationError(err)) {
        expect(err.data['issues']).toEqual([
          "XCAL_LOG_LEVEL: Invalid enum value. Expected 'error' | 'warn' | 'info' | 'debug', received 'verbose'",
        ]);
      }
    }
  });

  it('should reject an inverted default range', () => {
    expect(() => loadSettings({ XCAL_DEFAULT_START: '2031-01-01' })).toThrow(
      'Invalid calendar settings:\n  - XCAL_DEFAULT_START: XCAL_DEFAULT_START must not be after XCAL_DEFAULT_END'
    );
  });

  it('should reject malformed dates', () => {
    expect(() => loadSettings({ XCAL_DEFAULT_END: '2030-02-30' })).toThrow(
      'XCAL_DEFAULT_END: Expected a valid date in YYYY-MM-DD form'
    );
  });
});

describe('createCalendarRegistry', () => {
  it('should build the configured default range', async () => {
    const registry = createCalendarRegistry(
      { logLevel: 'error', logFormat: 'json', defaultRange: { start: '2024-03-04', end: '2024-03-08' } },
      createNullLogger()
    );
    registry.register('TEST', { name: 'TEST', timezone: 'UTC', hours: [{ open: '09:00', close: '17:00' }] });

    const index = await registry.get('TEST');

    expect(index.range).toEqual({ start: '2024-03-04', end: '2024-03-08' });
    expect(index.size).toBe(5);
  });
});
