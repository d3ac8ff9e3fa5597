/**
 * Registry settings loaded from the environment
 */

import { z } from 'zod';
import { ConfigurationError } from '@xcal/contracts';
import type { DateRange } from '@xcal/contracts';
import { dateKeySchema } from '@xcal/exchange-calendar';
import type { LogLevel } from '@xcal/logger';

/**
 * Range built by `get` when no dates are given
 */
export const DEFAULT_RANGE: Readonly<DateRange> = Object.freeze({ start: '2020-01-01', end: '2030-12-31' });

export const settingsSchema = z
  .object({
    XCAL_LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
    XCAL_LOG_FORMAT: z.enum(['json', 'pretty']).default('pretty'),
    XCAL_DEFAULT_START: dateKeySchema.default(DEFAULT_RANGE.start),
    XCAL_DEFAULT_END: dateKeySchema.default(DEFAULT_RANGE.end),
  })
  .refine((env) => env.XCAL_DEFAULT_START <= env.XCAL_DEFAULT_END, {
    message: 'XCAL_DEFAULT_START must not be after XCAL_DEFAULT_END',
    path: ['XCAL_DEFAULT_START'],
  });

export interface Settings {
  logLevel: LogLevel;
  logFormat: 'json' | 'pretty';
  defaultRange: DateRange;
}

/**
 * Load settings from environment variables
 *
 * @throws {ConfigurationError} listing every invalid variable
 *
 * @example
 * ```typescript
 * const settings = loadSettings({ XCAL_LOG_LEVEL: 'debug' });
 * settings.logLevel;     // 'debug'
 * settings.defaultRange; // { start: '2020-01-01', end: '2030-12-31' }
 * ```
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const result = settingsSchema.safeParse(env);

  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigurationError(`Invalid calendar settings:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`, {
      issues,
    });
  }

  return {
    logLevel: result.data.XCAL_LOG_LEVEL,
    logFormat: result.data.XCAL_LOG_FORMAT,
    defaultRange: { start: result.data.XCAL_DEFAULT_START, end: result.data.XCAL_DEFAULT_END },
  };
}
