/**
 * @fileoverview Custom Winston formats for the calendar logger
 */

import { format } from 'winston';

/**
 * Context fields printed first, in this order, by {@link prettyPrint}.
 */
const LEADING_FIELDS: readonly string[] = ['component', 'calendar', 'requested', 'start', 'end'];

/**
 * Winston-internal keys never printed as context.
 */
const INTERNAL_FIELDS = new Set(['level', 'message', 'timestamp', 'stack', 'splat']);

/**
 * Adds an ISO 8601 timestamp and expands Error objects with their stack.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true })
);

/**
 * Renders one `key=value` pair for the pretty printer. Strings print bare.
 */
export function formatField(key: string, value: unknown): string {
  return typeof value === 'string' ? `${key}=${value}` : `${key}=${JSON.stringify(value)}`;
}

/**
 * Builds the pretty line for a log record, without colours.
 *
 * @example
 * ```typescript
 * renderLine({ timestamp: 't', level: 'info', message: 'Built', component: 'calendar-registry', count: 3 });
 * // "[t] info: Built component=calendar-registry count=3"
 * ```
 */
export function renderLine(info: Record<string, unknown>): string {
  const context: string[] = [];

  for (const key of LEADING_FIELDS) {
    const value = info[key];
    if (value !== undefined) {
      context.push(formatField(key, value));
    }
  }

  for (const [key, value] of Object.entries(info)) {
    if (INTERNAL_FIELDS.has(key) || LEADING_FIELDS.includes(key)) {
      continue;
    }
    context.push(formatField(key, value));
  }

  const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
  const baseMsg = `[${String(info['timestamp'])}] ${String(info['level'])}: ${String(info['message'])}${contextStr}`;

  const stack = info['stack'];
  return typeof stack === 'string' ? `${baseMsg}\n${stack}` : baseMsg;
}

/**
 * Winston format for human-readable output in development.
 *
 * @example
 * ```typescript
 * // [2025-09-29T12:34:56.789Z] debug: Built session index component=calendar-registry calendar=XTAI count=244
 * ```
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => renderLine(info))
);
