/**
 * @fileoverview Type definitions for the calendar logger
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Log level determines the minimum severity of messages that will be logged.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'debug',
 *   json: process.env.NODE_ENV === 'production',
 *   filePath: './logs/calendars.log'
 * };
 * ```
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output.
   */
  level: LogLevel;

  /**
   * Whether to output logs in JSON format.
   * @default true in production, false otherwise
   */
  json?: boolean;

  /**
   * Optional file path for a file transport, written in addition to console.
   */
  filePath?: string;

  /**
   * Whether to enable console output.
   * @default true
   */
  console?: boolean;
}

/**
 * Child logger context fields.
 *
 * @example
 * ```typescript
 * const registryLogger = logger.child({ component: 'calendar-registry' });
 * ```
 */
export interface ChildLoggerContext {
  component?: string;
  calendar?: string;
  [key: string]: unknown;
}

/**
 * Re-export Winston's Logger type for convenience.
 */
export type Logger = WinstonLogger;
