/**
 * @fileoverview Logger factory for exchange calendars
 * Creates configured Winston logger instances with structured fields and
 * console/file transports.
 */

import winston, { format } from 'winston';
import type { LoggerConfig, Logger, ChildLoggerContext } from './types.js';
import { standardFields, prettyPrint } from './formats.js';

/**
 * Creates a configured logger instance.
 *
 * - Structured logging with standard fields (timestamp, level, message)
 * - Console and/or file transports
 * - JSON in production, pretty-print otherwise
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: true });
 * logger.info('Calendars registered', { count: 2 });
 * ```
 *
 * @example
 * ```typescript
 * const logger = createLogger({
 *   level: 'debug',
 *   json: false,
 *   filePath: './logs/calendars.log',
 * });
 *
 * const registryLogger = logger.child({ component: 'calendar-registry' });
 * registryLogger.debug('Built session index', { calendar: 'XTAI', count: 244 });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
  } = config;

  const logFormat = format.combine(standardFields, json ? format.json() : prettyPrint);

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        format: logFormat,
      })
    );
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        // File output is always JSON so it can be parsed back
        format: format.combine(standardFields, format.json()),
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  // Winston complains when a logger has no transports at all
  if (transports.length === 0) {
    transports.push(new winston.transports.Console({ silent: true }));
  }

  return winston.createLogger({
    level,
    format: logFormat,
    transports,
    exitOnError: false,
  });
}

/**
 * Creates a logger that discards everything. Used as the default for
 * library components constructed without a logger, and in tests.
 */
export function createNullLogger(): Logger {
  return createLogger({ level: 'error', console: false });
}

/**
 * Creates a child logger with additional context fields.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info' });
 * const registryLogger = createChildLogger(logger, { component: 'calendar-registry' });
 * registryLogger.info('Alias added', { alias: 'TWSE', target: 'XTAI' });
 * ```
 */
export function createChildLogger(logger: Logger, context: ChildLoggerContext): Logger {
  return logger.child(context);
}
