/**
 * @fileoverview Public API exports for @xcal/logger
 * Structured logging for exchange calendars
 */

// Core logger creation
export { createLogger, createNullLogger, createChildLogger } from './createLogger.js';

// Formats
export { standardFields, prettyPrint, renderLine, formatField } from './formats.js';

// Performance timing utilities
export { startTimer, measureSync } from './perf-timer.js';

// Type exports
export type { Logger, LoggerConfig, LogLevel, ChildLoggerContext } from './types.js';
export type { PerfTimer } from './perf-timer.js';
