/**
 * @fileoverview Public API exports for @pricelens/logger
 * Structured logging for PriceLens
 */

// Core logger creation
export { createLogger, createChildLogger } from './createLogger.js';

// Formats
export { standardFields, prettyPrint, renderLine } from './formats.js';

// Performance timing utilities
export { startTimer, measureSync } from './perf-timer.js';

// Type exports
export type { Logger, LoggerConfig, LogLevel, ChildLoggerContext } from './types.js';
export type { PerfTimer } from './perf-timer.js';
