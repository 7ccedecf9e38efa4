/**
 * Utility Functions
 *
 * Shared utilities used across the block store packages.
 */

export { createLogger, getLogLevel, LOG_LEVEL_ENV, type Logger, type LogLevel } from './logger.js';
