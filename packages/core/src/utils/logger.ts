/**
 * Logger Utility
 *
 * Leveled, scope-prefixed logging over the console. The minimum level comes
 * from the LOG_LEVEL environment variable (DEBUG|INFO|WARNING|ERROR,
 * default INFO) and is read on every call, so changing it takes effect
 * without recreating loggers.
 *
 * Usage:
 *   const logger = createLogger('block-repository');
 *   logger.debug('setChildren', { parentId });
 *   // [block-repository] setChildren { parentId: '...' }
 *
 * @module
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Supported log levels in ascending severity order.
 */
export type LogLevel = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR';

/**
 * Logger interface with leveled logging methods.
 */
export interface Logger {
  /** Log at DEBUG level - per-operation detail (mutations, hydration passes) */
  debug(message: string, ...args: unknown[]): void;
  /** Log at INFO level - lifecycle events (store opened, workspace created) */
  info(message: string, ...args: unknown[]): void;
  /** Log at WARNING level - recoverable issues (rollback failures, ignored config) */
  warn(message: string, ...args: unknown[]): void;
  /** Log at ERROR level - failures */
  error(message: string, ...args: unknown[]): void;
  /** Derive a logger whose prefix is `[scope:subScope]` */
  child(subScope: string): Logger;
}

// ============================================================================
// Constants
// ============================================================================

/** Environment variable holding the minimum level */
export const LOG_LEVEL_ENV = 'LOG_LEVEL';

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  ERROR: 3,
};

const DEFAULT_LOG_LEVEL: LogLevel = 'INFO';

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_VALUES;
}

// ============================================================================
// Log Level Resolution
// ============================================================================

/**
 * Resolves the current log level from the environment, falling back to INFO.
 */
export function getLogLevel(): LogLevel {
  const envLevel = process.env[LOG_LEVEL_ENV]?.toUpperCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return DEFAULT_LOG_LEVEL;
}

function shouldLog(messageLevel: LogLevel): boolean {
  return LOG_LEVEL_VALUES[messageLevel] >= LOG_LEVEL_VALUES[getLogLevel()];
}

// ============================================================================
// Logger Factory
// ============================================================================

type ConsoleMethod = (...data: unknown[]) => void;

function emit(level: LogLevel, write: ConsoleMethod, prefix: string, message: string, args: unknown[]): void {
  if (!shouldLog(level)) {
    return;
  }
  if (args.length > 0) {
    write(prefix, message, ...args);
  } else {
    write(prefix, message);
  }
}

/**
 * Creates a scoped logger instance.
 *
 * @param scope - Prefix printed as `[scope]` before every message
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;

  return {
    debug(message: string, ...args: unknown[]): void {
      emit('DEBUG', console.debug, prefix, message, args);
    },
    info(message: string, ...args: unknown[]): void {
      emit('INFO', console.log, prefix, message, args);
    },
    warn(message: string, ...args: unknown[]): void {
      emit('WARNING', console.warn, prefix, message, args);
    },
    error(message: string, ...args: unknown[]): void {
      emit('ERROR', console.error, prefix, message, args);
    },
    child(subScope: string): Logger {
      return createLogger(`${scope}:${subScope}`);
    },
  };
}
