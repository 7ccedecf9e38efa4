/**
 * Environment Variable Configuration
 *
 * Reads BLOCKSTORE_* variables into a partial configuration. Values that
 * cannot be parsed are skipped with a warning, leaving the lower layers in
 * effect.
 */

import { createLogger } from '@blockstore/core';
import type { PartialConfiguration, EnvVar } from './types.js';
import { EnvVars, isJournalMode } from './types.js';
import { tryParseDuration } from './duration.js';

const logger = createLogger('config');

// ============================================================================
// Duration Parsing
// ============================================================================

/**
 * Parses a duration from an environment variable value
 *
 * @returns Parsed duration in ms, or undefined if invalid
 */
export function parseEnvDuration(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  return tryParseDuration(value.trim());
}

// ============================================================================
// Environment Access
// ============================================================================

/**
 * Gets an environment variable, treating empty strings as unset
 */
export function getEnvVar(name: EnvVar): string | undefined {
  const value = process.env[name];
  return value === undefined || value === '' ? undefined : value;
}

// ============================================================================
// Environment Loading
// ============================================================================

/**
 * Loads configuration values from environment variables
 */
export function loadEnvConfig(): PartialConfiguration {
  const config: PartialConfiguration = {};

  const actor = getEnvVar(EnvVars.ACTOR);
  if (actor !== undefined) {
    config.actor = actor;
  }

  const database = getEnvVar(EnvVars.DATABASE);
  if (database !== undefined) {
    config.database = database;
  }

  const journalMode = getEnvVar(EnvVars.JOURNAL_MODE)?.toLowerCase();
  if (journalMode !== undefined) {
    if (isJournalMode(journalMode)) {
      config.storage = { ...config.storage, journalMode };
    } else {
      logger.warn(`Ignoring ${EnvVars.JOURNAL_MODE}: unknown journal mode '${journalMode}'`);
    }
  }

  const rawTimeout = getEnvVar(EnvVars.BUSY_TIMEOUT);
  if (rawTimeout !== undefined) {
    const busyTimeout = parseEnvDuration(rawTimeout);
    if (busyTimeout !== undefined) {
      config.storage = { ...config.storage, busyTimeout };
    } else {
      logger.warn(`Ignoring ${EnvVars.BUSY_TIMEOUT}: invalid duration '${rawTimeout}'`);
    }
  }

  return config;
}

/**
 * Gets the config file path override from the environment
 */
export function getEnvConfigPath(): string | undefined {
  return getEnvVar(EnvVars.CONFIG);
}
