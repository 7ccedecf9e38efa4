/**
 * Configuration System Types
 *
 * Configuration interfaces for the block store. Values come from built-in
 * defaults, a YAML file, environment variables and explicit overrides, in
 * increasing order of precedence.
 */

import type { BlockType } from '@blockstore/core';
import type { JournalMode } from '@blockstore/storage';

// ============================================================================
// Duration Type
// ============================================================================

/**
 * Duration in milliseconds
 */
export type Duration = number;

/**
 * Duration string format
 * Supported units: ms, s, m, h, d
 */
export type DurationString = `${number}${'ms' | 's' | 'm' | 'h' | 'd'}`;

// ============================================================================
// Configuration Interfaces
// ============================================================================

/**
 * SQLite connection settings
 */
export interface StorageSection {
  /** Journal mode (default: 'wal') */
  journalMode: JournalMode;
  /** How long a writer waits on a locked database (default: 5000ms) */
  busyTimeout: Duration;
}

/**
 * Document store policy settings
 */
export interface DocumentsSection {
  /** Block types accepted as document roots (default: document, dataset) */
  rootTypes: BlockType[];
  /** Default hydration depth for root trees (default: 1) */
  treeDepth: number;
  /** Title given to a workspace created on first start */
  workspaceTitle: string;
}

/**
 * Complete block store configuration
 */
export interface Configuration {
  /** Default actor id stamped on created records */
  actor?: string;
  /** Database file path, or ':memory:' (default: 'blocks.db') */
  database: string;
  storage: StorageSection;
  documents: DocumentsSection;
}

/**
 * Partial configuration for merging
 */
export type PartialConfiguration = {
  actor?: string;
  database?: string;
  storage?: Partial<StorageSection>;
  documents?: Partial<DocumentsSection>;
};

// ============================================================================
// Configuration Source Tracking
// ============================================================================

/**
 * Source of a configuration value
 */
export const ConfigSource = {
  /** Built-in default value */
  DEFAULT: 'default',
  /** From config file */
  FILE: 'file',
  /** From environment variable */
  ENVIRONMENT: 'environment',
  /** From explicit overrides passed to loadConfig */
  OVERRIDE: 'override',
} as const;

export type ConfigSource = (typeof ConfigSource)[keyof typeof ConfigSource];

/**
 * Configuration value with source tracking
 */
export interface TrackedValue<T> {
  value: T;
  source: ConfigSource;
}

// ============================================================================
// YAML File Format Types
// ============================================================================

/**
 * YAML configuration file structure (snake_case keys)
 */
export interface YamlConfigFile {
  actor?: string;
  database?: string;
  storage?: {
    journal_mode?: string;
    busy_timeout?: string | number;
  };
  documents?: {
    root_types?: string[];
    tree_depth?: number;
    workspace_title?: string;
  };
}

// ============================================================================
// Environment Variable Mapping
// ============================================================================

/**
 * Environment variable names for configuration
 */
export const EnvVars = {
  /** Default actor id */
  ACTOR: 'BLOCKSTORE_ACTOR',
  /** Database file path */
  DATABASE: 'BLOCKSTORE_DB',
  /** Config file path override */
  CONFIG: 'BLOCKSTORE_CONFIG',
  /** SQLite journal mode */
  JOURNAL_MODE: 'BLOCKSTORE_JOURNAL_MODE',
  /** SQLite busy timeout */
  BUSY_TIMEOUT: 'BLOCKSTORE_BUSY_TIMEOUT',
} as const;

export type EnvVar = (typeof EnvVars)[keyof typeof EnvVars];

// ============================================================================
// Configuration Operations
// ============================================================================

/**
 * Options for loading configuration
 */
export interface LoadConfigOptions {
  /** Override config file path */
  configPath?: string;
  /** Directory to start the config file search from (default: cwd) */
  startDir?: string;
  /** Skip environment variables */
  skipEnv?: boolean;
  /** Skip config file loading */
  skipFile?: boolean;
  /** Highest-precedence overrides */
  overrides?: PartialConfiguration;
}

/**
 * Result of configuration file discovery
 */
export interface ConfigFileDiscovery {
  /** Path to the config file, if one was located or given */
  path?: string;
  exists: boolean;
  /** Directory containing the config file */
  configDir?: string;
}

// ============================================================================
// Configuration Path Types
// ============================================================================

/**
 * Valid configuration paths
 */
export const VALID_CONFIG_PATHS = [
  'actor',
  'database',
  'storage.journalMode',
  'storage.busyTimeout',
  'documents.rootTypes',
  'documents.treeDepth',
  'documents.workspaceTitle',
] as const;

/**
 * Dot-notation paths for configuration values
 */
export type ConfigPath = (typeof VALID_CONFIG_PATHS)[number];

export function isValidConfigPath(value: string): value is ConfigPath {
  return (VALID_CONFIG_PATHS as readonly string[]).includes(value);
}

/**
 * Maps config paths to their value types
 */
export interface ConfigPathTypes {
  actor: string | undefined;
  database: string;
  'storage.journalMode': JournalMode;
  'storage.busyTimeout': Duration;
  'documents.rootTypes': BlockType[];
  'documents.treeDepth': number;
  'documents.workspaceTitle': string;
}

// ============================================================================
// Enumerated Values
// ============================================================================

/**
 * SQLite journal modes accepted in configuration
 */
export const VALID_JOURNAL_MODES: readonly JournalMode[] = ['wal', 'delete', 'truncate', 'persist', 'memory', 'off'];

export function isJournalMode(value: unknown): value is JournalMode {
  return typeof value === 'string' && (VALID_JOURNAL_MODES as readonly string[]).includes(value);
}
