/**
 * Configuration Access API
 *
 * Main interface for loading and reading configuration.
 * Implements the precedence hierarchy: overrides > environment > file > defaults
 */

import type {
  Configuration,
  PartialConfiguration,
  LoadConfigOptions,
  ConfigPath,
  ConfigPathTypes,
  TrackedValue,
} from './types.js';
import { ConfigSource, VALID_CONFIG_PATHS } from './types.js';
import { getDefaultConfig } from './defaults.js';
import { mergeConfiguration, cloneConfiguration } from './merge.js';
import { validateConfiguration, validatePartialConfiguration } from './validation.js';
import { discoverConfigFile, readConfigFile } from './file.js';
import { loadEnvConfig, getEnvConfigPath } from './env.js';

// ============================================================================
// Path Accessors
// ============================================================================

const ACCESSORS: { readonly [P in ConfigPath]: (config: Configuration) => ConfigPathTypes[P] } = {
  actor: (c) => c.actor,
  database: (c) => c.database,
  'storage.journalMode': (c) => c.storage.journalMode,
  'storage.busyTimeout': (c) => c.storage.busyTimeout,
  'documents.rootTypes': (c) => c.documents.rootTypes,
  'documents.treeDepth': (c) => c.documents.treeDepth,
  'documents.workspaceTitle': (c) => c.documents.workspaceTitle,
};

const PARTIAL_ACCESSORS: { readonly [P in ConfigPath]: (config: PartialConfiguration) => unknown } = {
  actor: (c) => c.actor,
  database: (c) => c.database,
  'storage.journalMode': (c) => c.storage?.journalMode,
  'storage.busyTimeout': (c) => c.storage?.busyTimeout,
  'documents.rootTypes': (c) => c.documents?.rootTypes,
  'documents.treeDepth': (c) => c.documents?.treeDepth,
  'documents.workspaceTitle': (c) => c.documents?.workspaceTitle,
};

// ============================================================================
// Configuration State
// ============================================================================

type SourceMap = Partial<Record<ConfigPath, ConfigSource>>;

/** Cached configuration instance */
let cachedConfig: Configuration | null = null;

/** Source of every value set above the defaults */
let cachedSources: SourceMap = {};

/** Path to the active config file */
let activeConfigPath: string | undefined;

/** Directory containing the active config file */
let activeConfigDir: string | undefined;

function trackSources(sources: SourceMap, partial: PartialConfiguration, source: ConfigSource): SourceMap {
  const next = { ...sources };
  for (const path of VALID_CONFIG_PATHS) {
    if (PARTIAL_ACCESSORS[path](partial) !== undefined) {
      next[path] = source;
    }
  }
  return next;
}

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Loads configuration with full precedence chain
 *
 * Precedence (highest to lowest):
 * 1. Explicit overrides
 * 2. Environment variables
 * 3. Config file
 * 4. Built-in defaults
 *
 * A config file that exists but cannot be read or parsed raises; the
 * final configuration is validated before it is cached.
 */
export function loadConfig(options: LoadConfigOptions = {}): Configuration {
  let config = getDefaultConfig();
  let sources: SourceMap = {};

  const envConfigPath = options.skipEnv ? undefined : getEnvConfigPath();
  const discovery = options.skipFile
    ? { exists: false, path: undefined, configDir: undefined }
    : discoverConfigFile(options.configPath ?? envConfigPath, options.startDir);

  if (discovery.exists && discovery.path) {
    const fileConfig = readConfigFile(discovery.path);
    config = mergeConfiguration(config, fileConfig);
    sources = trackSources(sources, fileConfig, ConfigSource.FILE);
  }

  if (!options.skipEnv) {
    const envConfig = loadEnvConfig();
    config = mergeConfiguration(config, envConfig);
    sources = trackSources(sources, envConfig, ConfigSource.ENVIRONMENT);
  }

  if (options.overrides) {
    validatePartialConfiguration(options.overrides);
    config = mergeConfiguration(config, options.overrides);
    sources = trackSources(sources, options.overrides, ConfigSource.OVERRIDE);
  }

  validateConfiguration(config);

  cachedConfig = config;
  cachedSources = sources;
  activeConfigPath = discovery.path;
  activeConfigDir = discovery.configDir;

  return cloneConfiguration(config);
}

/**
 * Gets the current configuration, loading if necessary
 */
export function getConfig(): Configuration {
  const config = cachedConfig ?? loadConfig();
  return cloneConfiguration(config);
}

/**
 * Reloads configuration from all sources
 */
export function reloadConfig(options: LoadConfigOptions = {}): Configuration {
  clearConfigCache();
  return loadConfig(options);
}

/**
 * Clears the configuration cache
 */
export function clearConfigCache(): void {
  cachedConfig = null;
  cachedSources = {};
  activeConfigPath = undefined;
  activeConfigDir = undefined;
}

// ============================================================================
// Value Access
// ============================================================================

/**
 * Gets a configuration value by path
 *
 * @example
 * getValue('database') // 'blocks.db'
 * getValue('storage.busyTimeout') // 5000
 */
export function getValue<P extends ConfigPath>(path: P): ConfigPathTypes[P] {
  return getValueFromConfig(getConfig(), path);
}

/**
 * Gets a configuration value from a config object by path
 */
export function getValueFromConfig<P extends ConfigPath>(config: Configuration, path: P): ConfigPathTypes[P] {
  return ACCESSORS[path](config);
}

/**
 * Gets the source of a configuration value
 */
export function getValueSource(path: ConfigPath): ConfigSource {
  if (cachedConfig === null) {
    loadConfig();
  }
  return cachedSources[path] ?? ConfigSource.DEFAULT;
}

/**
 * Gets a value with its source
 */
export function getValueWithSource<P extends ConfigPath>(path: P): TrackedValue<ConfigPathTypes[P]> {
  const value = getValue(path);
  return { value, source: getValueSource(path) };
}

/**
 * Path of the config file behind the cached configuration, if any
 */
export function getConfigPath(): string | undefined {
  return activeConfigPath;
}

/**
 * Directory of the config file behind the cached configuration, if any
 */
export function getConfigDir(): string | undefined {
  return activeConfigDir;
}
