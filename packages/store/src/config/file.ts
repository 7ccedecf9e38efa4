/**
 * Configuration File Loading
 *
 * Handles YAML configuration file parsing, discovery, and writing.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as yaml from 'yaml';
import { ValidationError, ErrorCode, isPlainObject, isValidBlockType, type BlockType } from '@blockstore/core';
import type {
  Configuration,
  PartialConfiguration,
  YamlConfigFile,
  ConfigFileDiscovery,
} from './types.js';
import { isJournalMode, VALID_JOURNAL_MODES } from './types.js';
import { formatDuration, parseDurationValue } from './duration.js';

// ============================================================================
// Constants
// ============================================================================

/** Default config file name */
export const CONFIG_FILE_NAME = 'config.yaml';

/** Project-local configuration directory */
export const CONFIG_DIR = '.blockstore';

// ============================================================================
// File Discovery
// ============================================================================

function isDirectory(candidate: string): boolean {
  return fs.existsSync(candidate) && fs.statSync(candidate).isDirectory();
}

/**
 * Finds the nearest .blockstore directory by walking up from the given directory.
 *
 * @returns Path to the .blockstore directory, or undefined if not found
 */
export function findConfigDir(startDir: string): string | undefined {
  let currentDir = path.resolve(startDir);

  for (;;) {
    const candidate = path.join(currentDir, CONFIG_DIR);
    if (isDirectory(candidate)) {
      return candidate;
    }
    const parent = path.dirname(currentDir);
    if (parent === currentDir) {
      return undefined;
    }
    currentDir = parent;
  }
}

/**
 * Discovers the configuration file location
 *
 * @param overridePath - Explicit file path, used as is
 * @param startDir - Directory to start searching from (default: cwd)
 */
export function discoverConfigFile(
  overridePath?: string,
  startDir: string = process.cwd()
): ConfigFileDiscovery {
  if (overridePath) {
    const resolvedPath = path.resolve(startDir, overridePath);
    const exists = fs.existsSync(resolvedPath);
    return {
      path: resolvedPath,
      exists,
      configDir: exists ? path.dirname(resolvedPath) : undefined,
    };
  }

  const configDir = findConfigDir(startDir);
  if (!configDir) {
    return { exists: false };
  }

  const configPath = path.join(configDir, CONFIG_FILE_NAME);
  return {
    path: configPath,
    exists: fs.existsSync(configPath),
    configDir,
  };
}

// ============================================================================
// YAML Parsing
// ============================================================================

function configError(message: string, field: string, value: unknown, filePath?: string): ValidationError {
  return new ValidationError(
    `${message}${filePath ? ` (${filePath})` : ''}`,
    ErrorCode.INVALID_CONFIG,
    { field, value, filePath }
  );
}

function readString(source: Record<string, unknown>, key: string, field: string, filePath?: string): string | undefined {
  const value = source[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw configError(`${field} must be a string`, field, value, filePath);
  }
  return value;
}

function readSection(
  source: Record<string, unknown>,
  key: string,
  filePath?: string
): Record<string, unknown> | undefined {
  const value = source[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isPlainObject(value)) {
    throw configError(`${key} must be a mapping`, key, value, filePath);
  }
  return value;
}

/**
 * Parses YAML content into a config file structure.
 * Unknown keys are ignored; known keys are shape-checked.
 *
 * @param filePath - Path to file (for error messages)
 */
export function parseYamlConfig(content: string, filePath?: string): YamlConfigFile {
  let parsed: unknown;
  try {
    parsed = yaml.parse(content);
  } catch (err) {
    throw new ValidationError(
      `Failed to parse YAML configuration${filePath ? ` (${filePath})` : ''}: ${err instanceof Error ? err.message : String(err)}`,
      ErrorCode.INVALID_CONFIG,
      { filePath },
      err instanceof Error ? err : undefined
    );
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isPlainObject(parsed)) {
    throw configError('Configuration file must contain an object', 'config', parsed, filePath);
  }

  const result: YamlConfigFile = {};
  const actor = readString(parsed, 'actor', 'actor', filePath);
  if (actor !== undefined) result.actor = actor;
  const database = readString(parsed, 'database', 'database', filePath);
  if (database !== undefined) result.database = database;

  const storage = readSection(parsed, 'storage', filePath);
  if (storage) {
    result.storage = {};
    const journalMode = readString(storage, 'journal_mode', 'storage.journal_mode', filePath);
    if (journalMode !== undefined) result.storage.journal_mode = journalMode;
    const busyTimeout = storage['busy_timeout'];
    if (typeof busyTimeout === 'string' || typeof busyTimeout === 'number') {
      result.storage.busy_timeout = busyTimeout;
    } else if (busyTimeout !== undefined && busyTimeout !== null) {
      throw configError('storage.busy_timeout must be a duration', 'storage.busy_timeout', busyTimeout, filePath);
    }
  }

  const documents = readSection(parsed, 'documents', filePath);
  if (documents) {
    result.documents = {};
    const rootTypes = documents['root_types'];
    if (Array.isArray(rootTypes)) {
      result.documents.root_types = rootTypes.map((entry: unknown) => {
        if (typeof entry !== 'string') {
          throw configError('documents.root_types must be a list of block types', 'documents.root_types', rootTypes, filePath);
        }
        return entry;
      });
    } else if (rootTypes !== undefined && rootTypes !== null) {
      throw configError('documents.root_types must be a list of block types', 'documents.root_types', rootTypes, filePath);
    }
    const treeDepth = documents['tree_depth'];
    if (typeof treeDepth === 'number') {
      result.documents.tree_depth = treeDepth;
    } else if (treeDepth !== undefined && treeDepth !== null) {
      throw configError('documents.tree_depth must be a number', 'documents.tree_depth', treeDepth, filePath);
    }
    const title = readString(documents, 'workspace_title', 'documents.workspace_title', filePath);
    if (title !== undefined) result.documents.workspace_title = title;
  }

  return result;
}

/**
 * Converts YAML config (snake_case) to internal format (camelCase)
 */
export function convertYamlToConfig(yamlConfig: YamlConfigFile): PartialConfiguration {
  const result: PartialConfiguration = {};

  if (yamlConfig.actor !== undefined) {
    result.actor = yamlConfig.actor;
  }
  if (yamlConfig.database !== undefined) {
    result.database = yamlConfig.database;
  }

  if (yamlConfig.storage) {
    result.storage = {};
    const { journal_mode, busy_timeout } = yamlConfig.storage;
    if (journal_mode !== undefined) {
      const mode = journal_mode.toLowerCase();
      if (!isJournalMode(mode)) {
        throw new ValidationError(
          `storage.journal_mode must be one of: ${VALID_JOURNAL_MODES.join(', ')}`,
          ErrorCode.INVALID_CONFIG,
          { field: 'storage.journal_mode', value: journal_mode, expected: VALID_JOURNAL_MODES }
        );
      }
      result.storage.journalMode = mode;
    }
    if (busy_timeout !== undefined) {
      result.storage.busyTimeout = parseDurationValue(busy_timeout);
    }
  }

  if (yamlConfig.documents) {
    result.documents = {};
    const { root_types, tree_depth, workspace_title } = yamlConfig.documents;
    if (root_types !== undefined) {
      const rootTypes: BlockType[] = [];
      for (const type of root_types) {
        if (!isValidBlockType(type)) {
          throw new ValidationError(
            `documents.root_types contains unknown block type '${type}'`,
            ErrorCode.INVALID_CONFIG,
            { field: 'documents.root_types', value: type }
          );
        }
        rootTypes.push(type);
      }
      result.documents.rootTypes = rootTypes;
    }
    if (tree_depth !== undefined) result.documents.treeDepth = tree_depth;
    if (workspace_title !== undefined) result.documents.workspaceTitle = workspace_title;
  }

  return result;
}

/**
 * Reads and parses a configuration file. A missing file yields an empty
 * partial; read and parse failures propagate.
 */
export function readConfigFile(filePath: string): PartialConfiguration {
  if (!fs.existsSync(filePath)) {
    return {};
  }
  const content = fs.readFileSync(filePath, 'utf-8');
  return convertYamlToConfig(parseYamlConfig(content, filePath));
}

// ============================================================================
// YAML Writing
// ============================================================================

/**
 * Converts internal config (camelCase) to YAML format (snake_case)
 */
export function convertConfigToYaml(config: Configuration | PartialConfiguration): YamlConfigFile {
  const result: YamlConfigFile = {};

  if (config.actor !== undefined) {
    result.actor = config.actor;
  }
  if (config.database !== undefined) {
    result.database = config.database;
  }
  if (config.storage) {
    result.storage = {};
    if (config.storage.journalMode !== undefined) {
      result.storage.journal_mode = config.storage.journalMode;
    }
    if (config.storage.busyTimeout !== undefined) {
      result.storage.busy_timeout = formatDuration(config.storage.busyTimeout);
    }
  }
  if (config.documents) {
    result.documents = {};
    if (config.documents.rootTypes !== undefined) {
      result.documents.root_types = [...config.documents.rootTypes];
    }
    if (config.documents.treeDepth !== undefined) {
      result.documents.tree_depth = config.documents.treeDepth;
    }
    if (config.documents.workspaceTitle !== undefined) {
      result.documents.workspace_title = config.documents.workspaceTitle;
    }
  }

  return result;
}

export function serializeConfigToYaml(config: Configuration | PartialConfiguration): string {
  return yaml.stringify(convertConfigToYaml(config), {
    indent: 2,
    lineWidth: 120,
  });
}

/**
 * Writes configuration to a file, creating its directory if needed
 */
export function writeConfigFile(filePath: string, config: Configuration | PartialConfiguration): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const content = `# Block store configuration\n\n${serializeConfigToYaml(config)}`;
  fs.writeFileSync(filePath, content, 'utf-8');
}
