/**
 * Configuration Merging
 *
 * Overlays partial configurations onto a complete one, section by section.
 */

import type { Configuration, PartialConfiguration } from './types.js';
import { getDefaultConfig } from './defaults.js';

/**
 * Merges a partial configuration over a base configuration.
 * Undefined values in the partial leave the base value in place.
 */
export function mergeConfiguration(base: Configuration, partial: PartialConfiguration): Configuration {
  const result = cloneConfiguration(base);

  if (partial.actor !== undefined) {
    result.actor = partial.actor;
  }
  if (partial.database !== undefined) {
    result.database = partial.database;
  }
  if (partial.storage) {
    const { journalMode, busyTimeout } = partial.storage;
    if (journalMode !== undefined) result.storage.journalMode = journalMode;
    if (busyTimeout !== undefined) result.storage.busyTimeout = busyTimeout;
  }
  if (partial.documents) {
    const { rootTypes, treeDepth, workspaceTitle } = partial.documents;
    if (rootTypes !== undefined) result.documents.rootTypes = [...rootTypes];
    if (treeDepth !== undefined) result.documents.treeDepth = treeDepth;
    if (workspaceTitle !== undefined) result.documents.workspaceTitle = workspaceTitle;
  }

  return result;
}

/**
 * Merges several partial configurations in order (later wins)
 */
export function mergeConfigurations(base: Configuration, ...partials: PartialConfiguration[]): Configuration {
  return partials.reduce(mergeConfiguration, base);
}

/**
 * Creates a complete configuration from defaults plus a partial
 */
export function createConfiguration(partial?: PartialConfiguration): Configuration {
  const defaults = getDefaultConfig();
  return partial ? mergeConfiguration(defaults, partial) : defaults;
}

export function cloneConfiguration(config: Configuration): Configuration {
  return {
    actor: config.actor,
    database: config.database,
    storage: { ...config.storage },
    documents: { ...config.documents, rootTypes: [...config.documents.rootTypes] },
  };
}
