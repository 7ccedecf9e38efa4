/**
 * Workspace bootstrap
 */

import { createBlock, createLogger, isBlockOfType, type Block, type BlockId } from '@blockstore/core';
import type { DocumentStore } from '../api/types.js';
import { DEFAULT_DOCUMENTS_CONFIG } from '../config/defaults.js';

const logger = createLogger('workspace');

export interface EnsureWorkspaceOptions {
  /** Preferred workspace; also the id given to a newly created one */
  workspaceId?: BlockId;
  /** Title for a newly created workspace (default: 'Default Workspace') */
  title?: string;
  /** Recorded as creator of a newly created workspace */
  actor?: BlockId;
}

/**
 * Return the requested workspace, else the first existing one, else a new one.
 */
export function ensureWorkspace(store: DocumentStore, options: EnsureWorkspaceOptions = {}): Block<'workspace'> {
  const existing = store
    .queryBlocks({ where: { type: 'workspace' } })
    .filter((block): block is Block<'workspace'> => isBlockOfType(block, 'workspace'));

  const requested = existing.find((block) => block.id === options.workspaceId);
  if (requested) {
    return requested;
  }
  if (existing.length > 0) {
    return existing[0];
  }

  const workspace = createBlock({
    type: 'workspace',
    id: options.workspaceId,
    properties: { title: options.title ?? DEFAULT_DOCUMENTS_CONFIG.workspaceTitle },
    createdBy: options.actor,
  });
  store.saveBlocks([workspace]);
  logger.info(`Created workspace ${workspace.id}`);
  return workspace;
}
