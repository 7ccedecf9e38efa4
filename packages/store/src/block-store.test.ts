import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { createBlock } from '@blockstore/core';
import { CURRENT_SCHEMA_VERSION } from '@blockstore/storage';
import { createBlockStore, resolveDatabasePath, type BlockStore } from './block-store.js';
import { clearConfigCache } from './config/config.js';

const ACTOR_ID = '00000000-0000-4000-8000-000000000b01';

const CONFIG_YAML = `database: store.db
storage:
  journal_mode: delete
documents:
  root_types: [document, workspace]
  tree_depth: 2
`;

describe('resolveDatabasePath', () => {
  it('should keep in-memory and absolute paths', () => {
    expect(resolveDatabasePath(':memory:', '/srv/app')).toBe(':memory:');
    expect(resolveDatabasePath('/var/lib/blocks.db', '/srv/app')).toBe('/var/lib/blocks.db');
  });

  it('should resolve relative paths against the base directory', () => {
    expect(resolveDatabasePath('data/blocks.db', '/srv/app')).toBe('/srv/app/data/blocks.db');
  });
});

describe('createBlockStore', () => {
  let store: BlockStore | undefined;
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'blockstore-store-'));
  });

  afterEach(() => {
    store?.close();
    store = undefined;
    clearConfigCache();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should open an in-memory store with a current schema', () => {
    store = createBlockStore({ database: ':memory:', skipFile: true, skipEnv: true });

    expect(store.backend.path).toBe(':memory:');
    expect(store.backend.getSchemaVersion()).toBe(CURRENT_SCHEMA_VERSION);
    expect(store.config.documents.treeDepth).toBe(1);

    const doc = createBlock({ type: 'document', properties: { title: 'Controls Handbook' } });
    store.documents.saveBlocks([doc]);
    expect(store.blocks.getBlock(doc.id)?.id).toBe(doc.id);
  });

  it('should apply the configuration file', () => {
    fs.mkdirSync(path.join(tempDir, '.blockstore'));
    fs.writeFileSync(path.join(tempDir, '.blockstore', 'config.yaml'), CONFIG_YAML);

    store = createBlockStore({ startDir: tempDir, skipEnv: true });

    expect(store.backend.path).toBe(path.join(tempDir, '.blockstore', 'store.db'));
    expect(fs.existsSync(path.join(tempDir, '.blockstore', 'store.db'))).toBe(true);
    expect(store.backend.queryOne<{ journal_mode: string }>('PRAGMA journal_mode')?.journal_mode).toBe('delete');
    expect(store.config.documents.treeDepth).toBe(2);

    const workspace = createBlock({ type: 'workspace', properties: { title: 'Default Workspace' } });
    store.documents.saveBlocks([workspace]);
    expect(store.documents.getRootTree(workspace.id).id).toBe(workspace.id);
  });

  it('should let an explicit database win over the file', () => {
    fs.mkdirSync(path.join(tempDir, '.blockstore'));
    fs.writeFileSync(path.join(tempDir, '.blockstore', 'config.yaml'), CONFIG_YAML);

    store = createBlockStore({ startDir: tempDir, skipEnv: true, database: ':memory:' });

    expect(store.backend.path).toBe(':memory:');
    expect(store.config.storage.journalMode).toBe('delete');
  });

  it('should resolve a relative database against the start directory without a config dir', () => {
    store = createBlockStore({ startDir: tempDir, skipFile: true, skipEnv: true, database: 'local.db' });

    expect(store.backend.path).toBe(path.join(tempDir, 'local.db'));
  });

  it('should stamp new workspaces with the configured actor', () => {
    store = createBlockStore({
      database: ':memory:',
      skipFile: true,
      skipEnv: true,
      overrides: { actor: ACTOR_ID },
    });

    const workspace = store.ensureWorkspace({ title: 'Audit' });

    expect(workspace.createdBy).toBe(ACTOR_ID);
    expect(store.ensureWorkspace().id).toBe(workspace.id);
  });

  it('should release the connection on close', () => {
    store = createBlockStore({ database: ':memory:', skipFile: true, skipEnv: true });
    const { backend } = store;

    store.close();
    store = undefined;
    expect(backend.isOpen).toBe(false);
  });
});
