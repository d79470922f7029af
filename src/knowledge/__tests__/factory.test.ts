import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { createKnowledgeStore, KnowledgeStoreType } from '../factory.js';
import { LocalKnowledgeStore } from '../local-store.js';
import { MemoryKnowledgeStore } from '../memory-store.js';
import { ConfigurationError } from '../../utils/errors.js';

describe('createKnowledgeStore', () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('uses the configured provider', async () => {
    const store = await createKnowledgeStore({ provider: KnowledgeStoreType.MEMORY }, {});

    expect(store).toBeInstanceOf(MemoryKnowledgeStore);
    expect(store.isInitialized()).toBe(true);
  });

  it('lets the environment override the provider and directory', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'nextstep-factory-'));
    dirs.push(dir);

    const store = await createKnowledgeStore(
      { provider: KnowledgeStoreType.MEMORY },
      { NEXTSTEP_CACHE_PROVIDER: 'local', NEXTSTEP_CACHE_DIR: dir }
    );

    expect(store).toBeInstanceOf(LocalKnowledgeStore);
    expect(store instanceof LocalKnowledgeStore && store.getFilePath('x')).toBe(path.join(dir, 'context_x_v2.json'));
  });

  it('refuses an unknown provider name', async () => {
    await expect(createKnowledgeStore({}, { NEXTSTEP_CACHE_PROVIDER: 's3' })).rejects.toBeInstanceOf(ConfigurationError);
  });
});
