/**
 * Creates the knowledge store from configuration, environment overrides first.
 */

import type { KnowledgeStore } from './store.js';
import { ConfigurationError } from '../utils/errors.js';
import { LocalKnowledgeStore, DEFAULT_CACHE_DIR } from './local-store.js';
import { MemoryKnowledgeStore } from './memory-store.js';

export enum KnowledgeStoreType {
  LOCAL = 'local',
  MEMORY = 'memory',
}

export interface KnowledgeStoreConfig {
  provider?: KnowledgeStoreType;
  dir?: string;
}

const ENV_VARS = {
  PROVIDER: 'NEXTSTEP_CACHE_PROVIDER',
  DIR: 'NEXTSTEP_CACHE_DIR',
};

function providerFromEnv(env: NodeJS.ProcessEnv): KnowledgeStoreType | undefined {
  const value = env[ENV_VARS.PROVIDER];
  if (!value) {
    return undefined;
  }
  const match = Object.values(KnowledgeStoreType).find((type) => type === value);
  if (!match) {
    throw new ConfigurationError(`Unknown knowledge store provider "${value}" in ${ENV_VARS.PROVIDER}`);
  }
  return match;
}

export async function createKnowledgeStore(
  config: KnowledgeStoreConfig = {},
  env: NodeJS.ProcessEnv = process.env
): Promise<KnowledgeStore> {
  const type = providerFromEnv(env) ?? config.provider ?? KnowledgeStoreType.LOCAL;

  let store: KnowledgeStore;
  switch (type) {
    case KnowledgeStoreType.MEMORY:
      store = new MemoryKnowledgeStore();
      break;

    case KnowledgeStoreType.LOCAL:
    default:
      store = new LocalKnowledgeStore(env[ENV_VARS.DIR] || config.dir || DEFAULT_CACHE_DIR);
      break;
  }

  await store.initialize();
  return store;
}
