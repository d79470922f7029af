export * from './types.js';
export { KnowledgeStore } from './store.js';
export { LocalKnowledgeStore, DEFAULT_CACHE_DIR } from './local-store.js';
export { MemoryKnowledgeStore } from './memory-store.js';
export { createKnowledgeStore, KnowledgeStoreType } from './factory.js';
export type { KnowledgeStoreConfig } from './factory.js';
export { KnowledgeDistiller, computeFingerprint, buildDistillationPrompt } from './distiller.js';
export type { LoadedKnowledge, DistillerConfig } from './distiller.js';
export { buildSystemPrompt, selectRules, relevantCategories } from './prompt.js';
