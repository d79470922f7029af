import { KnowledgeStore } from './store.js';
import type { DistilledKnowledge } from './types.js';

export class MemoryKnowledgeStore extends KnowledgeStore {
  private records = new Map<string, DistilledKnowledge>();

  async initialize(): Promise<void> {
    this.initialized = true;
  }

  async get(fingerprint: string): Promise<DistilledKnowledge | null> {
    const record = this.records.get(this.assertFingerprint(fingerprint));
    return record ? structuredClone(record) : null;
  }

  async put(fingerprint: string, knowledge: DistilledKnowledge): Promise<void> {
    this.records.set(this.assertFingerprint(fingerprint), structuredClone(knowledge));
  }

  has(fingerprint: string): boolean {
    return this.records.has(fingerprint);
  }
}
