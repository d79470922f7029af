/**
 * LocalKnowledgeStore - one JSON file per documentation fingerprint
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { existsSync, mkdirSync } from 'fs';
import { homedir } from 'os';
import { randomUUID } from 'crypto';
import { KnowledgeStore } from './store.js';
import { DistilledKnowledgeSchema, type DistilledKnowledge } from './types.js';
import { logger } from '../utils/logger.js';

export const DEFAULT_CACHE_DIR = path.join(homedir(), '.nextstep', 'knowledge');

export class LocalKnowledgeStore extends KnowledgeStore {
  private basePath: string;

  constructor(basePath: string = DEFAULT_CACHE_DIR) {
    super();
    this.basePath = basePath;
  }

  async initialize(): Promise<void> {
    if (!existsSync(this.basePath)) {
      mkdirSync(this.basePath, { recursive: true });
    }
    this.initialized = true;
  }

  getFilePath(fingerprint: string): string {
    return path.join(this.basePath, `context_${this.assertFingerprint(fingerprint)}_v2.json`);
  }

  async get(fingerprint: string): Promise<DistilledKnowledge | null> {
    const filePath = this.getFilePath(fingerprint);
    if (!existsSync(filePath)) {
      return null;
    }

    const content = await fs.readFile(filePath, 'utf-8');
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      logger.warn(`Ignoring unreadable knowledge record ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }

    // damaged record = miss
    const parsed = DistilledKnowledgeSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn(`Ignoring unreadable knowledge record ${filePath}: ${parsed.error.message}`);
      return null;
    }
    return parsed.data;
  }

  async put(fingerprint: string, knowledge: DistilledKnowledge): Promise<void> {
    if (!this.initialized) {
      await this.initialize();
    }
    // whole-file replace: racing writers each rename a complete temp file
    const filePath = this.getFilePath(fingerprint);
    const tempPath = `${filePath}.${process.pid}.${randomUUID()}.tmp`;
    try {
      await fs.writeFile(tempPath, JSON.stringify(knowledge, null, 2));
      await fs.rename(tempPath, filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }
  }
}
