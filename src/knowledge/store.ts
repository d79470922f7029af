/**
 * KnowledgeStore - persistence for distilled knowledge, keyed by fingerprint
 *
 * Records are create-if-absent / read-if-present: once a fingerprint has a
 * record, every later run reuses it verbatim. Writes replace the whole
 * record, so two runs racing on the same fingerprint only ever leave one
 * complete copy behind.
 */

import type { DistilledKnowledge } from './types.js';
import { AgentError } from '../utils/errors.js';

export abstract class KnowledgeStore {
  protected initialized: boolean = false;

  /**
   * Prepare the backing storage (create directories, verify access, ...)
   */
  abstract initialize(): Promise<void>;

  isInitialized(): boolean {
    return this.initialized;
  }

  /**
   * The record for a fingerprint, or null on a miss
   */
  abstract get(fingerprint: string): Promise<DistilledKnowledge | null>;

  abstract put(fingerprint: string, knowledge: DistilledKnowledge): Promise<void>;

  /**
   * Fingerprints become file names and object keys
   */
  protected assertFingerprint(fingerprint: string): string {
    if (!/^[A-Za-z0-9_-]+$/.test(fingerprint)) {
      throw new AgentError(`Invalid knowledge fingerprint: "${fingerprint}"`, 'INVALID_FINGERPRINT');
    }
    return fingerprint;
  }
}
