/**
 * Knowledge Distiller
 *
 * Condenses the company wiki into a small rule set once per wiki snapshot.
 * The snapshot is identified by a fingerprint; later runs on the same
 * snapshot load the stored record and never query the model again.
 */

import { createHash } from 'crypto';
import type { DomainClient } from '../api/client.js';
import type { WhoAmI } from '../api/schemas.js';
import { NextStepContract } from '../contract/next-step.js';
import type { StructuredModel } from '../models/structured.js';
import type { KnowledgeStore } from './store.js';
import { DistillWikiRulesContract, type DistilledKnowledge, type WikiPage } from './types.js';
import { logger } from '../utils/logger.js';

export interface DistillerConfig {
  client: DomainClient;
  model: StructuredModel;
  store: KnowledgeStore;
}

export interface LoadedKnowledge {
  fingerprint: string;
  knowledge: DistilledKnowledge;
  /** true when this call ran the distillation */
  distilled: boolean;
}

export function computeFingerprint(pages: readonly WikiPage[]): string {
  const hash = createHash('sha1');
  const sorted = [...pages].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  for (const page of sorted) {
    hash.update(page.path);
    hash.update('\0');
    hash.update(page.content);
    hash.update('\0');
  }
  return hash.digest('hex');
}

export function buildDistillationPrompt(pages: readonly WikiPage[]): string {
  const schema = JSON.stringify(NextStepContract.jsonSchema());

  let prompt = `
Carefully review the wiki below and identify the most important security, scoping and data rules that matter to an agent or user automating the APIs of this company.

Pay attention to rules that mention an AI Agent or a Public ChatBot. Rules about the Public Chatbot are applies_to_guests.

Rules must be compact and RFC-style; pseudo code is fine. They will be used by an agent that operates the following APIs: ${schema}
`.trim();

  for (const page of pages) {
    prompt += `\n---- start of ${page.path} ----\n\n${page.content}\n\n ---- end of ${page.path} ----\n`;
  }

  return prompt;
}

export class KnowledgeDistiller {
  private client: DomainClient;
  private model: StructuredModel;
  private store: KnowledgeStore;

  constructor(config: DistillerConfig) {
    this.client = config.client;
    this.model = config.model;
    this.store = config.store;
  }

  async load(about: WhoAmI): Promise<LoadedKnowledge> {
    let pages: WikiPage[] | undefined;
    let fingerprint = about.wiki_sha1;

    if (!fingerprint) {
      pages = await this.loadPages();
      fingerprint = computeFingerprint(pages);
    }

    const cached = await this.store.get(fingerprint);
    if (cached) {
      logger.debug(`Reusing distilled knowledge ${fingerprint}`);
      return { fingerprint, knowledge: cached, distilled: false };
    }

    logger.info('New context discovered. Distilling rules once');
    pages = pages ?? (await this.loadPages());

    const knowledge = await this.model.query(
      [{ role: 'system', content: buildDistillationPrompt(pages) }],
      DistillWikiRulesContract
    );
    await this.store.put(fingerprint, knowledge);

    logger.success(`Distilled ${knowledge.rules.length} rule(s) from ${pages.length} wiki page(s)`);
    return { fingerprint, knowledge, distilled: true };
  }

  private async loadPages(): Promise<WikiPage[]> {
    const listing = await this.client.listWiki();
    const pages: WikiPage[] = [];
    for (const path of listing.paths) {
      pages.push({ path, content: await this.client.loadWiki(path) });
    }
    return pages;
  }
}
