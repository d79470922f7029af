import { z } from 'zod';
import { defineContract } from '../models/structured.js';

export const RuleCategorySchema = z.enum(['applies_to_guests', 'applies_to_users', 'other']);

export const RuleSchema = z.object({
  why_relevant_summary: z.string(),
  category: RuleCategorySchema,
  compact_rule: z.string(),
});

export const DistilledKnowledgeSchema = z.object({
  company_name: z.string(),
  company_locations: z.array(z.string()).describe('list of locations where company operates'),
  company_execs: z.array(z.string()),
  rules: z.array(RuleSchema),
});

export type RuleCategory = z.infer<typeof RuleCategorySchema>;
export type Rule = z.infer<typeof RuleSchema>;
export type DistilledKnowledge = z.infer<typeof DistilledKnowledgeSchema>;

export const DistillWikiRulesContract = defineContract('DistillWikiRules', DistilledKnowledgeSchema);

export interface WikiPage {
  path: string;
  content: string;
}
