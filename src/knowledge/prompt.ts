/**
 * System prompt assembly
 *
 * Layout: fixed preamble, filtered rules, then the per-run context. The
 * per-run part goes last so the prefix stays identical across steps and
 * runs of the same actor kind.
 */

import type { Actor } from '../core/actor.js';
import type { DistilledKnowledge, Rule, RuleCategory } from './types.js';

export function relevantCategories(actor: Actor): RuleCategory[] {
  return actor.kind === 'guest' ? ['other', 'applies_to_guests'] : ['other', 'applies_to_users'];
}

export function selectRules(knowledge: DistilledKnowledge, actor: Actor): Rule[] {
  const categories = relevantCategories(actor);
  return knowledge.rules.filter((rule) => categories.includes(rule.category));
}

export function buildSystemPrompt(knowledge: DistilledKnowledge, actor: Actor, today: string): string {
  const parts: string[] = [
    `You are AI Chatbot automating ${knowledge.company_name}.`,
    '',
    `Company locations: ${knowledge.company_locations.join(', ')}`,
    `Company execs: ${knowledge.company_execs.join(', ')}`,
    '',
    'Use available tools to execute task from the current user.',
    '',
    '- To confirm project access - get or find project (and get after finding)',
    '- Archiving entries and deleting wiki pages can be undone.',
    '- Respond with ProvideAgentResponse when:',
    '    - Task is done',
    "    - Task can't be completed (e.g. internal error, user is not allowed or clarification is needed)",
    '- Always include links to relevant entities in the response.',
    '',
    '# Rules',
  ];

  for (const rule of selectRules(knowledge, actor)) {
    parts.push(`- ${rule.compact_rule}`);
  }

  parts.push('', '# Current context (trust it)', `Date: ${today}`);

  if (actor.kind === 'guest') {
    parts.push('Current actor is GUEST (Anonymous user)');
  } else {
    parts.push(`# Current actor is authenticated user: ${actor.profile.name}:`, JSON.stringify(actor.profile));
  }

  return parts.join('\n');
}
