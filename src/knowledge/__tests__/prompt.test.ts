import { describe, it, expect } from 'vitest';
import { buildSystemPrompt, selectRules } from '../prompt.js';
import { KNOWLEDGE, employee } from '../../__tests__/fakes.js';
import type { Actor } from '../../core/actor.js';

const guest: Actor = { kind: 'guest' };
const staff: Actor = { kind: 'employee', profile: employee('jane_doe') };

describe('selectRules', () => {
  it('gives guests the guest and general rules', () => {
    expect(selectRules(KNOWLEDGE, guest).map((r) => r.compact_rule)).toEqual([
      'Guests MUST NOT see salaries',
      'Always link entities',
    ]);
  });

  it('gives employees the user and general rules', () => {
    expect(selectRules(KNOWLEDGE, staff).map((r) => r.compact_rule)).toEqual([
      'Users MAY edit own notes',
      'Always link entities',
    ]);
  });
});

describe('buildSystemPrompt', () => {
  it('puts the per-run context after the rules', () => {
    const prompt = buildSystemPrompt(KNOWLEDGE, guest, '2025-03-01');

    expect(prompt.startsWith('You are AI Chatbot automating Acme Test Works.\n')).toBe(true);
    expect(prompt).toContain('Company locations: Vienna, Munich\nCompany execs: ceo_one\n');
    expect(prompt.endsWith(
      '# Rules\n- Guests MUST NOT see salaries\n- Always link entities\n\n# Current context (trust it)\nDate: 2025-03-01\nCurrent actor is GUEST (Anonymous user)'
    )).toBe(true);
  });

  it('describes an authenticated actor with their profile', () => {
    const prompt = buildSystemPrompt(KNOWLEDGE, staff, '2025-03-01');

    expect(prompt.endsWith(
      'Date: 2025-03-01\n# Current actor is authenticated user: jane doe:\n{"id":"jane_doe","name":"jane doe","skills":[],"wills":[]}'
    )).toBe(true);
  });

  it('is identical across runs for the same actor kind up to the context block', () => {
    const a = buildSystemPrompt(KNOWLEDGE, guest, '2025-03-01');
    const b = buildSystemPrompt(KNOWLEDGE, guest, '2025-04-02');
    const prefix = (p: string) => p.slice(0, p.indexOf('# Current context'));

    expect(prefix(a)).toBe(prefix(b));
  });
});
