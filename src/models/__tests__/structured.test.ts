import { describe, it, expect } from 'vitest';
import { NextStepContract } from '../../contract/next-step.js';
import { PreflightContract } from '../../contract/preflight-check.js';
import { SchemaValidationError } from '../../utils/errors.js';

describe('NextStepContract', () => {
  it('accepts a step with a known action', () => {
    const step = NextStepContract.parse({
      current_state: 'looking up',
      plan_remaining_steps_brief: ['get project'],
      task_completed: false,
      function: { tool: '/projects/get', id: 'p1' },
    });

    expect(step.function).toEqual({ tool: '/projects/get', id: 'p1' });
  });

  it('rejects an unknown action', () => {
    expect(() =>
      NextStepContract.parse({
        current_state: 'x',
        plan_remaining_steps_brief: ['y'],
        task_completed: false,
        function: { tool: '/payroll/run' },
      })
    ).toThrow(SchemaValidationError);
  });

  it('rejects a plan longer than five steps', () => {
    expect(() =>
      NextStepContract.parse({
        current_state: 'x',
        plan_remaining_steps_brief: ['1', '2', '3', '4', '5', '6'],
        task_completed: false,
        function: { tool: '/wiki/list' },
      })
    ).toThrow(SchemaValidationError);
  });

  it('inlines every action in the JSON schema', () => {
    const schema = NextStepContract.jsonSchema();
    const text = JSON.stringify(schema);

    expect(text).toContain('"/all-projects-for-user"');
    expect(text).toContain('"/wiki/delete"');
    expect(text).not.toContain('$ref');
  });
});

describe('PreflightContract', () => {
  it('rejects a confidence outside 1 to 5', () => {
    expect(() =>
      PreflightContract.parse({
        current_actor: 'guest',
        preflight_check_explanation_brief: null,
        denial_reason: 'may_pass',
        outcome_confidence_1_to_5: 6,
        answer_requires_listing_actors_projects: false,
      })
    ).toThrow(SchemaValidationError);
  });
});
