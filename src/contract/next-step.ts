import { z } from 'zod';
import { ActionRequestSchema } from './actions.js';
import { defineContract } from '../models/structured.js';

export const NextStepSchema = z.object({
  current_state: z.string(),
  // only the first entry is acted on; the rest is the model thinking ahead
  plan_remaining_steps_brief: z
    .array(z.string())
    .min(1)
    .max(5)
    .describe('explain your thoughts on how to accomplish - what steps to execute'),
  task_completed: z.boolean(),
  function: ActionRequestSchema.describe('execute first remaining step'),
});

export type NextStep = z.infer<typeof NextStepSchema>;

export const NextStepContract = defineContract('NextStep', NextStepSchema);
