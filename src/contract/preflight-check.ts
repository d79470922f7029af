import { z } from 'zod';
import { defineContract } from '../models/structured.js';

export const DenialReasonSchema = z.enum([
  'security_violation',
  'request_not_supported_by_api',
  'more_information_needed',
  'may_pass',
]);

export const RequestPreflightCheckSchema = z.object({
  current_actor: z.string(),
  preflight_check_explanation_brief: z.string().nullable(),
  denial_reason: DenialReasonSchema,
  outcome_confidence_1_to_5: z.number().int().min(1).max(5),
  answer_requires_listing_actors_projects: z.boolean(),
});

export type DenialReason = z.infer<typeof DenialReasonSchema>;
export type RequestPreflightCheck = z.infer<typeof RequestPreflightCheckSchema>;

export const PreflightContract = defineContract('RequestPreflightCheck', RequestPreflightCheckSchema);
