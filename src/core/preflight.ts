/**
 * Preflight Security Gate
 *
 * One classification pass before the first step. Only a confident
 * (>= 4) security or unsupported-request verdict ends the run; every other
 * verdict lets the loop start, with the explanation kept as a note.
 */

import type { Message } from '../models/base.js';
import type { StructuredModel } from '../models/structured.js';
import type { Outcome } from '../api/schemas.js';
import { PreflightContract, type RequestPreflightCheck } from '../contract/preflight-check.js';
import { logger } from '../utils/logger.js';

export const PREFLIGHT_CONFIDENCE_THRESHOLD = 4;

export type PreflightDecision =
  | { kind: 'deny'; outcome: Outcome; message: string; verdict: RequestPreflightCheck }
  | { kind: 'proceed'; note: string | null; verdict: RequestPreflightCheck };

export function decidePreflight(verdict: RequestPreflightCheck): PreflightDecision {
  const note = verdict.preflight_check_explanation_brief;

  if (verdict.outcome_confidence_1_to_5 >= PREFLIGHT_CONFIDENCE_THRESHOLD) {
    switch (verdict.denial_reason) {
      case 'security_violation':
        return { kind: 'deny', outcome: 'denied_security', message: 'Security check failed', verdict };
      case 'request_not_supported_by_api':
        return { kind: 'deny', outcome: 'none_unsupported', message: 'Not supported', verdict };
      case 'more_information_needed':
      case 'may_pass':
        break;
    }
  }

  return { kind: 'proceed', note: note ? note : null, verdict };
}

export async function runPreflight(
  model: StructuredModel,
  messages: readonly Message[]
): Promise<PreflightDecision> {
  const verdict = await model.query(messages, PreflightContract);
  const decision = decidePreflight(verdict);

  const confidence = verdict.outcome_confidence_1_to_5;
  if (decision.kind === 'deny') {
    logger.warn(`PREFLIGHT ${confidence} (${verdict.denial_reason}): ${verdict.preflight_check_explanation_brief ?? ''}`);
  } else {
    logger.debug(`Preflight ${confidence} (${verdict.denial_reason}) passed: ${verdict.preflight_check_explanation_brief ?? ''}`);
  }

  return decision;
}
