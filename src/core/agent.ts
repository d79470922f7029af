/**
 * Task Agent - the decision loop
 *
 * For one task: build the system prompt from distilled knowledge, run the
 * preflight gate, then ask the model for one action at a time, execute it
 * and feed the observation back, until the agent answers or the step
 * budget runs out.
 */

import type { DomainClient } from '../api/client.js';
import type { ProvideAgentResponse } from '../api/schemas.js';
import { actionName, isTerminal, type ActionRequest } from '../contract/actions.js';
import { NextStepContract, type NextStep } from '../contract/next-step.js';
import type { Message } from '../models/base.js';
import type { StructuredModel } from '../models/structured.js';
import { KnowledgeDistiller } from '../knowledge/distiller.js';
import type { KnowledgeStore } from '../knowledge/store.js';
import { buildSystemPrompt } from '../knowledge/prompt.js';
import { actorId, resolveActor } from './actor.js';
import { ConversationLog } from './conversation-log.js';
import { ActionDispatcher } from './dispatcher.js';
import { runPreflight } from './preflight.js';
import { RunState, RunStateMachine } from './run-state.js';
import { DomainApiError, RunStateError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export const DEFAULT_MAX_STEPS = 20;

export interface Task {
  taskId: string;
  specId: string;
  taskText: string;
}

export interface AgentConfig {
  model: StructuredModel;
  client: DomainClient;
  store: KnowledgeStore;
  maxSteps?: number;
  /** Starting page size for the aggregated "all X for user" actions. */
  initialPageSize?: number;
}

export type RunStatus = 'completed' | 'denied' | 'exhausted';

export interface RunOutcome {
  status: RunStatus;
  steps: number;
  /** The terminal response as sent, absent when the budget ran out. */
  response?: ProvideAgentResponse;
  fingerprint: string;
  log: Message[];
}

interface PendingAction {
  callId: string;
  decision: NextStep;
}

export class TaskAgent {
  private model: StructuredModel;
  private client: DomainClient;
  private distiller: KnowledgeDistiller;
  private maxSteps: number;
  private initialPageSize?: number;

  constructor(config: AgentConfig) {
    this.model = config.model;
    this.client = config.client;
    this.distiller = new KnowledgeDistiller({
      client: config.client,
      model: config.model,
      store: config.store,
    });
    this.maxSteps = config.maxSteps ?? DEFAULT_MAX_STEPS;
    this.initialPageSize = config.initialPageSize;
  }

  async run(task: Task): Promise<RunOutcome> {
    const about = await this.client.whoAmI();
    const actor = await resolveActor(this.client, about);
    const { fingerprint, knowledge } = await this.distiller.load(about);

    const log = new ConversationLog();
    log.system(buildSystemPrompt(knowledge, actor, about.today));
    log.user(`Request: '${task.taskText}'`);

    const dispatcher = new ActionDispatcher(this.client, {
      currentUser: actorId(actor),
      initialPageSize: this.initialPageSize,
    });
    const machine = new RunStateMachine(this.maxSteps);

    let pending: PendingAction | undefined;
    let response: ProvideAgentResponse | undefined;
    let status: RunStatus = 'exhausted';

    while (!machine.isFinal()) {
      switch (machine.state) {
        case RunState.PREFLIGHT: {
          const decision = await runPreflight(this.model, log.entries());
          if (decision.kind === 'deny') {
            response = { tool: '/respond', message: decision.message, outcome: decision.outcome, links: [] };
            logger.debug(`Denial delivered: ${await this.observe(dispatcher, response)}`);
            status = 'denied';
            machine.transition(RunState.TERMINATED);
            break;
          }

          if (decision.note) {
            log.system(decision.note);
          }
          machine.transition(RunState.AWAITING_DECISION);
          break;
        }

        case RunState.AWAITING_DECISION: {
          if (machine.budgetExhausted()) {
            machine.transition(RunState.EXHAUSTED);
            break;
          }

          const callId = `step_${machine.steps + 1}`;
          const decision = await this.model.query(log.entries(), NextStepContract);
          const name = actionName(decision.function);
          const arguments_ = JSON.stringify(decision.function);

          logger.info(`Next ${callId}... ${decision.plan_remaining_steps_brief[0]}`);
          logger.debug(`  ${name} ${arguments_}`);

          log.assistantCall(decision.plan_remaining_steps_brief[0], {
            id: callId,
            type: 'function',
            function: { name, arguments: arguments_ },
          });

          pending = { callId, decision };
          machine.transition(RunState.DISPATCHING);
          break;
        }

        case RunState.DISPATCHING: {
          if (!pending) {
            throw new RunStateError('Dispatching without a pending action');
          }
          const { callId, decision } = pending;
          pending = undefined;

          const action = decision.function;
          log.toolResult(callId, await this.observe(dispatcher, action));

          if (isTerminal(action)) {
            response = dispatcher.withoutSelfLinks(action);
            status = 'completed';
            this.traceResponse(response);
            machine.transition(RunState.TERMINATED);
          } else {
            machine.transition(RunState.AWAITING_DECISION);
          }
          break;
        }

        case RunState.TERMINATED:
        case RunState.EXHAUSTED:
          break;
      }
    }

    if (status === 'exhausted') {
      logger.warn(`Step budget of ${this.maxSteps} exhausted without a response`);
    }

    return {
      status,
      steps: machine.steps,
      response,
      fingerprint,
      log: log.entries(),
    };
  }

  /**
   * Executes the action and renders the observation for the model. Service
   * rejections become `ERROR:` observations; anything else ends the run.
   */
  private async observe(dispatcher: ActionDispatcher, action: ActionRequest): Promise<string> {
    try {
      const result = await dispatcher.dispatch(action);
      const text = JSON.stringify(result);
      logger.trace('out', text);
      return `DONE: ${text}`;
    } catch (error) {
      if (!(error instanceof DomainApiError)) {
        throw error;
      }
      logger.trace('err', `${error.apiCode}: ${error.message}`);
      return `ERROR: ${error.detail ?? error.message}`;
    }
  }

  private traceResponse(response: ProvideAgentResponse): void {
    logger.trace('agent', `${response.outcome}. Summary:\n${response.message}`);
    for (const link of response.links) {
      logger.info(`  - link ${link.kind}: ${link.id}`);
    }
  }
}
