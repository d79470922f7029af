/**
 * Run lifecycle
 *
 *   Preflight ──► AwaitingDecision ──► Dispatching ──► AwaitingDecision ...
 *       │                │                  │
 *       ▼                ▼                  ▼
 *   Terminated       Exhausted          Terminated
 *
 * Terminated and Exhausted are final. The step counter only moves on
 * AwaitingDecision -> Dispatching and never exceeds the budget.
 */

import { RunStateError } from '../utils/errors.js';

export enum RunState {
  PREFLIGHT = 'Preflight',
  AWAITING_DECISION = 'AwaitingDecision',
  DISPATCHING = 'Dispatching',
  TERMINATED = 'Terminated',
  EXHAUSTED = 'Exhausted',
}

export const TRANSITIONS: Readonly<Record<RunState, readonly RunState[]>> = {
  [RunState.PREFLIGHT]: [RunState.AWAITING_DECISION, RunState.TERMINATED],
  [RunState.AWAITING_DECISION]: [RunState.DISPATCHING, RunState.EXHAUSTED],
  [RunState.DISPATCHING]: [RunState.AWAITING_DECISION, RunState.TERMINATED],
  [RunState.TERMINATED]: [],
  [RunState.EXHAUSTED]: [],
};

export class RunStateMachine {
  private current: RunState = RunState.PREFLIGHT;
  private stepCount = 0;
  readonly maxSteps: number;

  constructor(maxSteps: number) {
    if (!Number.isInteger(maxSteps) || maxSteps < 1) {
      throw new RunStateError(`maxSteps must be a positive integer, got ${maxSteps}`);
    }
    this.maxSteps = maxSteps;
  }

  get state(): RunState {
    return this.current;
  }

  get steps(): number {
    return this.stepCount;
  }

  isFinal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  canTransition(to: RunState): boolean {
    return TRANSITIONS[this.current].includes(to);
  }

  transition(to: RunState): void {
    if (!this.canTransition(to)) {
      throw new RunStateError(`Illegal run transition ${this.current} -> ${to}`);
    }
    if (to === RunState.DISPATCHING) {
      this.stepCount++;
    }
    this.current = to;
  }

  budgetExhausted(): boolean {
    return this.stepCount >= this.maxSteps;
  }
}
