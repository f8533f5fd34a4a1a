/**
 * Orchestrator State Machine
 *
 * Enforces the advisory lifecycle:
 *
 *   CLASSIFYING -> GATHERING -> DRAFTING -> DEBATING -> FINALIZING -> DONE
 *
 * DEBATING may loop back to DRAFTING once per flag or refutation, bounded by
 * maxDebateTurns. DRAFTING -> FINALIZING is only legal once the thesis has
 * been reviewed at least once. Any non-terminal state may move to ABORTED.
 */

import { EventEmitter } from 'events';
import pino from 'pino';
import { loggers } from '../logging/index.js';
import { OrchestratorState } from '../../types/decision.js';

const logger = pino({
  name: 'orchestrator-state-machine',
  level: process.env.LOG_LEVEL || 'info',
});

/**
 * Transition map: from state -> allowed destination states
 */
const TRANSITIONS: Map<OrchestratorState, OrchestratorState[]> = new Map([
  [OrchestratorState.CLASSIFYING, [OrchestratorState.GATHERING, OrchestratorState.ABORTED]],
  [OrchestratorState.GATHERING, [OrchestratorState.DRAFTING, OrchestratorState.ABORTED]],
  [OrchestratorState.DRAFTING, [OrchestratorState.DEBATING, OrchestratorState.FINALIZING, OrchestratorState.ABORTED]],
  [OrchestratorState.DEBATING, [OrchestratorState.DRAFTING, OrchestratorState.FINALIZING, OrchestratorState.ABORTED]],
  [OrchestratorState.FINALIZING, [OrchestratorState.DONE, OrchestratorState.ABORTED]],

  // Terminal states
  [OrchestratorState.DONE, []],
  [OrchestratorState.ABORTED, []],
]);

export interface StateTransitionEvent {
  correlationId: string;
  from: OrchestratorState;
  to: OrchestratorState;
  elapsedMs: number;
}

export class InvalidTransitionError extends Error {
  constructor(public readonly from: OrchestratorState, public readonly to: OrchestratorState, reason?: string) {
    super(`Invalid transition from ${from} to ${to}${reason ? `: ${reason}` : ''}`);
    this.name = 'InvalidTransitionError';
  }
}

export class OrchestratorStateMachine extends EventEmitter {
  private state: OrchestratorState = OrchestratorState.CLASSIFYING;
  private enteredAt: number;
  private drafts = 0;
  private reviews = 0;

  constructor(
    private readonly correlationId: string,
    private readonly maxDebateTurns: number,
    private readonly now: () => number = Date.now
  ) {
    super();
    this.enteredAt = this.now();
  }

  /**
   * Move to a new state or throw InvalidTransitionError
   */
  transition(to: OrchestratorState): void {
    const from = this.state;
    const reason = this.rejectReason(from, to);
    if (reason) {
      logger.error({ correlationId: this.correlationId, from, to, reason }, 'Invalid transition');
      throw new InvalidTransitionError(from, to, reason);
    }

    const timestamp = this.now();
    const elapsedMs = timestamp - this.enteredAt;
    this.state = to;
    this.enteredAt = timestamp;
    if (to === OrchestratorState.DRAFTING) this.drafts++;
    if (to === OrchestratorState.DEBATING) this.reviews++;

    loggers.stateTransition(this.correlationId, from, to, elapsedMs);
    const event: StateTransitionEvent = { correlationId: this.correlationId, from, to, elapsedMs };
    this.emit('state_transition', event);

    if (to === OrchestratorState.DONE) this.emit('completed', this.correlationId);
    if (to === OrchestratorState.ABORTED) this.emit('aborted', this.correlationId, from);
  }

  isValidTransition(from: OrchestratorState, to: OrchestratorState): boolean {
    return TRANSITIONS.get(from)?.includes(to) ?? false;
  }

  /**
   * Whether another DEBATING -> DRAFTING loop fits within maxDebateTurns
   */
  canRedraft(): boolean {
    return this.state === OrchestratorState.DEBATING && this.drafts < this.maxDebateTurns;
  }

  getState(): OrchestratorState {
    return this.state;
  }

  getReviewCount(): number {
    return this.reviews;
  }

  isTerminal(): boolean {
    return this.state === OrchestratorState.DONE || this.state === OrchestratorState.ABORTED;
  }

  private rejectReason(from: OrchestratorState, to: OrchestratorState): string | undefined {
    if (!this.isValidTransition(from, to)) {
      return 'not in transition map';
    }
    if (from === OrchestratorState.DRAFTING && to === OrchestratorState.FINALIZING && this.reviews === 0) {
      return 'thesis must be reviewed before finalizing';
    }
    if (from === OrchestratorState.DEBATING && to === OrchestratorState.DRAFTING && this.drafts >= this.maxDebateTurns) {
      return `debate turns exhausted (${this.maxDebateTurns})`;
    }
    return undefined;
  }
}
