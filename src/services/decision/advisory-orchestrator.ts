/**
 * Advisory Orchestrator
 *
 * Coordinates one advisory request end to end:
 *
 *   1. Classify the question into an intent and a specialist set
 *   2. Run the specialist burst and stream each result as it settles
 *   3. Draft the thesis through the R-Stitch router, streaming segments
 *   4. Debate: the critic reviews, the proposer rebuts flags and refutations
 *   5. Score confidence, gate any trade action, publish the final event
 *
 * The orchestrator is the only writer of its state machine and of the
 * events it publishes. Every completed phase is recorded as one trace hop.
 * A client abort or the request budget cancels in-flight model calls
 * through a single AbortController.
 */

import { createLogger, loggers } from '../logging/index.js';
import { runSpecialistBurst } from '../specialists/burst.js';
import { stitchEvidenceNarrative } from '../agents/proposer-agent.js';
import { OrchestratorStateMachine } from './state-machine.js';
import { estimateConfidence } from './confidence-estimator.js';
import { createDecisionContext } from './decision-context.js';
import { requiresHumanApproval, type ActionGate } from './action-gate.js';
import {
  DEFAULT_CONFIDENCE_CONFIG,
  DEFAULT_ORCHESTRATION_CONFIG,
  type ConfidenceConfig,
  type OrchestrationConfig,
} from '../../config/advisory.js';
import { OrchestratorState } from '../../types/decision.js';
import type { IntentClassifier } from '../agents/intent-classifier.js';
import type { ProposerAgent } from '../agents/proposer-agent.js';
import type { CriticAgent } from '../agents/critic-agent.js';
import type { SpecialistRegistry } from '../specialists/registry.js';
import type { TraceRecorder } from '../telemetry/trace-recorder.js';
import type { Trajectory } from '../router/rstitch-router.js';
import type { ModelError } from '../../types/llm.js';
import type { Result } from '../../types/result.js';
import type {
  DebateTurn,
  DecisionContext,
  Degradation,
  OrchestrationFailure,
  ReasoningSegment,
} from '../../types/decision.js';
import type { ContextSnapshot, IntentClassification, SpecialistResult } from '../../types/specialist.js';
import type { StatusPayload, StreamEvent } from '../../types/stream.js';

const logger = createLogger({ module: 'AdvisoryOrchestrator' });

export interface AdvisoryRequest {
  correlationId: string;
  query: string;
  accountScope?: string;
  /** Thesis being challenged by a follow-up request */
  priorThesis?: string;
  challenge?: string;
}

export interface OrchestratorDependencies {
  classifier: IntentClassifier;
  specialists: SpecialistRegistry;
  proposer: ProposerAgent;
  critic: CriticAgent;
  actionGate?: ActionGate;
  orchestration?: OrchestrationConfig;
  confidence?: ConfidenceConfig;
  now?: () => number;
}

export type OrchestrationOutcome =
  | { status: 'done'; context: DecisionContext }
  | { status: 'failed'; reason: OrchestrationFailure; message: string }
  | { status: 'aborted'; reason: string };

type StopReason = 'client_abort' | 'budget_exceeded';

/**
 * Working state accumulated across phases. Only the coordinating task
 * touches it; readers get the frozen DecisionContext.
 */
interface WorkingState {
  classification?: IntentClassification;
  specialistResults: SpecialistResult[];
  thesis?: string;
  segments: ReasoningSegment[];
  debate: DebateTurn[];
  reservations: string[];
  degradations: Degradation[];
  nextSegmentIndex: number;
}

export class AdvisoryOrchestrator {
  private readonly stateMachine: OrchestratorStateMachine;
  private readonly controller = new AbortController();
  private readonly orchestration: OrchestrationConfig;
  private readonly confidenceConfig: ConfidenceConfig;
  private readonly now: () => number;
  private stopReason: StopReason | undefined;
  private abortMessage = 'client_abort';
  private budgetTimer: NodeJS.Timeout | null = null;
  private started = false;
  private readonly work: WorkingState = {
    specialistResults: [],
    segments: [],
    debate: [],
    reservations: [],
    degradations: [],
    nextSegmentIndex: 0,
  };

  constructor(
    private readonly request: AdvisoryRequest,
    private readonly deps: OrchestratorDependencies,
    private readonly publish: (event: StreamEvent) => void,
    private readonly recorder: TraceRecorder
  ) {
    this.orchestration = deps.orchestration ?? DEFAULT_ORCHESTRATION_CONFIG;
    this.confidenceConfig = deps.confidence ?? DEFAULT_CONFIDENCE_CONFIG;
    this.now = deps.now ?? Date.now;
    this.stateMachine = new OrchestratorStateMachine(
      request.correlationId,
      this.orchestration.maxDebateTurns,
      this.now
    );
  }

  get correlationId(): string {
    return this.request.correlationId;
  }

  getState(): OrchestratorState {
    return this.stateMachine.getState();
  }

  isStopped(): boolean {
    return this.stateMachine.isTerminal() || this.controller.signal.aborted;
  }

  /**
   * Cancel the request. In-flight model calls are aborted and an aborted
   * event is published once the coordinating task observes it.
   */
  stop(reason: string = 'client_abort'): void {
    if (this.isStopped()) return;
    logger.info({ correlationId: this.correlationId, reason }, 'Abort requested');
    this.stopReason = 'client_abort';
    this.abortMessage = reason;
    this.controller.abort();
  }

  /**
   * Run the request to a terminal state. Never rejects: unexpected errors
   * become an internal_error event.
   */
  async run(): Promise<OrchestrationOutcome> {
    if (this.started) {
      throw new Error(`Orchestrator for ${this.correlationId} has already run`);
    }
    this.started = true;
    this.startBudget();
    loggers.advisoryLifecycle(this.correlationId, 'started', { queryLength: this.request.query.length });

    try {
      const outcome = await this.execute();
      loggers.advisoryLifecycle(this.correlationId, outcomeLifecycle(outcome), {
        hops: this.recorder.hopCount,
        ...(outcome.status === 'done'
          ? { confidence: outcome.context.confidence.score, debateTurns: outcome.context.debate.length }
          : { reason: outcome.reason }),
      });
      return outcome;
    } catch (error) {
      loggers.error('Orchestration failed unexpectedly', error, { correlationId: this.correlationId });
      const message = error instanceof Error ? error.message : String(error);
      const outcome = this.fail('internal_error', `Internal error: ${message}`);
      loggers.advisoryLifecycle(this.correlationId, 'failed', { reason: 'internal_error' });
      return outcome;
    } finally {
      this.clearBudget();
    }
  }

  private async execute(): Promise<OrchestrationOutcome> {
    const classification = await this.classify();
    if (!classification) return this.halt();

    const burstOk = await this.gather(classification);
    if (this.controller.signal.aborted) return this.halt();
    if (!burstOk) {
      return this.fail('all_specialists_failed', 'Every selected specialist failed; no evidence to advise on');
    }

    const drafted = await this.draftThesis(classification);
    if (this.controller.signal.aborted) return this.halt();
    if (!drafted) {
      return this.fail('draft_failed', 'The thesis could not be drafted and no specialist evidence was available');
    }

    return this.debate();
  }

  // ==========================================================================
  // Phases
  // ==========================================================================

  private async classify(): Promise<IntentClassification | undefined> {
    this.emitStatus({ state: OrchestratorState.CLASSIFYING, message: 'Classifying question' });
    const start = this.now();
    const result = await this.deps.classifier.classify(this.request.query, {
      correlationId: this.correlationId,
      accountScope: this.request.accountScope,
      signal: this.controller.signal,
    });
    if (!result.ok) return undefined;

    const classification = result.value;
    this.work.classification = classification;
    this.recorder.record(
      'intent_classifier',
      { query: this.request.query, accountScope: this.request.accountScope ?? null },
      classification,
      this.now() - start,
      classification.usage
    );
    if (classification.fallback) {
      this.degrade('intent_fallback');
    }
    return classification;
  }

  /**
   * @returns false when every selected specialist failed
   */
  private async gather(classification: IntentClassification): Promise<boolean> {
    const selected = this.deps.specialists.select(classification.specialists);
    this.stateMachine.transition(OrchestratorState.GATHERING);
    this.emitStatus({
      state: OrchestratorState.GATHERING,
      message: selected.length > 0 ? 'Consulting specialists' : 'No specialists needed',
      intent: classification.intent,
      specialists: selected.map((s) => s.tag),
    });

    const snapshot: ContextSnapshot = Object.freeze({
      correlationId: this.correlationId,
      intent: classification.intent,
      ticker: classification.ticker,
      accountScope: this.request.accountScope,
      priorThesis: this.request.priorThesis,
    });

    const outcome = await runSpecialistBurst(selected, this.request.query, snapshot, {
      timeoutMs: this.orchestration.specialistTimeoutMs,
      signal: this.controller.signal,
      now: this.now,
      onSettled: (result) => {
        if (result.error?.kind === 'aborted') return;
        this.publish({ type: 'specialist_result', payload: result });
        this.recorder.record(
          `specialist:${result.tag}`,
          { query: this.request.query, tag: result.tag, intent: classification.intent },
          result,
          result.latencyMs,
          result.usage
        );
      },
    });
    this.work.specialistResults = outcome.results;
    if (this.controller.signal.aborted) return false;

    if (outcome.results.some((r) => r.error?.kind === 'schema_violation')) {
      this.degrade('specialist_schema_violation');
    }
    if (!outcome.quorumMet) {
      this.degrade('specialist_quorum');
    }
    return selected.length === 0 || outcome.succeeded > 0;
  }

  /**
   * @returns false when no thesis could be produced at all
   */
  private async draftThesis(classification: IntentClassification): Promise<boolean> {
    this.stateMachine.transition(OrchestratorState.DRAFTING);
    this.emitStatus({
      state: OrchestratorState.DRAFTING,
      message: 'Drafting thesis',
      intent: classification.intent,
    });

    const start = this.now();
    const result = await this.deps.proposer.draft({
      query: this.request.query,
      evidence: this.work.specialistResults,
      correlationId: this.correlationId,
      startIndex: this.work.nextSegmentIndex,
      signal: this.controller.signal,
      onSegment: (segment) => this.publish({ type: 'reasoning_segment', payload: segment }),
      priorThesis: this.request.priorThesis,
      challenge: this.request.challenge,
    });
    this.recordProposerHop(result, 0, this.now() - start);

    if (result.ok) {
      this.acceptTrajectory(result.value);
      return true;
    }
    if (result.error.kind === 'aborted') {
      return true;
    }

    const stitched = stitchEvidenceNarrative(this.work.specialistResults);
    if (!stitched) {
      return false;
    }
    logger.warn({ correlationId: this.correlationId, kind: result.error.kind }, 'Draft failed, using stitched evidence');
    this.work.thesis = stitched;
    this.work.segments = [];
    this.degrade('draft_fallback');
    return true;
  }

  private async debate(): Promise<OrchestrationOutcome> {
    for (let turnIndex = 0; ; turnIndex++) {
      const thesis = this.work.thesis;
      if (thesis === undefined) {
        return this.fail('draft_failed', 'No thesis available for review');
      }

      this.stateMachine.transition(OrchestratorState.DEBATING);
      this.emitStatus({ state: OrchestratorState.DEBATING, message: `Risk review round ${turnIndex + 1}` });

      const start = this.now();
      const review = await this.deps.critic.review({
        query: this.request.query,
        evidence: this.work.specialistResults,
        thesis,
        turnIndex,
        correlationId: this.correlationId,
        signal: this.controller.signal,
      });
      if (!review.ok) return this.halt();

      const { turn, degraded, usage } = review.value;
      this.recorder.record('critic', { thesis, turnIndex }, turn, this.now() - start, usage);
      this.work.debate.push(turn);
      this.publish({ type: 'debate_turn', payload: turn });
      if (degraded) {
        this.degrade('critic_unavailable');
      }

      if (this.controller.signal.aborted) return this.halt();

      if (turn.verdict === 'approve') {
        return this.finalize({ debateExhausted: false, budgetExceeded: false });
      }
      if (turn.verdict === 'flag') {
        this.work.reservations.push(turn.rationale);
        // An unavailable critic raised nothing a rebuttal could answer
        if (degraded) {
          return this.finalize({ debateExhausted: false, budgetExceeded: false });
        }
      }

      if (!this.stateMachine.canRedraft()) {
        logger.info({ correlationId: this.correlationId, turns: this.work.debate.length }, 'Debate turns exhausted');
        this.degrade('debate_exhausted');
        return this.finalize({ debateExhausted: true, budgetExceeded: false });
      }

      const rebutted = await this.rebut(thesis, turn.rationale, turnIndex + 1);
      if (this.controller.signal.aborted) return this.halt();
      if (!rebutted) {
        // The objection stands against the previous thesis
        this.degrade('draft_fallback');
        return this.finalize({ debateExhausted: false, budgetExceeded: false });
      }
    }
  }

  /**
   * @returns false when the rebuttal draft failed for a reason other than abort
   */
  private async rebut(thesis: string, objection: string, draftIndex: number): Promise<boolean> {
    this.stateMachine.transition(OrchestratorState.DRAFTING);
    this.emitStatus({ state: OrchestratorState.DRAFTING, message: 'Revising thesis to address the objection' });

    const start = this.now();
    const result = await this.deps.proposer.rebut({
      query: this.request.query,
      evidence: this.work.specialistResults,
      correlationId: this.correlationId,
      startIndex: this.work.nextSegmentIndex,
      signal: this.controller.signal,
      onSegment: (segment) => this.publish({ type: 'reasoning_segment', payload: segment }),
      thesis,
      objection,
      draftIndex,
    });
    this.recordProposerHop(result, draftIndex, this.now() - start);

    if (result.ok) {
      this.acceptTrajectory(result.value);
      return true;
    }
    return result.error.kind === 'aborted';
  }

  private finalize(flags: { debateExhausted: boolean; budgetExceeded: boolean }): OrchestrationOutcome {
    const classification = this.work.classification;
    const thesis = this.work.thesis;
    if (!classification || thesis === undefined) {
      return this.fail('internal_error', 'Finalization reached without a classified, drafted thesis');
    }

    this.stateMachine.transition(OrchestratorState.FINALIZING);
    this.emitStatus({ state: OrchestratorState.FINALIZING, message: 'Scoring confidence' });

    const start = this.now();
    const confidence = estimateConfidence(
      {
        specialistResults: this.work.specialistResults,
        debate: this.work.debate,
        segments: this.work.segments,
        debateExhausted: flags.debateExhausted,
        budgetExceeded: flags.budgetExceeded,
      },
      this.confidenceConfig
    );
    this.recorder.record(
      'confidence_estimator',
      {
        specialists: this.work.specialistResults.map((r) => ({ tag: r.tag, ok: !r.error, stance: r.stance ?? null })),
        verdicts: this.work.debate.map((t) => t.verdict),
        segmentEntropy: this.work.segments.map((s) => s.entropy.mean),
        ...flags,
      },
      confidence,
      this.now() - start
    );

    const lastTurn = this.work.debate[this.work.debate.length - 1];
    const unresolvedObjection =
      lastTurn && (lastTurn.verdict === 'refute' || (lastTurn.verdict === 'flag' && flags.debateExhausted))
        ? lastTurn.rationale
        : undefined;

    const actionProposal = this.deps.actionGate?.propose({
      correlationId: this.correlationId,
      intent: classification.intent,
      ticker: classification.ticker,
      thesis,
      confidence: confidence.score,
      unresolvedObjection,
    });

    const context = createDecisionContext({
      correlationId: this.correlationId,
      query: this.request.query,
      accountScope: this.request.accountScope,
      intent: classification.intent,
      ticker: classification.ticker,
      specialistResults: this.work.specialistResults,
      thesis,
      segments: this.work.segments,
      debate: this.work.debate,
      confidence,
      degradations: this.work.degradations,
      unresolvedObjection,
      reservations: this.work.reservations,
      requiresHumanApproval: requiresHumanApproval(classification.intent, thesis),
      actionProposal,
    });

    this.publish({
      type: 'final',
      payload: {
        thesis: context.thesis,
        confidence: context.confidence,
        intent: context.intent,
        debateTurns: context.debate.length,
        degradations: [...context.degradations],
        unresolvedObjection: context.unresolvedObjection,
        reservations: [...context.reservations],
        requiresHumanApproval: context.requiresHumanApproval,
        actionProposal: context.actionProposal,
      },
    });
    this.stateMachine.transition(OrchestratorState.DONE);
    return { status: 'done', context };
  }

  // ==========================================================================
  // Termination
  // ==========================================================================

  /**
   * Resolve a cancelled phase: budget expiry finalizes a thesis that reached
   * the debate or fails; a client abort publishes the aborted event.
   */
  private halt(): OrchestrationOutcome {
    if (this.stopReason === 'budget_exceeded') {
      const reviewsStarted = this.stateMachine.getReviewCount();
      if (reviewsStarted > 0 && this.work.thesis !== undefined) {
        if (this.work.debate.length < reviewsStarted) {
          this.work.reservations.push(
            `Risk review round ${reviewsStarted} did not finish within the request budget; the current thesis is unreviewed.`
          );
        }
        this.degrade('budget_exceeded');
        return this.finalize({ debateExhausted: false, budgetExceeded: true });
      }
      return this.fail('budget_exceeded', 'Request budget exhausted before a drafted thesis reached review');
    }

    const state = this.stateMachine.getState();
    this.recorder.record('orchestrator', { action: 'abort', state }, { reason: this.abortMessage }, 0);
    this.publish({ type: 'aborted', payload: { reason: this.abortMessage, state } });
    if (!this.stateMachine.isTerminal()) {
      this.stateMachine.transition(OrchestratorState.ABORTED);
    }
    return { status: 'aborted', reason: this.abortMessage };
  }

  private fail(reason: OrchestrationFailure, message: string): OrchestrationOutcome {
    logger.warn({ correlationId: this.correlationId, reason, state: this.stateMachine.getState() }, message);
    this.recorder.record('orchestrator', { action: 'fail', state: this.stateMachine.getState() }, { reason, message }, 0);
    this.publish({ type: 'error', payload: { reason, message } });
    if (!this.stateMachine.isTerminal()) {
      this.stateMachine.transition(OrchestratorState.ABORTED);
    }
    return { status: 'failed', reason, message };
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private startBudget(): void {
    const budget = this.orchestration.requestBudgetMs;
    if (budget <= 0) return;
    this.budgetTimer = setTimeout(() => {
      if (this.isStopped()) return;
      logger.warn({ correlationId: this.correlationId, budgetMs: budget }, 'Request budget exceeded');
      this.stopReason = 'budget_exceeded';
      this.controller.abort();
    }, budget);
    this.budgetTimer.unref();
  }

  private clearBudget(): void {
    if (this.budgetTimer) {
      clearTimeout(this.budgetTimer);
      this.budgetTimer = null;
    }
  }

  private acceptTrajectory(trajectory: Trajectory): void {
    this.work.thesis = trajectory.text;
    this.work.segments = trajectory.segments;
    this.work.nextSegmentIndex += trajectory.segments.length;
    if (trajectory.lowConfidenceSegments > 0) {
      this.degrade('router_low_confidence');
    }
  }

  private recordProposerHop(result: Result<Trajectory, ModelError>, draftIndex: number, latencyMs: number): void {
    this.recorder.record(
      'proposer',
      { query: this.request.query, draftIndex, evidence: this.work.specialistResults.map((r) => r.tag) },
      result.ok
        ? { text: result.value.text, segments: result.value.segments.length }
        : { error: result.error.kind },
      latencyMs,
      result.ok ? result.value.usage : undefined
    );
  }

  private degrade(degradation: Degradation): void {
    if (this.work.degradations.includes(degradation)) return;
    this.work.degradations.push(degradation);
    this.emitStatus({
      state: this.stateMachine.getState(),
      message: `Degraded: ${degradation.replace(/_/g, ' ')}`,
      degradation,
    });
  }

  private emitStatus(payload: StatusPayload): void {
    this.publish({ type: 'status', payload });
  }
}

function outcomeLifecycle(outcome: OrchestrationOutcome): 'completed' | 'aborted' | 'failed' {
  switch (outcome.status) {
    case 'done':
      return 'completed';
    case 'aborted':
      return 'aborted';
    case 'failed':
      return 'failed';
  }
}
