/**
 * Orchestration types: states, reasoning segments, debate turns, confidence
 */

import type { ModelTier } from './llm.js';
import type { Intent, SpecialistResult } from './specialist.js';

export enum OrchestratorState {
  CLASSIFYING = 'classifying',
  GATHERING = 'gathering',
  DRAFTING = 'drafting',
  DEBATING = 'debating',
  FINALIZING = 'finalizing',
  DONE = 'done',
  ABORTED = 'aborted',
}

export interface ReasoningSegment {
  /** Position in the request's trajectory, across drafts */
  readonly index: number;
  /** 0 for the first draft, n for the n-th rebuttal */
  readonly draftIndex: number;
  readonly text: string;
  readonly sourceModel: ModelTier;
  readonly model: string;
  readonly entropy: {
    readonly mean: number;
    readonly max: number;
    readonly tokenCount: number;
  };
  readonly lowConfidence: boolean;
}

export type Verdict = 'approve' | 'flag' | 'refute';
export type Speaker = 'proposer' | 'critic';

export interface DebateTurn {
  readonly turnIndex: number;
  readonly speaker: Speaker;
  readonly verdict: Verdict;
  readonly rationale: string;
}

export type ConfidenceLabel = 'battle_tested' | 'verified' | 'cautionary' | 'high_entropy';

export type CapReason = 'debate_exhausted' | 'budget_exceeded' | 'specialist_quorum';

export interface ConfidenceScore {
  readonly score: number;
  readonly breakdown: {
    readonly specialistAgreement: number;
    readonly debateStability: number;
    readonly routerConfidence: number;
  };
  readonly capped: boolean;
  readonly capReasons: readonly CapReason[];
  readonly label: ConfidenceLabel;
}

export type Degradation =
  | 'intent_fallback'
  | 'specialist_quorum'
  | 'specialist_schema_violation'
  | 'draft_fallback'
  | 'router_low_confidence'
  | 'critic_unavailable'
  | 'debate_exhausted'
  | 'budget_exceeded';

export type ActionStatus = 'pending_authorization' | 'authorized' | 'forwarded' | 'rejected';

/**
 * A side-effecting action the advisory suggests. Never executed by the core.
 */
export interface ActionProposal {
  readonly proposalId: string;
  readonly correlationId: string;
  readonly kind: 'trade';
  readonly ticker?: string;
  readonly summary: string;
  readonly confidence: number;
  readonly createdAt: string;
}

/**
 * Request-scoped record of one advisory. Frozen when the final event is published.
 */
export interface DecisionContext {
  readonly correlationId: string;
  readonly query: string;
  readonly accountScope?: string;
  readonly intent: Intent;
  readonly ticker?: string;
  readonly specialistResults: readonly SpecialistResult[];
  readonly thesis: string;
  readonly segments: readonly ReasoningSegment[];
  readonly debate: readonly DebateTurn[];
  readonly confidence: ConfidenceScore;
  readonly degradations: readonly Degradation[];
  readonly unresolvedObjection?: string;
  readonly reservations: readonly string[];
  readonly requiresHumanApproval: boolean;
  readonly actionProposal?: ActionProposal;
}

export type OrchestrationFailure = 'all_specialists_failed' | 'budget_exceeded' | 'draft_failed' | 'internal_error';
