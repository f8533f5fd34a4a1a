/**
 * Stream protocol types (AG-UI style events over Server-Sent Events)
 */

import type {
  ActionProposal,
  ConfidenceScore,
  DebateTurn,
  Degradation,
  OrchestrationFailure,
  OrchestratorState,
  ReasoningSegment,
} from './decision.js';
import type { Intent, SpecialistResult } from './specialist.js';

export interface StatusPayload {
  state: OrchestratorState;
  message: string;
  intent?: Intent;
  specialists?: string[];
  degradation?: Degradation;
}

export interface FinalPayload {
  thesis: string;
  confidence: ConfidenceScore;
  intent: Intent;
  debateTurns: number;
  degradations: Degradation[];
  /** Critic objection left standing when debate turns ran out, verbatim */
  unresolvedObjection?: string;
  /** Soft objections raised with a flag verdict */
  reservations: string[];
  requiresHumanApproval: boolean;
  actionProposal?: ActionProposal;
}

export interface ErrorPayload {
  reason: OrchestrationFailure;
  message: string;
}

export interface AbortedPayload {
  reason: string;
  state: OrchestratorState;
}

/**
 * Event type to payload mapping
 */
export interface StreamEventMap {
  status: StatusPayload;
  specialist_result: SpecialistResult;
  reasoning_segment: ReasoningSegment;
  debate_turn: DebateTurn;
  final: FinalPayload;
  error: ErrorPayload;
  aborted: AbortedPayload;
}

export type StreamEventType = keyof StreamEventMap;

export const TERMINAL_EVENT_TYPES: ReadonlySet<StreamEventType> = new Set<StreamEventType>(['final', 'error', 'aborted']);

/**
 * Event as produced by the orchestrator, before sequencing
 */
export type StreamEvent = {
  [K in StreamEventType]: { type: K; payload: StreamEventMap[K] };
}[StreamEventType];

/**
 * Event as delivered to clients
 */
export type StreamEnvelope = StreamEvent & {
  sessionId: string;
  correlationId: string;
  seq: number;
  ts: string;
};

/**
 * Minimal writable surface of an HTTP response used for SSE.
 * Express's Response satisfies it.
 */
export interface SseTransport {
  write(chunk: string): boolean;
  end(): void;
  once(event: 'drain' | 'close', listener: () => void): unknown;
  readonly writableEnded: boolean;
}
