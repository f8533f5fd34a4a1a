/**
 * Trace record types
 */

export type TraceComponent =
  | 'intent_classifier'
  | `specialist:${string}`
  | 'proposer'
  | 'critic'
  | 'confidence_estimator'
  | 'orchestrator';

export interface TraceRecord {
  readonly correlationId: string;
  readonly hopIndex: number;
  readonly component: TraceComponent;
  readonly inputDigest: string;
  readonly outputDigest: string;
  readonly latencyMs: number;
  readonly timestamp: string;
  /** Model (or '+'-joined models) that served the hop; null for hops without a model call */
  readonly model: string | null;
  readonly tokens: number | null;
}

/**
 * One request in the recent-trace listing
 */
export interface TraceSummary {
  readonly correlationId: string;
  /** Timestamp of the earliest hop */
  readonly startedAt: string;
  readonly hops: number;
}

/**
 * Persistence for trace records. Writes are idempotent on (correlationId, hopIndex).
 */
export interface TraceStore {
  append(record: TraceRecord): Promise<void>;
  getTrace(correlationId: string): Promise<TraceRecord[]>;
  /** Most recently started requests first */
  listRecent(limit: number): Promise<TraceSummary[]>;
}

/**
 * Database row shape for trace_records
 */
export interface TraceRecordRow {
  correlation_id: string;
  hop_index: number;
  component: string;
  input_digest: string;
  output_digest: string;
  latency_ms: number;
  model: string | null;
  tokens_used: number | null;
  created_at: Date;
}

export interface TraceSummaryRow {
  correlation_id: string;
  started_at: Date;
  hops: string;
}
