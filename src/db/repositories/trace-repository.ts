/**
 * Trace Repository
 * Database operations for the trace_records table
 */

import { pool } from '../connection.js';
import { loggers } from '../../services/logging/index.js';
import type { TraceComponent, TraceRecord, TraceRecordRow, TraceSummary, TraceSummaryRow } from '../../types/trace.js';

const FIXED_COMPONENTS = new Set(['intent_classifier', 'proposer', 'critic', 'confidence_estimator', 'orchestrator']);

export function isTraceComponent(value: string): value is TraceComponent {
  return FIXED_COMPONENTS.has(value) || /^specialist:[a-z_]+$/.test(value);
}

/**
 * Convert snake_case row to TraceRecord
 */
function rowToRecord(row: TraceRecordRow): TraceRecord {
  if (!isTraceComponent(row.component)) {
    throw new Error(`Unknown trace component in database: ${row.component}`);
  }
  return {
    correlationId: row.correlation_id,
    hopIndex: row.hop_index,
    component: row.component,
    inputDigest: row.input_digest,
    outputDigest: row.output_digest,
    latencyMs: row.latency_ms,
    timestamp: row.created_at.toISOString(),
    model: row.model,
    tokens: row.tokens_used,
  };
}

/**
 * Insert a trace record. Duplicate (correlation_id, hop_index) is a no-op.
 * @returns true when a row was written
 */
export async function insert(record: TraceRecord): Promise<boolean> {
  const query = `
    INSERT INTO trace_records
      (correlation_id, hop_index, component, input_digest, output_digest, latency_ms, model, tokens_used, created_at)
    VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
    ON CONFLICT (correlation_id, hop_index) DO NOTHING
  `;

  const start = Date.now();
  const result = await pool.query(query, [
    record.correlationId,
    record.hopIndex,
    record.component,
    record.inputDigest,
    record.outputDigest,
    Math.max(0, Math.round(record.latencyMs)),
    record.model,
    record.tokens,
    record.timestamp,
  ]);
  const written = (result.rowCount ?? 0) > 0;
  loggers.dbOperation('insert', 'trace_records', Date.now() - start, true, result.rowCount ?? 0);
  return written;
}

/**
 * All records of one request ordered by hop index
 */
export async function findByCorrelationId(correlationId: string): Promise<TraceRecord[]> {
  const result = await pool.query<TraceRecordRow>(
    `SELECT correlation_id, hop_index, component, input_digest, output_digest, latency_ms, model, tokens_used, created_at
       FROM trace_records
      WHERE correlation_id = $1
      ORDER BY hop_index ASC`,
    [correlationId]
  );
  return result.rows.map(rowToRecord);
}

/**
 * Requests ordered by their first hop, newest first
 */
export async function listRecent(limit: number): Promise<TraceSummary[]> {
  const result = await pool.query<TraceSummaryRow>(
    `SELECT correlation_id, MIN(created_at) AS started_at, COUNT(*) AS hops
       FROM trace_records
      GROUP BY correlation_id
      ORDER BY started_at DESC
      LIMIT $1`,
    [limit]
  );
  return result.rows.map((row) => ({
    correlationId: row.correlation_id,
    startedAt: row.started_at.toISOString(),
    hops: parseInt(row.hops, 10),
  }));
}
