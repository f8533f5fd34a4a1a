/**
 * PostgreSQL trace store backed by the trace repository
 */

import * as traceRepository from '../../db/repositories/trace-repository.js';
import type { TraceRecord, TraceStore, TraceSummary } from '../../types/trace.js';

export class PgTraceStore implements TraceStore {
  async append(record: TraceRecord): Promise<void> {
    await traceRepository.insert(record);
  }

  async getTrace(correlationId: string): Promise<TraceRecord[]> {
    return traceRepository.findByCorrelationId(correlationId);
  }

  async listRecent(limit: number): Promise<TraceSummary[]> {
    return traceRepository.listRecent(limit);
  }
}
