/**
 * In-memory trace store (development and tests).
 * Idempotent on (correlationId, hopIndex): the first write wins.
 */

import type { TraceRecord, TraceStore, TraceSummary } from '../../types/trace.js';

export class MemoryTraceStore implements TraceStore {
  private readonly records = new Map<string, Map<number, TraceRecord>>();

  async append(record: TraceRecord): Promise<void> {
    let hops = this.records.get(record.correlationId);
    if (!hops) {
      hops = new Map();
      this.records.set(record.correlationId, hops);
    }
    if (!hops.has(record.hopIndex)) {
      hops.set(record.hopIndex, record);
    }
  }

  async getTrace(correlationId: string): Promise<TraceRecord[]> {
    const hops = this.records.get(correlationId);
    if (!hops) return [];
    return [...hops.values()].sort((a, b) => a.hopIndex - b.hopIndex);
  }

  async listRecent(limit: number): Promise<TraceSummary[]> {
    const summaries: TraceSummary[] = [];
    for (const [correlationId, hops] of this.records) {
      const startedAt = [...hops.values()].map((r) => r.timestamp).sort()[0];
      if (startedAt === undefined) continue;
      summaries.push({ correlationId, startedAt, hops: hops.size });
    }
    return summaries.sort((a, b) => b.startedAt.localeCompare(a.startedAt)).slice(0, limit);
  }
}
