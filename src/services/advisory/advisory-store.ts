/**
 * In-memory record of advisories started by this process, keyed by
 * correlation id. Oldest records are evicted past the capacity.
 */

import type { DecisionContext, OrchestrationFailure } from '../../types/decision.js';

export type AdvisoryStatus = 'running' | 'done' | 'failed' | 'aborted';

export interface AdvisoryRecord {
  correlationId: string;
  sessionId: string;
  query: string;
  accountScope?: string;
  /** Advisory this one challenges, if any */
  parentCorrelationId?: string;
  status: AdvisoryStatus;
  createdAt: string;
  completedAt?: string;
  context?: DecisionContext;
  failure?: { reason: OrchestrationFailure | string; message?: string };
}

export class AdvisoryStore {
  private readonly records = new Map<string, AdvisoryRecord>();

  constructor(private readonly capacity: number = 1000) {}

  create(record: Omit<AdvisoryRecord, 'status' | 'createdAt'>, now: number = Date.now()): AdvisoryRecord {
    const created: AdvisoryRecord = { ...record, status: 'running', createdAt: new Date(now).toISOString() };
    this.records.set(record.correlationId, created);
    this.evict();
    return created;
  }

  get(correlationId: string): AdvisoryRecord | undefined {
    return this.records.get(correlationId);
  }

  complete(correlationId: string, context: DecisionContext, now: number = Date.now()): void {
    const record = this.records.get(correlationId);
    if (!record) return;
    record.status = 'done';
    record.context = context;
    record.completedAt = new Date(now).toISOString();
  }

  close(
    correlationId: string,
    status: 'failed' | 'aborted',
    failure: AdvisoryRecord['failure'],
    now: number = Date.now()
  ): void {
    const record = this.records.get(correlationId);
    if (!record) return;
    record.status = status;
    record.failure = failure;
    record.completedAt = new Date(now).toISOString();
  }

  size(): number {
    return this.records.size;
  }

  private evict(): void {
    while (this.records.size > this.capacity) {
      const oldest = this.records.keys().next();
      if (oldest.done) return;
      this.records.delete(oldest.value);
    }
  }
}
