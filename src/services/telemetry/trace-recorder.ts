/**
 * Trace Recorder
 *
 * One recorder per request. Assigns hop indexes in execution order and
 * writes records without blocking the caller: each write is retried once
 * and a final failure is only logged.
 */

import { digest } from './digest.js';
import { createLogger, loggers } from '../logging/index.js';
import type { ModelUsage } from '../../types/llm.js';
import type { TraceComponent, TraceRecord, TraceStore } from '../../types/trace.js';

const logger = createLogger({ module: 'trace-recorder' });

export class TraceRecorder {
  private hopIndex = 0;
  private readonly pending = new Set<Promise<void>>();
  private failures = 0;

  constructor(
    readonly correlationId: string,
    private readonly store: TraceStore,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Record one hop. Returns the record immediately; persistence happens in the background.
   */
  record(component: TraceComponent, input: unknown, output: unknown, latencyMs: number, usage?: ModelUsage): TraceRecord {
    this.hopIndex++;
    const record: TraceRecord = Object.freeze({
      correlationId: this.correlationId,
      hopIndex: this.hopIndex,
      component,
      inputDigest: digest(input),
      outputDigest: digest(output),
      latencyMs: Math.max(0, Math.round(latencyMs)),
      timestamp: new Date(this.now()).toISOString(),
      model: usage?.model ?? null,
      tokens: usage ? usage.tokens : null,
    });
    this.write(record);
    return record;
  }

  get hopCount(): number {
    return this.hopIndex;
  }

  get failedWrites(): number {
    return this.failures;
  }

  /**
   * Wait for every outstanding write to settle
   */
  async flush(): Promise<void> {
    await Promise.all([...this.pending]);
  }

  private write(record: TraceRecord): void {
    const task: Promise<void> = this.store
      .append(record)
      .catch((error: unknown) => {
        logger.warn({
          correlationId: record.correlationId,
          hopIndex: record.hopIndex,
          error: error instanceof Error ? error.message : String(error),
        }, 'Trace write failed, retrying once');
        return this.store.append(record);
      })
      .catch((error: unknown) => {
        this.failures++;
        loggers.error('Trace write failed', error, {
          correlationId: record.correlationId,
          hopIndex: record.hopIndex,
          component: record.component,
        });
      })
      .finally(() => {
        this.pending.delete(task);
      });
    this.pending.add(task);
  }
}
