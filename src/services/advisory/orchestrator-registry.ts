/**
 * Orchestrator Registry
 *
 * Running advisories by correlation id. Stop requests from the API and
 * from shutdown go through here; an advisory leaves the registry when its
 * run settles.
 */

import { createLogger } from '../logging/index.js';

const logger = createLogger({ module: 'OrchestratorRegistry' });

/**
 * Common surface of a cancellable orchestrator
 */
export interface StoppableOrchestrator {
  stop(reason?: string): void;
  isStopped(): boolean;
}

export interface RunningSummary {
  count: number;
  /** Age of the oldest running advisory; 0 when nothing runs */
  oldestRunningMs: number;
}

interface Entry {
  orchestrator: StoppableOrchestrator;
  startedAt: number;
}

export class OrchestratorRegistry {
  private readonly running = new Map<string, Entry>();

  constructor(private readonly now: () => number = Date.now) {}

  /**
   * @throws Error when the id is already running
   */
  register(correlationId: string, orchestrator: StoppableOrchestrator): void {
    if (this.running.has(correlationId)) {
      throw new Error(`Advisory ${correlationId} is already running`);
    }
    this.running.set(correlationId, { orchestrator, startedAt: this.now() });
    logger.debug({ correlationId, running: this.running.size }, 'Advisory registered');
  }

  release(correlationId: string): void {
    const entry = this.running.get(correlationId);
    if (!entry) return;
    this.running.delete(correlationId);
    logger.debug({ correlationId, runMs: this.now() - entry.startedAt }, 'Advisory released');
  }

  /**
   * @returns false when nothing is running under that id or it was already stopped
   */
  stop(correlationId: string, reason: string): boolean {
    const entry = this.running.get(correlationId);
    if (!entry || entry.orchestrator.isStopped()) return false;
    entry.orchestrator.stop(reason);
    return true;
  }

  /**
   * Stop every advisory still running, used on shutdown
   */
  stopAll(reason: string): number {
    let stopped = 0;
    for (const correlationId of this.running.keys()) {
      if (this.stop(correlationId, reason)) stopped++;
    }
    return stopped;
  }

  summary(): RunningSummary {
    const now = this.now();
    let oldest = now;
    for (const entry of this.running.values()) {
      oldest = Math.min(oldest, entry.startedAt);
    }
    return { count: this.running.size, oldestRunningMs: now - oldest };
  }
}
