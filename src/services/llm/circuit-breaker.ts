/**
 * Circuit breaker for one model tier.
 *
 * closed -> open after `failureThreshold` consecutive failures;
 * open -> half_open once `recoveryMs` has elapsed; a success in half_open
 * closes the circuit, a failure opens it again.
 */

import { createLogger } from '../logging/index.js';

const logger = createLogger({ module: 'circuit-breaker' });

export type CircuitState = 'closed' | 'open' | 'half_open';

export interface CircuitBreakerOptions {
  failureThreshold?: number;
  recoveryMs?: number;
  now?: () => number;
}

export class CircuitBreaker {
  private state: CircuitState = 'closed';
  private failures = 0;
  private openedAt = 0;
  private readonly failureThreshold: number;
  private readonly recoveryMs: number;
  private readonly now: () => number;

  constructor(public readonly name: string, options: CircuitBreakerOptions = {}) {
    this.failureThreshold = options.failureThreshold ?? 3;
    this.recoveryMs = options.recoveryMs ?? 30000;
    this.now = options.now ?? Date.now;
  }

  /**
   * Whether a call may go through. Moves open -> half_open after the recovery window.
   */
  canRequest(): boolean {
    if (this.state === 'open' && this.now() - this.openedAt >= this.recoveryMs) {
      this.state = 'half_open';
      logger.info({ circuit: this.name }, 'Circuit half-open, allowing a trial call');
    }
    return this.state !== 'open';
  }

  recordSuccess(): void {
    if (this.state !== 'closed') {
      logger.info({ circuit: this.name }, 'Circuit closed');
    }
    this.state = 'closed';
    this.failures = 0;
  }

  recordFailure(): void {
    this.failures++;
    if (this.state === 'half_open' || this.failures >= this.failureThreshold) {
      if (this.state !== 'open') {
        logger.warn({ circuit: this.name, failures: this.failures }, 'Circuit opened');
      }
      this.state = 'open';
      this.openedAt = this.now();
    }
  }

  getState(): CircuitState {
    return this.state;
  }
}
