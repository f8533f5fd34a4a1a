/**
 * Retry policy table keyed by error kind.
 * The gateway is the only component that retries model calls.
 */

import type { ErrorKind } from '../../types/llm.js';

export interface RetryRule {
  /** Retries after the first attempt */
  maxRetries: number;
  /** Whether the other model tier may answer once retries are spent */
  fallback: boolean;
  /** Whether the failure counts against the tier's circuit breaker */
  tripsCircuit: boolean;
}

export const RETRY_POLICY: Readonly<Record<ErrorKind, RetryRule>> = {
  backend_unavailable: { maxRetries: 2, fallback: true, tripsCircuit: true },
  backend_timeout: { maxRetries: 1, fallback: false, tripsCircuit: true },
  rate_limited: { maxRetries: 2, fallback: false, tripsCircuit: false },
  schema_violation: { maxRetries: 0, fallback: false, tripsCircuit: false },
  aborted: { maxRetries: 0, fallback: false, tripsCircuit: false },
};

/**
 * Exponential backoff with 0-30% jitter, capped at maxDelay
 */
export function calculateBackoff(
  attempt: number,
  baseDelay: number,
  maxDelay: number,
  random: () => number = Math.random
): number {
  const exponentialDelay = baseDelay * Math.pow(2, attempt);
  const jitter = random() * 0.3 * exponentialDelay;
  return Math.min(exponentialDelay + jitter, maxDelay);
}
