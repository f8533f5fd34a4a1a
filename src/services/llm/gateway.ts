/**
 * Model Delegation Gateway
 *
 * Uniform access to the small and large model tiers. Owns the only resources
 * shared across requests: one Bottleneck limiter and one circuit breaker per
 * tier. Retries follow RETRY_POLICY; callers receive a Result and never see a
 * thrown backend error.
 */

import Bottleneck from 'bottleneck';
import type { z } from 'zod';
import { CircuitBreaker } from './circuit-breaker.js';
import { RETRY_POLICY, calculateBackoff } from './retry-policy.js';
import { createLogger, loggers } from '../logging/index.js';
import { err, ok, type Result } from '../../types/result.js';
import {
  ModelError,
  type BackendCompletion,
  type GenerateRequest,
  type GenerateResult,
  type ModelBackend,
  type ModelTier,
} from '../../types/llm.js';

const logger = createLogger({ module: 'model-gateway' });

export interface GatewayOptions {
  timeoutMs?: number;
  limiter?: { maxConcurrent: number; minTime: number };
  retry?: { baseDelay: number; maxDelay: number };
  circuit?: { failureThreshold: number; recoveryMs: number };
  /** Allow the other tier to answer when a tier is unavailable */
  fallback?: boolean;
  /** Backoff wait; resolves early once the signal aborts */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => number;
}

export interface StructuredResult<T> {
  value: T;
  result: GenerateResult;
}

function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });
}

function otherTier(tier: ModelTier): ModelTier {
  return tier === 'small' ? 'large' : 'small';
}

/**
 * Pull the first JSON object out of model text (tolerates code fences and prose)
 */
export function extractJson(text: string): unknown {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(text);
  const body = fenced?.[1] ?? text;
  const start = body.indexOf('{');
  const end = body.lastIndexOf('}');
  if (start === -1 || end <= start) {
    throw new Error('No JSON object found in model output');
  }
  return JSON.parse(body.slice(start, end + 1));
}

export class ModelGateway {
  private readonly limiters: Record<ModelTier, Bottleneck>;
  private readonly breakers: Record<ModelTier, CircuitBreaker>;
  private readonly timeoutMs: number;
  private readonly maxConcurrent: number;
  private readonly retry: { baseDelay: number; maxDelay: number };
  private readonly fallback: boolean;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly now: () => number;

  constructor(private readonly backends: Record<ModelTier, ModelBackend>, options: GatewayOptions = {}) {
    const limiter = options.limiter ?? { maxConcurrent: 4, minTime: 0 };
    const circuit = options.circuit ?? { failureThreshold: 3, recoveryMs: 30000 };
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.maxConcurrent = limiter.maxConcurrent;
    this.retry = options.retry ?? { baseDelay: 500, maxDelay: 8000 };
    this.fallback = options.fallback ?? true;
    this.sleep = options.sleep ?? abortableSleep;
    this.now = options.now ?? Date.now;

    this.limiters = {
      small: new Bottleneck({ maxConcurrent: limiter.maxConcurrent, minTime: limiter.minTime }),
      large: new Bottleneck({ maxConcurrent: limiter.maxConcurrent, minTime: limiter.minTime }),
    };
    this.breakers = {
      small: new CircuitBreaker('small', { ...circuit, now: this.now }),
      large: new CircuitBreaker('large', { ...circuit, now: this.now }),
    };

    logger.info({
      small: `${backends.small.provider}/${backends.small.model}`,
      large: `${backends.large.provider}/${backends.large.model}`,
      timeoutMs: this.timeoutMs,
    }, 'Model gateway initialized');
  }

  /**
   * Generate text with per-token entropy from the requested tier.
   * Unavailable tiers fall back to the other tier once their retries are spent.
   */
  async generate(request: GenerateRequest, signal?: AbortSignal): Promise<Result<GenerateResult, ModelError>> {
    const primary = await this.generateOnTier(request.tier, request, signal);
    if (primary.ok) {
      return primary;
    }

    if (!this.fallback || !RETRY_POLICY[primary.error.kind].fallback) {
      return primary;
    }

    const fallbackTier = otherTier(request.tier);
    logger.warn({
      correlationId: request.correlationId,
      purpose: request.purpose,
      from: request.tier,
      to: fallbackTier,
      error: primary.error.message,
    }, 'Tier unavailable, falling back');

    const secondary = await this.generateOnTier(fallbackTier, request, signal);
    if (!secondary.ok) {
      return secondary;
    }
    return ok({ ...secondary.value, fallbackFrom: request.tier });
  }

  /**
   * Generate and validate a JSON object against a zod schema.
   * Invalid output is a non-retryable schema_violation.
   */
  async generateStructured<S extends z.ZodTypeAny>(
    request: GenerateRequest,
    schema: S,
    signal?: AbortSignal
  ): Promise<Result<StructuredResult<z.infer<S>>, ModelError>> {
    const generated = await this.generate(request, signal);
    if (!generated.ok) {
      return generated;
    }

    let raw: unknown;
    try {
      raw = extractJson(generated.value.text);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      loggers.schemaValidation(request.correlationId, request.purpose ?? 'structured', false, [message]);
      return err(new ModelError(`Model output is not valid JSON: ${message}`, 'schema_violation', { cause: error }));
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      const details = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      loggers.schemaValidation(request.correlationId, request.purpose ?? 'structured', false, details);
      return err(new ModelError('Model output failed schema validation', 'schema_violation', { details }));
    }

    loggers.schemaValidation(request.correlationId, request.purpose ?? 'structured', true);
    return ok({ value: parsed.data, result: generated.value });
  }

  getCircuitState(tier: ModelTier) {
    return this.breakers[tier].getState();
  }

  describe(tier: ModelTier): string {
    return `${this.backends[tier].provider}/${this.backends[tier].model}`;
  }

  async shutdown(): Promise<void> {
    await Promise.all([this.limiters.small.stop({ dropWaitingJobs: true }), this.limiters.large.stop({ dropWaitingJobs: true })]);
  }

  private async generateOnTier(
    tier: ModelTier,
    request: GenerateRequest,
    signal?: AbortSignal
  ): Promise<Result<GenerateResult, ModelError>> {
    const backend = this.backends[tier];
    const breaker = this.breakers[tier];
    const start = this.now();

    for (let attempt = 0; ; attempt++) {
      if (signal?.aborted) {
        return err(new ModelError('Request aborted', 'aborted'));
      }
      if (!breaker.canRequest()) {
        return err(new ModelError(`Circuit open for ${tier} tier`, 'backend_unavailable'));
      }

      try {
        // A sampling backend holds one limiter slot per upstream request
        const weight = Math.min(Math.max(1, backend.callsPerCompletion ?? 1), this.maxConcurrent);
        const completion = await this.limiters[tier].schedule({ weight }, () =>
          this.callWithTimeout(backend, request, signal)
        );
        breaker.recordSuccess();

        const latencyMs = this.now() - start;
        loggers.agentCall({
          correlationId: request.correlationId,
          agent: request.purpose ?? 'gateway',
          tier,
          model: completion.model,
          latency_ms: latencyMs,
          tokens: completion.usage?.totalTokens,
          success: true,
        });

        return ok({ ...completion, tier, latencyMs, attempts: attempt + 1 });
      } catch (error: unknown) {
        const modelError = ModelError.fromError(error);
        const rule = RETRY_POLICY[modelError.kind];
        if (rule.tripsCircuit) {
          breaker.recordFailure();
        }

        if (attempt >= rule.maxRetries) {
          loggers.agentCall({
            correlationId: request.correlationId,
            agent: request.purpose ?? 'gateway',
            tier,
            model: backend.model,
            latency_ms: this.now() - start,
            success: false,
            error: `${modelError.kind}: ${modelError.message}`,
          });
          return err(modelError);
        }

        const delay = calculateBackoff(attempt, this.retry.baseDelay, this.retry.maxDelay);
        logger.warn({
          correlationId: request.correlationId,
          tier,
          attempt: attempt + 1,
          maxRetries: rule.maxRetries,
          delay,
          kind: modelError.kind,
        }, 'Retrying model request after error');
        await this.sleep(delay, signal);
      }
    }
  }

  /**
   * Run one backend call bounded by the gateway timeout and the caller's signal
   */
  private callWithTimeout(backend: ModelBackend, request: GenerateRequest, signal?: AbortSignal): Promise<BackendCompletion> {
    return new Promise<BackendCompletion>((resolve, reject) => {
      const controller = new AbortController();

      const onAbort = () => {
        controller.abort();
        reject(new ModelError('Request aborted', 'aborted'));
      };
      const timer = setTimeout(() => {
        controller.abort();
        reject(new ModelError(`Request timeout after ${this.timeoutMs}ms`, 'backend_timeout'));
      }, this.timeoutMs);

      if (signal?.aborted) {
        clearTimeout(timer);
        onAbort();
        return;
      }
      signal?.addEventListener('abort', onAbort, { once: true });

      backend
        .complete(request, controller.signal)
        .then(resolve, reject)
        .finally(() => {
          clearTimeout(timer);
          signal?.removeEventListener('abort', onAbort);
        })
        .catch((error: unknown) => logger.error({ err: error }, 'Backend call cleanup failed'));
    });
  }
}
