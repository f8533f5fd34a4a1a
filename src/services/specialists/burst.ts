/**
 * Specialist burst: concurrent fan-out with a partial-failure-tolerant barrier.
 *
 * Every selected specialist starts at once and the burst waits for all of
 * them to settle. Thrown errors, error results, timeouts and aborts are
 * captured in SpecialistResult.error; the burst itself never rejects.
 */

import { createLogger } from '../logging/index.js';
import type { Specialist } from './types.js';
import type { Result } from '../../types/result.js';
import type {
  ContextSnapshot,
  SpecialistError,
  SpecialistOutput,
  SpecialistResult,
} from '../../types/specialist.js';

const logger = createLogger({ module: 'specialist-burst' });

export interface BurstOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  /** Called once per specialist as soon as it settles */
  onSettled?: (result: SpecialistResult) => void;
  now?: () => number;
}

export interface BurstOutcome {
  /** Results in selection order */
  results: SpecialistResult[];
  succeeded: number;
  failed: number;
  /** At least half of the selected specialists succeeded */
  quorumMet: boolean;
}

type Settled = Result<SpecialistOutput, SpecialistError>;

export async function runSpecialistBurst(
  specialists: readonly Specialist[],
  query: string,
  context: ContextSnapshot,
  options: BurstOptions
): Promise<BurstOutcome> {
  const now = options.now ?? Date.now;

  const results = await Promise.all(
    specialists.map(async (specialist) => {
      const result = await invokeIsolated(specialist, query, context, options, now);
      options.onSettled?.(result);
      return result;
    })
  );

  const succeeded = results.filter((r) => !r.error).length;
  const failed = results.length - succeeded;
  const quorumMet = results.length === 0 || succeeded * 2 >= results.length;

  logger.info({
    correlationId: context.correlationId,
    selected: specialists.map((s) => s.tag),
    succeeded,
    failed,
  }, 'Specialist burst settled');

  return { results, succeeded, failed, quorumMet };
}

async function invokeIsolated(
  specialist: Specialist,
  query: string,
  context: ContextSnapshot,
  options: BurstOptions,
  now: () => number
): Promise<SpecialistResult> {
  const start = now();
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onParentAbort: (() => void) | undefined;

  const timeout = new Promise<Settled>((resolve) => {
    timer = setTimeout(() => {
      controller.abort();
      resolve({ ok: false, error: { kind: 'timeout', message: `Timed out after ${options.timeoutMs}ms` } });
    }, options.timeoutMs);
  });

  const aborted = new Promise<Settled>((resolve) => {
    onParentAbort = () => {
      controller.abort();
      resolve({ ok: false, error: { kind: 'aborted', message: 'Request aborted' } });
    };
    if (options.signal?.aborted) {
      onParentAbort();
    } else {
      options.signal?.addEventListener('abort', onParentAbort, { once: true });
    }
  });

  let settled: Settled;
  try {
    settled = await Promise.race([
      specialist.invoke(query, context, { timeoutMs: options.timeoutMs, signal: controller.signal }),
      timeout,
      aborted,
    ]);
  } catch (error) {
    settled = {
      ok: false,
      error: { kind: 'failed', message: error instanceof Error ? error.message : String(error) },
    };
  } finally {
    clearTimeout(timer);
    if (onParentAbort) {
      options.signal?.removeEventListener('abort', onParentAbort);
    }
  }

  const latencyMs = now() - start;

  if (!settled.ok) {
    logger.warn({
      correlationId: context.correlationId,
      tag: specialist.tag,
      kind: settled.error.kind,
      error: settled.error.message,
      latencyMs,
    }, 'Specialist failed');
    return { tag: specialist.tag, payload: {}, narrative: '', latencyMs, error: settled.error };
  }

  return {
    tag: specialist.tag,
    payload: settled.value.payload,
    narrative: settled.value.narrative,
    latencyMs,
    stance: settled.value.stance,
    usage: settled.value.usage,
  };
}
