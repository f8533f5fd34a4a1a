/**
 * Builders for deterministic model gateways and specialists used across tests.
 */

import { ModelGateway } from '../../src/services/llm/gateway.js';
import { ScriptedBackend, type ScriptedOutcome, type ScriptedReply, type ScriptedResponder } from '../../src/services/llm/scripted-backend.js';
import { ok, err, type Result } from '../../src/types/result.js';
import type { GenerateRequest } from '../../src/types/llm.js';
import type { Specialist, SpecialistInvokeOptions } from '../../src/services/specialists/types.js';
import type {
  ContextSnapshot,
  SpecialistError,
  SpecialistOutput,
  SpecialistTag,
  Stance,
} from '../../src/types/specialist.js';

export interface ScriptedGateway {
  gateway: ModelGateway;
  small: ScriptedBackend;
  large: ScriptedBackend;
}

export function scriptedGateway(
  smallResponder: ScriptedResponder,
  largeResponder: ScriptedResponder = smallResponder,
  options: { fallback?: boolean; timeoutMs?: number } = {}
): ScriptedGateway {
  const small = new ScriptedBackend('small-test-model', smallResponder);
  const large = new ScriptedBackend('large-test-model', largeResponder);
  const gateway = new ModelGateway(
    { small, large },
    {
      timeoutMs: options.timeoutMs ?? 5000,
      fallback: options.fallback ?? true,
      limiter: { maxConcurrent: 10, minTime: 0 },
      retry: { baseDelay: 1, maxDelay: 1 },
      sleep: async () => {},
    }
  );
  return { gateway, small, large };
}

/**
 * Responder dispatching on the request purpose. Purposes without a handler throw.
 */
export function byPurpose(
  handlers: Record<string, (request: GenerateRequest, callIndex: number) => ScriptedOutcome>
): ScriptedResponder {
  const counts = new Map<string, number>();
  return (request) => {
    const purpose = request.purpose ?? '';
    const handler = handlers[purpose];
    if (!handler) {
      throw new Error(`No scripted handler for purpose "${purpose}"`);
    }
    const index = counts.get(purpose) ?? 0;
    counts.set(purpose, index + 1);
    return handler(request, index);
  };
}

export function json(value: unknown): string {
  return JSON.stringify(value);
}

/**
 * Three low-entropy sentences; the router keeps them all on the small tier
 */
export function calmDraft(label: string = 'Thesis'): ScriptedReply {
  return {
    segments: [
      { text: `${label} point one holds. `, entropy: 0.1 },
      { text: `${label} point two holds. `, entropy: 0.1 },
      { text: `${label} point three holds.`, entropy: 0.1 },
    ],
  };
}

export type StubBehaviour =
  | { kind: 'succeed'; stance?: Stance; narrative?: string; delayMs?: number }
  | { kind: 'fail'; message?: string }
  | { kind: 'throw'; message?: string }
  | { kind: 'hang' };

/**
 * Specialist with scripted behaviour. 'hang' settles only when its signal aborts.
 */
export class StubSpecialist implements Specialist {
  calls = 0;

  constructor(readonly tag: SpecialistTag, private readonly behaviour: StubBehaviour) {}

  async invoke(
    _query: string,
    _context: ContextSnapshot,
    options: SpecialistInvokeOptions
  ): Promise<Result<SpecialistOutput, SpecialistError>> {
    this.calls++;
    const behaviour = this.behaviour;
    switch (behaviour.kind) {
      case 'succeed':
        if (behaviour.delayMs) {
          await new Promise((resolve) => setTimeout(resolve, behaviour.delayMs));
        }
        return ok({
          payload: { tag: this.tag },
          narrative: behaviour.narrative ?? `${this.tag} sees a constructive setup.`,
          stance: behaviour.stance ?? 'bullish',
        });
      case 'fail':
        return err({ kind: 'failed' as const, message: behaviour.message ?? `${this.tag} unavailable` });
      case 'throw':
        throw new Error(behaviour.message ?? `${this.tag} crashed`);
      case 'hang':
        return new Promise<never>((_resolve, reject) => {
          options.signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
        });
    }
  }
}
