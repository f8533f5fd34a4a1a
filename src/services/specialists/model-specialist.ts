/**
 * Model-backed specialist: one structured generation per invocation.
 */

import { z } from 'zod';
import { buildSpecialistSystemPrompt, buildSpecialistUserPrompt } from '../agents/prompts/index.js';
import { SpecialistRegistry } from './registry.js';
import { err, ok, type Result } from '../../types/result.js';
import {
  SPECIALIST_TAGS,
  stanceSchema,
  type ContextSnapshot,
  type SpecialistError,
  type SpecialistErrorKind,
  type SpecialistOutput,
  type SpecialistTag,
} from '../../types/specialist.js';
import { usageOf } from '../llm/usage.js';
import type { ModelGateway } from '../llm/gateway.js';
import type { ErrorKind, ModelTier } from '../../types/llm.js';
import type { Specialist, SpecialistInvokeOptions } from './types.js';

export const specialistResponseSchema = z.object({
  stance: stanceSchema,
  summary: z.string().trim().min(1),
  signals: z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])).default({}),
});

function toSpecialistErrorKind(kind: ErrorKind): SpecialistErrorKind {
  switch (kind) {
    case 'schema_violation':
      return 'schema_violation';
    case 'aborted':
      return 'aborted';
    case 'backend_timeout':
      return 'timeout';
    default:
      return 'failed';
  }
}

export class ModelSpecialist implements Specialist {
  constructor(
    readonly tag: SpecialistTag,
    private readonly gateway: ModelGateway,
    private readonly tier: ModelTier = 'small'
  ) {}

  async invoke(
    query: string,
    context: ContextSnapshot,
    options: SpecialistInvokeOptions
  ): Promise<Result<SpecialistOutput, SpecialistError>> {
    const outcome = await this.gateway.generateStructured(
      {
        tier: this.tier,
        purpose: `specialist:${this.tag}`,
        correlationId: context.correlationId,
        messages: [
          { role: 'system', content: buildSpecialistSystemPrompt(this.tag) },
          { role: 'user', content: buildSpecialistUserPrompt(query, context) },
        ],
        maxTokens: 400,
        temperature: 0.2,
      },
      specialistResponseSchema,
      options.signal
    );

    if (!outcome.ok) {
      return err({ kind: toSpecialistErrorKind(outcome.error.kind), message: outcome.error.message });
    }

    const { stance, summary, signals } = outcome.value.value;
    return ok({
      payload: { signals, model: outcome.value.result.model },
      narrative: summary,
      stance,
      usage: usageOf(outcome.value.result),
    });
  }
}

/**
 * Registry with a model-backed specialist for every tag
 */
export function createDefaultRegistry(gateway: ModelGateway): SpecialistRegistry {
  const registry = new SpecialistRegistry();
  for (const tag of SPECIALIST_TAGS) {
    registry.register(new ModelSpecialist(tag, gateway));
  }
  return registry;
}
