/**
 * Critic Agent
 *
 * Adversarial reviewer returning exactly one verdict per review. A review
 * that cannot be obtained or parsed becomes a flag carrying the failure as
 * its rationale, so an objection is never silently lost.
 */

import pino from 'pino';
import { z } from 'zod';
import { CRITIC_SYSTEM_PROMPT, buildCriticUserPrompt, formatEvidence } from './prompts/index.js';
import { err, ok, type Result } from '../../types/result.js';
import { usageOf } from '../llm/usage.js';
import type { ModelGateway } from '../llm/gateway.js';
import type { ModelError, ModelTier, ModelUsage } from '../../types/llm.js';
import type { DebateTurn } from '../../types/decision.js';
import type { SpecialistResult } from '../../types/specialist.js';

const logger = pino({
  name: 'critic-agent',
  level: process.env.LOG_LEVEL || 'info',
});

export const verdictSchema = z
  .object({
    verdict: z.enum(['approve', 'flag', 'refute']),
    rationale: z.string().default(''),
  })
  .refine((v) => v.verdict === 'approve' || v.rationale.trim().length > 0, {
    message: 'flag and refute verdicts require a rationale',
    path: ['rationale'],
  });

export interface ReviewInput {
  query: string;
  evidence: readonly SpecialistResult[];
  thesis: string;
  /** Zero-based review round */
  turnIndex: number;
  correlationId: string;
  signal?: AbortSignal;
}

export interface CriticReview {
  turn: DebateTurn;
  /** True when the verdict was substituted because the critic failed */
  degraded: boolean;
  usage?: ModelUsage;
}

export class CriticAgent {
  constructor(private readonly gateway: ModelGateway, private readonly tier: ModelTier = 'large') {}

  async review(input: ReviewInput): Promise<Result<CriticReview, ModelError>> {
    const outcome = await this.gateway.generateStructured(
      {
        tier: this.tier,
        purpose: 'critic',
        correlationId: input.correlationId,
        messages: [
          { role: 'system', content: CRITIC_SYSTEM_PROMPT },
          {
            role: 'user',
            content: buildCriticUserPrompt(input.query, formatEvidence(input.evidence), input.thesis, input.turnIndex),
          },
        ],
        maxTokens: 300,
        temperature: 0,
      },
      verdictSchema,
      input.signal
    );

    if (!outcome.ok) {
      if (outcome.error.kind === 'aborted') {
        return err(outcome.error);
      }
      logger.warn({
        correlationId: input.correlationId,
        turnIndex: input.turnIndex,
        kind: outcome.error.kind,
      }, 'Critic review unavailable, recording flag');
      return ok({
        degraded: true,
        turn: {
          turnIndex: input.turnIndex,
          speaker: 'critic',
          verdict: 'flag',
          rationale: `Risk review could not be completed (${outcome.error.kind}); treat this thesis as unreviewed.`,
        },
      });
    }

    const { verdict, rationale } = outcome.value.value;
    logger.info({ correlationId: input.correlationId, turnIndex: input.turnIndex, verdict }, 'Critic verdict');
    return ok({
      degraded: false,
      turn: {
        turnIndex: input.turnIndex,
        speaker: 'critic',
        verdict,
        rationale: rationale.trim(),
      },
      usage: usageOf(outcome.value.result),
    });
  }
}
