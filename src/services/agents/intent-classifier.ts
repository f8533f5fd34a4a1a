/**
 * Intent Classifier
 *
 * One structured small-model call maps the question to a closed intent enum
 * and a set of specialist tags. Output outside the enums fails schema
 * validation; any failure other than an abort falls back to the default
 * intent so the request can proceed.
 */

import pino from 'pino';
import { z } from 'zod';
import { INTENT_SYSTEM_PROMPT, buildIntentUserPrompt } from './prompts/index.js';
import { DEFAULT_INTENT_SPECIALISTS, FALLBACK_INTENT } from '../../config/intent-routing.js';
import { err, ok, type Result } from '../../types/result.js';
import {
  intentSchema,
  specialistTagSchema,
  type IntentClassification,
  type SpecialistTag,
} from '../../types/specialist.js';
import { usageOf } from '../llm/usage.js';
import type { ModelGateway } from '../llm/gateway.js';
import type { ModelError } from '../../types/llm.js';

const logger = pino({
  name: 'intent-classifier',
  level: process.env.LOG_LEVEL || 'info',
});

export const classificationSchema = z.object({
  intent: intentSchema,
  specialists: z.array(specialistTagSchema).max(5),
  ticker: z.string().trim().min(1).max(12).nullable().optional(),
  reason: z.string().default(''),
});

export interface ClassifyOptions {
  correlationId: string;
  accountScope?: string;
  signal?: AbortSignal;
}

function unique(tags: readonly SpecialistTag[]): SpecialistTag[] {
  return [...new Set(tags)];
}

export class IntentClassifier {
  constructor(private readonly gateway: ModelGateway) {}

  async classify(query: string, options: ClassifyOptions): Promise<Result<IntentClassification, ModelError>> {
    const outcome = await this.gateway.generateStructured(
      {
        tier: 'small',
        purpose: 'intent',
        correlationId: options.correlationId,
        messages: [
          { role: 'system', content: INTENT_SYSTEM_PROMPT },
          { role: 'user', content: buildIntentUserPrompt(query, options.accountScope) },
        ],
        maxTokens: 200,
        temperature: 0,
      },
      classificationSchema,
      options.signal
    );

    if (!outcome.ok) {
      if (outcome.error.kind === 'aborted') {
        return err(outcome.error);
      }
      logger.warn({
        correlationId: options.correlationId,
        kind: outcome.error.kind,
        error: outcome.error.message,
      }, 'Intent classification failed, using fallback intent');
      return ok({
        intent: FALLBACK_INTENT,
        specialists: [...DEFAULT_INTENT_SPECIALISTS[FALLBACK_INTENT]],
        reason: 'Classification unavailable',
        fallback: true,
      });
    }

    const { intent, specialists, ticker, reason } = outcome.value.value;
    let selected = unique(specialists);
    if (intent === 'educational') {
      selected = [];
    } else if (selected.length === 0) {
      selected = [...DEFAULT_INTENT_SPECIALISTS[intent]];
    }

    const classification: IntentClassification = {
      intent,
      specialists: selected,
      ticker: ticker ? ticker.toUpperCase() : undefined,
      reason,
      fallback: false,
      usage: usageOf(outcome.value.result),
    };

    logger.info({ correlationId: options.correlationId, ...classification }, 'Intent classified');
    return ok(classification);
  }
}
