/**
 * Usage attribution for trace hops
 */

import type { GenerateResult, ModelUsage } from '../../types/llm.js';

export function usageOf(result: GenerateResult): ModelUsage {
  return { model: result.model, tokens: result.usage?.totalTokens ?? 0 };
}

/**
 * Sum the tokens of several calls; distinct models are joined with '+' in call order
 */
export function combineUsage(parts: readonly ModelUsage[]): ModelUsage | undefined {
  if (parts.length === 0) return undefined;
  const models = [...new Set(parts.map((p) => p.model))];
  return {
    model: models.join('+'),
    tokens: parts.reduce((acc, p) => acc + p.tokens, 0),
  };
}
