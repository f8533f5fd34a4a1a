/**
 * Model gateway exports and factory
 */

import { AnthropicBackend } from './anthropic-backend.js';
import { ModelGateway } from './gateway.js';
import { OpenAIBackend } from './openai-backend.js';
import { ScriptedBackend, demoResponder } from './scripted-backend.js';
import { llmConfig, type LLMConfig, type TierConfig } from '../../config/llm.js';
import type { ModelBackend } from '../../types/llm.js';

export { ModelGateway, extractJson, type GatewayOptions, type StructuredResult } from './gateway.js';
export { ScriptedBackend, demoResponder, type ScriptedReply, type ScriptedResponder } from './scripted-backend.js';
export { CircuitBreaker, type CircuitState } from './circuit-breaker.js';
export { RETRY_POLICY, calculateBackoff } from './retry-policy.js';
export { usageOf, combineUsage } from './usage.js';

/**
 * Build a backend for one tier from configuration
 */
export function createBackend(tier: TierConfig, cfg: LLMConfig = llmConfig): ModelBackend {
  switch (tier.provider) {
    case 'openai':
      return new OpenAIBackend({ apiKey: cfg.openai.apiKey, baseURL: cfg.openai.baseURL, model: tier.model });
    case 'anthropic':
      return new AnthropicBackend({
        apiKey: cfg.anthropic.apiKey,
        baseURL: cfg.anthropic.baseURL,
        model: tier.model,
        samples: cfg.selfConsistencySamples,
        sampleTemperature: cfg.selfConsistencyTemperature,
      });
    case 'scripted':
      return new ScriptedBackend(tier.model, demoResponder);
  }
}

/**
 * Build the process-wide gateway from configuration
 */
export function createModelGateway(cfg: LLMConfig = llmConfig): ModelGateway {
  return new ModelGateway(
    {
      small: createBackend(cfg.tiers.small, cfg),
      large: createBackend(cfg.tiers.large, cfg),
    },
    {
      timeoutMs: cfg.timeoutMs,
      limiter: cfg.limiter,
      retry: cfg.retry,
      circuit: cfg.circuit,
    }
  );
}
