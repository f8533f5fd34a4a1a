/**
 * Model tier configuration
 *
 * Each tier (small drafter, large fallback) names a provider and a model.
 * Providers: 'openai' (any OpenAI-compatible server, exposes logprobs),
 * 'anthropic' (no logprobs, entropy from self-consistency sampling) and
 * 'scripted' (deterministic local responder for development).
 */

import { getEnvFloat, getEnvInt, getEnvVar } from './env.js';
import { logger } from '../services/logging/logger.js';
import type { ModelProviderName, ModelTier } from '../types/llm.js';

export interface TierConfig {
  provider: ModelProviderName;
  model: string;
}

export interface LLMConfig {
  openai: {
    apiKey: string;
    baseURL?: string;
  };
  anthropic: {
    apiKey: string;
    baseURL?: string;
  };
  tiers: Record<ModelTier, TierConfig>;
  /** Per-call timeout in milliseconds */
  timeoutMs: number;
  /** Shared backend pool limits, one limiter per tier */
  limiter: {
    maxConcurrent: number;
    minTime: number;
  };
  retry: {
    baseDelay: number;
    maxDelay: number;
  };
  circuit: {
    failureThreshold: number;
    recoveryMs: number;
  };
  /** Samples drawn when a backend exposes no logprobs */
  selfConsistencySamples: number;
  /** Sampling temperature for self-consistency samples */
  selfConsistencyTemperature: number;
}

function validateProvider(key: string, provider: string): ModelProviderName {
  if (provider === 'openai' || provider === 'anthropic' || provider === 'scripted') {
    return provider;
  }
  throw new Error(`Invalid provider for ${key}: ${provider}. Must be 'openai', 'anthropic' or 'scripted'`);
}

/**
 * Model configuration loaded from environment variables
 */
export const llmConfig: LLMConfig = {
  openai: {
    apiKey: getEnvVar('OPENAI_API_KEY'),
    baseURL: getEnvVar('OPENAI_BASE_URL') || undefined,
  },
  anthropic: {
    apiKey: getEnvVar('ANTHROPIC_API_KEY'),
    baseURL: getEnvVar('ANTHROPIC_BASE_URL') || undefined,
  },
  tiers: {
    small: {
      provider: validateProvider('LLM_SMALL_PROVIDER', getEnvVar('LLM_SMALL_PROVIDER', false, 'scripted')),
      model: getEnvVar('LLM_SMALL_MODEL', false, 'gpt-4o-mini'),
    },
    large: {
      provider: validateProvider('LLM_LARGE_PROVIDER', getEnvVar('LLM_LARGE_PROVIDER', false, 'scripted')),
      model: getEnvVar('LLM_LARGE_MODEL', false, 'gpt-4o'),
    },
  },
  timeoutMs: getEnvInt('LLM_TIMEOUT_MS', 30000),
  limiter: {
    maxConcurrent: getEnvInt('LLM_MAX_CONCURRENT', 4),
    minTime: getEnvInt('LLM_MIN_TIME_MS', 50),
  },
  retry: {
    baseDelay: getEnvInt('LLM_RETRY_BASE_DELAY', 500),
    maxDelay: getEnvInt('LLM_RETRY_MAX_DELAY', 8000),
  },
  circuit: {
    failureThreshold: getEnvInt('LLM_CIRCUIT_FAILURE_THRESHOLD', 3),
    recoveryMs: getEnvInt('LLM_CIRCUIT_RECOVERY_MS', 30000),
  },
  selfConsistencySamples: getEnvInt('LLM_SELF_CONSISTENCY_SAMPLES', 3),
  selfConsistencyTemperature: getEnvFloat('LLM_SELF_CONSISTENCY_TEMPERATURE', 0.9),
};

/**
 * Validate configuration at startup
 */
export function validateLLMConfig(cfg: LLMConfig = llmConfig): void {
  const errors: string[] = [];

  for (const tier of ['small', 'large'] as const) {
    const { provider } = cfg.tiers[tier];
    if (provider === 'openai' && !cfg.openai.apiKey && !cfg.openai.baseURL) {
      errors.push(`OPENAI_API_KEY or OPENAI_BASE_URL is required for the ${tier} tier`);
    }
    if (provider === 'anthropic' && !cfg.anthropic.apiKey) {
      errors.push(`ANTHROPIC_API_KEY is required for the ${tier} tier`);
    }
  }

  if (cfg.timeoutMs < 1000) {
    errors.push('LLM_TIMEOUT_MS must be >= 1000 (1 second)');
  }

  if (cfg.retry.maxDelay < cfg.retry.baseDelay) {
    errors.push('LLM_RETRY_MAX_DELAY must be >= LLM_RETRY_BASE_DELAY');
  }

  if (cfg.limiter.maxConcurrent < 1) {
    errors.push('LLM_MAX_CONCURRENT must be >= 1');
  }

  if (cfg.selfConsistencySamples < 1) {
    errors.push('LLM_SELF_CONSISTENCY_SAMPLES must be >= 1');
  }

  if (errors.length > 0) {
    throw new Error(`LLM configuration validation failed:\n${errors.join('\n')}`);
  }
}

if (process.env.NODE_ENV !== 'test' && !process.env.VITEST) {
  try {
    validateLLMConfig();
  } catch (error) {
    logger.error({ err: error }, 'LLM configuration validation failed');
    if (process.env.NODE_ENV === 'production') {
      throw error;
    }
  }
}
