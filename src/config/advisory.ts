/**
 * Orchestration, router, confidence and stream configuration.
 * Thresholds and weights are tunable; results are deterministic for a fixed configuration.
 */

import { getEnvFloat, getEnvInt, getEnvVar } from './env.js';

export interface RouterConfig {
  /** τ: segments above this mean entropy are re-issued to the large model */
  entropyThreshold: number;
  /** τ2: large-model segments above this are marked low confidence */
  lowConfidenceThreshold: number;
  /** Max tokens per small-model drafting call */
  chunkMaxTokens: number;
  /** Max tokens for a large-model segment re-issue */
  segmentMaxTokens: number;
  /** Hard cap on segments in one trajectory */
  maxSegments: number;
}

export interface ConfidenceConfig {
  weights: {
    agreement: number;
    stability: number;
    router: number;
  };
  /** Stability lost per debate turn beyond the first */
  turnDecay: number;
  /** Stability multiplier when the final verdict is a flag */
  flagFactor: number;
  /** Stability multiplier when a refutation is left unresolved */
  unresolvedFactor: number;
  /** Cap applied when debate turns run out without approval */
  exhaustedCap: number;
  /** Cap applied when the request budget expired */
  budgetCap: number;
  /** Cap applied when fewer than half of the specialists succeeded */
  quorumCap: number;
}

export interface OrchestrationConfig {
  maxDebateTurns: number;
  requestBudgetMs: number;
  specialistTimeoutMs: number;
}

export interface StreamConfig {
  sessionIdleMs: number;
  heartbeatMs: number;
  sweepIntervalMs: number;
}

export interface ActionConfig {
  tokenSecret: string;
  issuer: string;
  audience: string;
}

export interface AdvisoryConfig {
  orchestration: OrchestrationConfig;
  router: RouterConfig;
  confidence: ConfidenceConfig;
  stream: StreamConfig;
  actions: ActionConfig;
}

export const DEFAULT_ROUTER_CONFIG: RouterConfig = {
  entropyThreshold: 0.4,
  lowConfidenceThreshold: 0.6,
  chunkMaxTokens: 256,
  segmentMaxTokens: 96,
  maxSegments: 24,
};

export const DEFAULT_CONFIDENCE_CONFIG: ConfidenceConfig = {
  weights: { agreement: 0.4, stability: 0.35, router: 0.25 },
  turnDecay: 0.25,
  flagFactor: 0.8,
  unresolvedFactor: 0.5,
  exhaustedCap: 0.6,
  budgetCap: 0.5,
  quorumCap: 0.55,
};

export const DEFAULT_ORCHESTRATION_CONFIG: OrchestrationConfig = {
  maxDebateTurns: 2,
  requestBudgetMs: 90000,
  specialistTimeoutMs: 15000,
};

export const advisoryConfig: AdvisoryConfig = {
  orchestration: {
    maxDebateTurns: getEnvInt('ADVISORY_MAX_DEBATE_TURNS', DEFAULT_ORCHESTRATION_CONFIG.maxDebateTurns),
    requestBudgetMs: getEnvInt('ADVISORY_REQUEST_BUDGET_MS', DEFAULT_ORCHESTRATION_CONFIG.requestBudgetMs),
    specialistTimeoutMs: getEnvInt('ADVISORY_SPECIALIST_TIMEOUT_MS', DEFAULT_ORCHESTRATION_CONFIG.specialistTimeoutMs),
  },
  router: {
    entropyThreshold: getEnvFloat('ROUTER_ENTROPY_THRESHOLD', DEFAULT_ROUTER_CONFIG.entropyThreshold),
    lowConfidenceThreshold: getEnvFloat('ROUTER_LOW_CONFIDENCE_THRESHOLD', DEFAULT_ROUTER_CONFIG.lowConfidenceThreshold),
    chunkMaxTokens: getEnvInt('ROUTER_CHUNK_MAX_TOKENS', DEFAULT_ROUTER_CONFIG.chunkMaxTokens),
    segmentMaxTokens: getEnvInt('ROUTER_SEGMENT_MAX_TOKENS', DEFAULT_ROUTER_CONFIG.segmentMaxTokens),
    maxSegments: getEnvInt('ROUTER_MAX_SEGMENTS', DEFAULT_ROUTER_CONFIG.maxSegments),
  },
  confidence: {
    ...DEFAULT_CONFIDENCE_CONFIG,
    weights: {
      agreement: getEnvFloat('CONFIDENCE_WEIGHT_AGREEMENT', DEFAULT_CONFIDENCE_CONFIG.weights.agreement),
      stability: getEnvFloat('CONFIDENCE_WEIGHT_STABILITY', DEFAULT_CONFIDENCE_CONFIG.weights.stability),
      router: getEnvFloat('CONFIDENCE_WEIGHT_ROUTER', DEFAULT_CONFIDENCE_CONFIG.weights.router),
    },
    exhaustedCap: getEnvFloat('CONFIDENCE_EXHAUSTED_CAP', DEFAULT_CONFIDENCE_CONFIG.exhaustedCap),
    budgetCap: getEnvFloat('CONFIDENCE_BUDGET_CAP', DEFAULT_CONFIDENCE_CONFIG.budgetCap),
  },
  stream: {
    sessionIdleMs: getEnvInt('STREAM_SESSION_IDLE_MS', 60000),
    heartbeatMs: getEnvInt('STREAM_HEARTBEAT_MS', 15000),
    sweepIntervalMs: getEnvInt('STREAM_SWEEP_INTERVAL_MS', 10000),
  },
  actions: {
    tokenSecret: getEnvVar('ACTION_TOKEN_SECRET', false, 'change-me'),
    issuer: 'advisory-orchestrator',
    audience: 'advisory-actions',
  },
};

/**
 * Validate configuration at startup
 */
export function validateAdvisoryConfig(cfg: AdvisoryConfig = advisoryConfig): void {
  const errors: string[] = [];
  const { router, confidence, orchestration } = cfg;

  if (orchestration.maxDebateTurns < 1) {
    errors.push('ADVISORY_MAX_DEBATE_TURNS must be >= 1');
  }
  if (router.entropyThreshold < 0 || router.entropyThreshold > 1) {
    errors.push('ROUTER_ENTROPY_THRESHOLD must be within [0, 1]');
  }
  if (router.lowConfidenceThreshold < 0 || router.lowConfidenceThreshold > 1) {
    errors.push('ROUTER_LOW_CONFIDENCE_THRESHOLD must be within [0, 1]');
  }
  const weightSum = confidence.weights.agreement + confidence.weights.stability + confidence.weights.router;
  if (weightSum <= 0) {
    errors.push('Confidence weights must sum to a positive value');
  }
  if (process.env.NODE_ENV === 'production' && cfg.actions.tokenSecret === 'change-me') {
    errors.push('ACTION_TOKEN_SECRET must be set in production');
  }

  if (errors.length > 0) {
    throw new Error(`Advisory configuration validation failed:\n${errors.join('\n')}`);
  }
}
