/**
 * Adversarial Confidence Estimator
 *
 *   score = (w1 * agreement + w2 * stability + w3 * router) / (w1 + w2 + w3)
 *
 * agreement  specialist success ratio times stance consensus among successes
 * stability  1 on first-turn approval, minus turnDecay per extra review,
 *            scaled down when the last verdict is a flag or an open refutation
 * router     1 minus the mean segment entropy of the final thesis
 *
 * Caps apply for exhausted debate, budget expiry and missing specialist
 * quorum. Pure and deterministic for a fixed configuration.
 */

import { DEFAULT_CONFIDENCE_CONFIG, type ConfidenceConfig } from '../../config/advisory.js';
import type {
  CapReason,
  ConfidenceLabel,
  ConfidenceScore,
  DebateTurn,
  ReasoningSegment,
} from '../../types/decision.js';
import type { SpecialistResult, Stance } from '../../types/specialist.js';

export interface ConfidenceInputs {
  specialistResults: readonly SpecialistResult[];
  debate: readonly DebateTurn[];
  /** Segments of the final thesis; empty when the thesis was not router-drafted */
  segments: readonly ReasoningSegment[];
  debateExhausted: boolean;
  budgetExceeded: boolean;
}

const NEUTRAL = 0.5;

function round4(value: number): number {
  return Math.round(value * 10000) / 10000;
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

export function specialistAgreement(results: readonly SpecialistResult[]): number {
  if (results.length === 0) return NEUTRAL;

  const successes = results.filter((r) => !r.error);
  if (successes.length === 0) return 0;

  const counts = new Map<Stance, number>();
  for (const result of successes) {
    if (result.stance) counts.set(result.stance, (counts.get(result.stance) ?? 0) + 1);
  }
  const stanced = [...counts.values()].reduce((acc, n) => acc + n, 0);
  const consensus = stanced === 0 ? NEUTRAL : Math.max(...counts.values()) / stanced;

  return clamp01((successes.length / results.length) * consensus);
}

export function debateStability(debate: readonly DebateTurn[], config: ConfidenceConfig): number {
  const reviews = debate.filter((t) => t.speaker === 'critic');
  const last = reviews[reviews.length - 1];
  if (!last) return NEUTRAL;

  const base = Math.max(0, 1 - config.turnDecay * (reviews.length - 1));
  switch (last.verdict) {
    case 'approve':
      return clamp01(base);
    case 'flag':
      return clamp01(base * config.flagFactor);
    case 'refute':
      return clamp01(base * config.unresolvedFactor);
  }
}

export function routerConfidence(segments: readonly ReasoningSegment[]): number {
  if (segments.length === 0) return NEUTRAL;
  const mean = segments.reduce((acc, s) => acc + s.entropy.mean, 0) / segments.length;
  return clamp01(1 - mean);
}

export function labelFor(score: number): ConfidenceLabel {
  if (score >= 0.85) return 'battle_tested';
  if (score >= 0.7) return 'verified';
  if (score >= 0.5) return 'cautionary';
  return 'high_entropy';
}

export function estimateConfidence(
  inputs: ConfidenceInputs,
  config: ConfidenceConfig = DEFAULT_CONFIDENCE_CONFIG
): ConfidenceScore {
  const agreement = specialistAgreement(inputs.specialistResults);
  const stability = debateStability(inputs.debate, config);
  const router = routerConfidence(inputs.segments);

  const { weights } = config;
  const weightSum = weights.agreement + weights.stability + weights.router;
  let score = weightSum > 0
    ? (weights.agreement * agreement + weights.stability * stability + weights.router * router) / weightSum
    : 0;

  const capReasons: CapReason[] = [];
  if (inputs.debateExhausted) {
    capReasons.push('debate_exhausted');
    score = Math.min(score, config.exhaustedCap);
  }
  if (inputs.budgetExceeded) {
    capReasons.push('budget_exceeded');
    score = Math.min(score, config.budgetCap);
  }
  const selected = inputs.specialistResults.length;
  const succeeded = inputs.specialistResults.filter((r) => !r.error).length;
  if (selected > 0 && succeeded * 2 < selected) {
    capReasons.push('specialist_quorum');
    score = Math.min(score, config.quorumCap);
  }

  const finalScore = round4(clamp01(score));
  return {
    score: finalScore,
    breakdown: {
      specialistAgreement: round4(agreement),
      debateStability: round4(stability),
      routerConfidence: round4(router),
    },
    capped: capReasons.length > 0,
    capReasons,
    label: labelFor(finalScore),
  };
}
