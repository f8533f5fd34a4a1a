/**
 * Specialist and intent types
 */

import { z } from 'zod';
import type { ModelUsage } from './llm.js';

export const SPECIALIST_TAGS = ['quant', 'sentiment', 'forecast', 'research', 'whale'] as const;
export type SpecialistTag = (typeof SPECIALIST_TAGS)[number];
export const specialistTagSchema = z.enum(SPECIALIST_TAGS);

export const INTENTS = [
  'price_check',
  'market_analysis',
  'portfolio_review',
  'trade_idea',
  'goal_planning',
  'educational',
] as const;
export type Intent = (typeof INTENTS)[number];
export const intentSchema = z.enum(INTENTS);

export type Stance = 'bullish' | 'bearish' | 'neutral';
export const stanceSchema = z.enum(['bullish', 'bearish', 'neutral']);

/**
 * Typed intent classification returned by one structured model call
 */
export interface IntentClassification {
  intent: Intent;
  specialists: SpecialistTag[];
  ticker?: string;
  reason: string;
  /** True when classification failed and the default was used */
  fallback: boolean;
  usage?: ModelUsage;
}

/**
 * Read-only view of the request handed to every specialist
 */
export interface ContextSnapshot {
  readonly correlationId: string;
  readonly intent: Intent;
  readonly ticker?: string;
  readonly accountScope?: string;
  /** Prior thesis when the request revisits an earlier advisory */
  readonly priorThesis?: string;
}

export type SpecialistErrorKind = 'timeout' | 'failed' | 'schema_violation' | 'aborted';

export interface SpecialistError {
  kind: SpecialistErrorKind;
  message: string;
}

/**
 * What a specialist produces on success
 */
export interface SpecialistOutput {
  payload: Record<string, unknown>;
  narrative: string;
  stance?: Stance;
  usage?: ModelUsage;
}

/**
 * Outcome of one specialist invocation, success or failure
 */
export interface SpecialistResult {
  readonly tag: SpecialistTag;
  readonly payload: Readonly<Record<string, unknown>>;
  readonly narrative: string;
  readonly latencyMs: number;
  readonly stance?: Stance;
  readonly error?: SpecialistError;
  readonly usage?: ModelUsage;
}
