/**
 * Token-level uncertainty measures
 *
 * All values are normalized Shannon entropies in [0,1]: 0 means the model was
 * certain, 1 means the probability mass was spread evenly.
 */

import type { TokenEntropy } from '../../types/llm.js';

export interface EntropySummary {
  mean: number;
  max: number;
  tokenCount: number;
}

const RESIDUAL_EPSILON = 1e-6;

function clamp01(value: number): number {
  if (Number.isNaN(value)) return 1;
  return Math.min(1, Math.max(0, value));
}

/**
 * Entropy of one token position from its top-k log probabilities.
 * Mass not covered by the top-k alternatives is treated as one extra outcome.
 */
export function entropyFromLogprobs(logprobs: readonly number[]): number {
  if (logprobs.length === 0) return 1;

  const probs = logprobs.map((lp) => Math.exp(lp));
  const covered = probs.reduce((sum, p) => sum + p, 0);
  const residual = Math.max(0, 1 - covered);
  if (residual > RESIDUAL_EPSILON) probs.push(residual);

  if (probs.length < 2) return 0;

  const total = probs.reduce((sum, p) => sum + p, 0);
  let h = 0;
  for (const p of probs) {
    const q = p / total;
    if (q > 0) h -= q * Math.log(q);
  }
  return clamp01(h / Math.log(probs.length));
}

/**
 * Entropy of the distribution of sampled answers (self-consistency).
 * Identical samples give 0, pairwise distinct samples give 1.
 */
export function entropyFromSamples(samples: readonly string[]): number {
  if (samples.length < 2) return 0;

  const counts = new Map<string, number>();
  for (const sample of samples) {
    const key = normalizeSample(sample);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }

  let h = 0;
  for (const count of counts.values()) {
    const p = count / samples.length;
    h -= p * Math.log(p);
  }
  return clamp01(h / Math.log(samples.length));
}

function normalizeSample(sample: string): string {
  return sample.toLowerCase().replace(/[^a-z0-9%$.\s]/g, '').replace(/\s+/g, ' ').trim();
}

/**
 * Split text into whitespace-delimited tokens carrying a fixed entropy.
 * Used by backends that expose no token stream of their own.
 */
export function tokensFromText(text: string, entropy: number, baseOffset: number = 0): TokenEntropy[] {
  const tokens: TokenEntropy[] = [];
  const pattern = /\S+\s*/g;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(text)) !== null) {
    tokens.push({ text: match[0], offset: baseOffset + match.index, entropy: clamp01(entropy) });
  }
  return tokens;
}

/**
 * Summarize the entropy of the tokens that start inside [start, end).
 * A span with no scored tokens counts as fully uncertain.
 */
export function summarizeSpan(tokens: readonly TokenEntropy[], start: number, end: number): EntropySummary {
  const values = tokens
    .filter((token) => token.offset >= start && token.offset < end)
    .map((token) => token.entropy);
  return summarize(values);
}

export function summarize(values: readonly number[]): EntropySummary {
  if (values.length === 0) {
    return { mean: 1, max: 1, tokenCount: 0 };
  }
  const sum = values.reduce((acc, v) => acc + v, 0);
  return {
    mean: round(sum / values.length),
    max: round(Math.max(...values)),
    tokenCount: values.length,
  };
}

function round(value: number): number {
  return Math.round(value * 10000) / 10000;
}
