/**
 * Entropy Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  entropyFromLogprobs,
  entropyFromSamples,
  summarize,
  summarizeSpan,
  tokensFromText,
} from '../src/services/llm/entropy.js';

describe('entropyFromLogprobs', () => {
  it('should be 0 for a certain token', () => {
    expect(entropyFromLogprobs([0])).toBe(0);
  });

  it('should be 1 for two equally likely alternatives', () => {
    expect(entropyFromLogprobs([Math.log(0.5), Math.log(0.5)])).toBeCloseTo(1, 6);
  });

  it('should count uncovered probability mass as one more outcome', () => {
    expect(entropyFromLogprobs([Math.log(0.5)])).toBeCloseTo(1, 6);
  });

  it('should treat a missing distribution as fully uncertain', () => {
    expect(entropyFromLogprobs([])).toBe(1);
  });
});

describe('entropyFromSamples', () => {
  it('should be 0 when samples agree after normalization', () => {
    expect(entropyFromSamples(['Buy', 'buy!', 'BUY'])).toBe(0);
  });

  it('should be 1 when every sample differs', () => {
    expect(entropyFromSamples(['up', 'down', 'flat'])).toBeCloseTo(1, 6);
  });

  it('should be 0 for a single sample', () => {
    expect(entropyFromSamples(['only'])).toBe(0);
  });
});

describe('tokensFromText', () => {
  it('should split on whitespace and keep offsets relative to the base', () => {
    const tokens = tokensFromText('alpha beta  gamma', 0.3, 10);

    expect(tokens).toEqual([
      { text: 'alpha ', offset: 10, entropy: 0.3 },
      { text: 'beta  ', offset: 16, entropy: 0.3 },
      { text: 'gamma', offset: 22, entropy: 0.3 },
    ]);
  });

  it('should clamp entropy into [0, 1]', () => {
    expect(tokensFromText('x', 1.5)[0]?.entropy).toBe(1);
  });
});

describe('summarize', () => {
  it('should summarize the tokens starting inside a span', () => {
    const tokens = tokensFromText('alpha beta  gamma', 0.3, 10);

    expect(summarizeSpan(tokens, 16, 22)).toEqual({ mean: 0.3, max: 0.3, tokenCount: 1 });
  });

  it('should treat an empty span as fully uncertain', () => {
    expect(summarize([])).toEqual({ mean: 1, max: 1, tokenCount: 0 });
  });

  it('should round mean and max to four decimals', () => {
    expect(summarize([0.1, 0.2, 0.6])).toEqual({ mean: 0.3, max: 0.6, tokenCount: 3 });
  });
});
