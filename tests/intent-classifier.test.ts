/**
 * Intent Classifier Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { IntentClassifier } from '../src/services/agents/intent-classifier.js';
import { json, scriptedGateway } from './helpers/scripted.js';

describe('IntentClassifier', () => {
  it('should return the typed classification with deduplicated specialists', async () => {
    const { gateway, small } = scriptedGateway(() =>
      json({ intent: 'trade_idea', specialists: ['quant', 'quant', 'whale'], ticker: 'nvda', reason: 'Asks what to buy' })
    );
    const classifier = new IntentClassifier(gateway);

    const result = await classifier.classify('Should I buy NVDA?', { correlationId: 'corr-1' });

    expect(result).toEqual({
      ok: true,
      value: {
        intent: 'trade_idea',
        specialists: ['quant', 'whale'],
        ticker: 'NVDA',
        reason: 'Asks what to buy',
        fallback: false,
        usage: { model: 'small-test-model', tokens: 4 },
      },
    });
    expect(small.calls[0]?.purpose).toBe('intent');
    expect(small.calls[0]?.temperature).toBe(0);
  });

  it('should select no specialists for educational questions', async () => {
    const { gateway } = scriptedGateway(() =>
      json({ intent: 'educational', specialists: ['research'], reason: 'Definition question' })
    );

    const result = await new IntentClassifier(gateway).classify('What is a P/E ratio?', { correlationId: 'corr-2' });

    expect(result.ok && result.value.specialists).toEqual([]);
  });

  it('should fill in the default specialists when none were chosen', async () => {
    const { gateway } = scriptedGateway(() => json({ intent: 'portfolio_review', specialists: [], reason: '' }));

    const result = await new IntentClassifier(gateway).classify('Review my holdings', { correlationId: 'corr-3' });

    expect(result.ok && result.value.specialists).toEqual(['quant', 'research', 'forecast']);
  });

  it('should fall back to market analysis when the output is invalid', async () => {
    const { gateway } = scriptedGateway(() => json({ intent: 'moonshot', specialists: [] }));

    const result = await new IntentClassifier(gateway).classify('???', { correlationId: 'corr-4' });

    expect(result).toEqual({
      ok: true,
      value: {
        intent: 'market_analysis',
        specialists: ['quant', 'sentiment', 'research'],
        reason: 'Classification unavailable',
        fallback: true,
      },
    });
  });

  it('should propagate cancellation', async () => {
    const { gateway } = scriptedGateway(() => json({ intent: 'price_check', specialists: ['quant'] }));
    const controller = new AbortController();
    controller.abort();

    const result = await new IntentClassifier(gateway).classify('Price?', {
      correlationId: 'corr-5',
      signal: controller.signal,
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('aborted');
  });
});
