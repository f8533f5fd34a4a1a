/**
 * Scripted backend for local development and tests.
 *
 * A responder function decides each reply from the request, so outputs and
 * their entropies are fully deterministic.
 */

import { tokensFromText } from './entropy.js';
import {
  ModelError,
  type BackendCompletion,
  type FinishReason,
  type GenerateRequest,
  type ModelBackend,
  type TokenEntropy,
} from '../../types/llm.js';

export interface ScriptedSegment {
  text: string;
  entropy: number;
}

export interface ScriptedReply {
  text?: string;
  /** Text given as pieces with their own entropy; concatenated in order */
  segments?: ScriptedSegment[];
  /** Entropy for every token of `text` */
  entropy?: number;
  finishReason?: FinishReason;
  delayMs?: number;
}

export type ScriptedOutcome = ScriptedReply | string | Error;

export type ScriptedResponder = (
  request: GenerateRequest,
  callIndex: number
) => ScriptedOutcome | Promise<ScriptedOutcome>;

const DEFAULT_ENTROPY = 0.1;

function waitFor(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new ModelError('Scripted call aborted', 'aborted'));
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

export class ScriptedBackend implements ModelBackend {
  readonly provider = 'scripted' as const;
  readonly calls: GenerateRequest[] = [];

  constructor(readonly model: string, private readonly responder: ScriptedResponder) {}

  async complete(request: GenerateRequest, signal: AbortSignal): Promise<BackendCompletion> {
    if (signal.aborted) {
      throw new ModelError('Scripted call aborted', 'aborted');
    }

    const callIndex = this.calls.length;
    this.calls.push(request);

    const outcome = await this.responder(request, callIndex);
    if (outcome instanceof Error) {
      throw outcome;
    }

    const reply: ScriptedReply = typeof outcome === 'string' ? { text: outcome } : outcome;
    if (reply.delayMs) {
      await waitFor(reply.delayMs, signal);
    }

    let text = '';
    let tokens: TokenEntropy[] = [];
    if (reply.segments) {
      for (const segment of reply.segments) {
        tokens = tokens.concat(tokensFromText(segment.text, segment.entropy, text.length));
        text += segment.text;
      }
    } else {
      text = reply.text ?? '';
      tokens = tokensFromText(text, reply.entropy ?? DEFAULT_ENTROPY);
    }

    return {
      text,
      tokens,
      finishReason: reply.finishReason ?? 'stop',
      model: this.model,
      entropySource: 'logprobs',
      usage: {
        promptTokens: 0,
        completionTokens: tokens.length,
        totalTokens: tokens.length,
      },
    };
  }
}

/**
 * Responder used when a tier is configured with the 'scripted' provider.
 * Produces well-formed answers for every caller so the full pipeline runs offline.
 */
export function demoResponder(request: GenerateRequest): ScriptedOutcome {
  const purpose = request.purpose ?? '';

  if (purpose === 'intent') {
    return JSON.stringify({
      intent: 'market_analysis',
      specialists: ['quant', 'sentiment', 'research'],
      ticker: null,
      reason: 'General market question',
    });
  }

  if (purpose.startsWith('specialist:')) {
    return JSON.stringify({
      stance: 'neutral',
      summary: `Offline ${purpose.slice('specialist:'.length)} view: no live data source is configured.`,
      signals: {},
    });
  }

  if (purpose === 'critic') {
    return JSON.stringify({
      verdict: 'flag',
      rationale: 'Analysis was produced without live market data and should be verified.',
    });
  }

  if (request.prefix) {
    return { text: '', finishReason: 'stop' };
  }

  return {
    segments: [
      { text: 'The available evidence is limited and mixed. ', entropy: 0.2 },
      { text: 'A cautious position with defined risk limits is the prudent course. ', entropy: 0.3 },
      { text: 'Revisit the thesis once live data is available.', entropy: 0.2 },
    ],
  };
}
