/**
 * Anthropic backend.
 *
 * The Messages API exposes no token logprobs, so uncertainty is approximated by
 * self-consistency: extra samples are drawn at a higher temperature and each
 * segment of the primary answer is scored by how much the samples disagree on
 * that segment. Extra samples are best effort: the primary answer stands
 * alone when none of them succeed.
 */

import Anthropic from '@anthropic-ai/sdk';
import { entropyFromSamples, tokensFromText } from './entropy.js';
import { splitSegments } from '../router/segmenter.js';
import { createLogger } from '../logging/index.js';
import {
  ModelError,
  type BackendCompletion,
  type FinishReason,
  type GenerateRequest,
  type ModelBackend,
  type TokenEntropy,
} from '../../types/llm.js';

const logger = createLogger({ module: 'anthropic-backend' });

/**
 * The slice of the Messages API the backend calls
 */
export interface MessagesClient {
  create(body: Anthropic.MessageCreateParamsNonStreaming, options?: { signal?: AbortSignal }): Promise<MessageResponse>;
}

export interface MessageResponse {
  content: Array<{ type: string; text?: string }>;
  model: string;
  stop_reason: string | null;
  usage: { input_tokens: number; output_tokens: number };
}

export interface AnthropicBackendOptions {
  apiKey: string;
  baseURL?: string;
  model: string;
  /** Total samples per call, including the primary answer */
  samples?: number;
  sampleTemperature?: number;
  messages?: MessagesClient;
}

interface Sample {
  text: string;
  finishReason: FinishReason;
  model: string;
  inputTokens: number;
  outputTokens: number;
}

function mapStopReason(reason: string | null): FinishReason {
  switch (reason) {
    case 'end_turn':
    case 'stop_sequence':
      return 'stop';
    case 'max_tokens':
      return 'length';
    default:
      return 'other';
  }
}

export class AnthropicBackend implements ModelBackend {
  readonly provider = 'anthropic' as const;
  readonly model: string;
  private readonly messages: MessagesClient;
  private readonly samples: number;
  private readonly sampleTemperature: number;

  constructor(options: AnthropicBackendOptions) {
    this.model = options.model;
    this.samples = Math.max(1, options.samples ?? 3);
    this.sampleTemperature = options.sampleTemperature ?? 0.9;
    this.messages =
      options.messages ??
      new Anthropic({
        apiKey: options.apiKey,
        baseURL: options.baseURL,
        maxRetries: 0,
      }).messages;
  }

  /** Every completion issues one request per sample */
  get callsPerCompletion(): number {
    return this.samples;
  }

  async complete(request: GenerateRequest, signal: AbortSignal): Promise<BackendCompletion> {
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    if (signal.aborted) controller.abort();
    signal.addEventListener('abort', onAbort, { once: true });

    try {
      const extraCount = this.samples - 1;
      const extrasSettled = Promise.allSettled(
        Array.from({ length: extraCount }, () => this.sample(request, this.sampleTemperature, controller.signal))
      );

      let primary: Sample;
      try {
        primary = await this.sample(request, request.temperature ?? 0.3, controller.signal);
      } catch (error: unknown) {
        controller.abort();
        await extrasSettled;
        throw error;
      }

      const settled = await extrasSettled;
      const others = settled.flatMap((outcome) => (outcome.status === 'fulfilled' ? [outcome.value] : []));
      if (others.length < extraCount) {
        logger.warn({
          correlationId: request.correlationId,
          model: this.model,
          failed: extraCount - others.length,
          requested: extraCount,
        }, 'Self-consistency samples failed');
      }

      const samples = [primary, ...others];
      return {
        text: primary.text,
        tokens: others.length > 0 ? scoreBySegments(primary.text, others.map((s) => s.text)) : [],
        finishReason: primary.finishReason,
        model: primary.model,
        entropySource: others.length > 0 ? 'self_consistency' : 'none',
        usage: {
          promptTokens: sum(samples.map((s) => s.inputTokens)),
          completionTokens: sum(samples.map((s) => s.outputTokens)),
          totalTokens: sum(samples.map((s) => s.inputTokens + s.outputTokens)),
        },
      };
    } catch (error: unknown) {
      throw toModelError(error);
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }

  private async sample(request: GenerateRequest, temperature: number, signal: AbortSignal): Promise<Sample> {
    const system = request.messages.filter((m) => m.role === 'system').map((m) => m.content).join('\n\n');
    const messages: Anthropic.MessageParam[] = [];
    for (const message of request.messages) {
      if (message.role === 'user' || message.role === 'assistant') {
        messages.push({ role: message.role, content: message.content });
      }
    }
    if (request.prefix) {
      // Prefill must not end in whitespace
      messages.push({ role: 'assistant', content: request.prefix.trimEnd() });
    }

    const response = await this.messages.create(
      {
        model: this.model,
        system: system || undefined,
        messages,
        temperature,
        max_tokens: request.maxTokens ?? 1024,
      },
      { signal }
    );

    const text = response.content
      .map((block) => (block.type === 'text' ? block.text ?? '' : ''))
      .join('');

    return {
      text,
      finishReason: mapStopReason(response.stop_reason),
      model: response.model,
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
    };
  }
}

/**
 * Give every token of segment i the disagreement entropy of the samples' i-th segments
 */
function scoreBySegments(primary: string, others: string[]): TokenEntropy[] {
  const primarySegments = splitSegments(primary);
  const otherSegments = others.map((text) => splitSegments(text));
  const tokens: TokenEntropy[] = [];

  primarySegments.forEach((segment, index) => {
    const candidates = [segment.text, ...otherSegments.map((segs) => segs[index]?.text ?? '')];
    const entropy = entropyFromSamples(candidates);
    tokens.push(...tokensFromText(segment.raw, entropy, segment.start));
  });

  return tokens;
}

function sum(values: number[]): number {
  return values.reduce((acc, v) => acc + v, 0);
}

function toModelError(error: unknown): ModelError {
  if (error instanceof ModelError) return error;
  if (error instanceof Anthropic.APIUserAbortError) {
    return new ModelError(error.message, 'aborted', { cause: error });
  }
  if (error instanceof Anthropic.APIConnectionTimeoutError) {
    return new ModelError(error.message, 'backend_timeout', { cause: error });
  }
  if (error instanceof Anthropic.APIConnectionError) {
    return new ModelError(error.message, 'backend_unavailable', { cause: error });
  }
  if (error instanceof Anthropic.RateLimitError) {
    return new ModelError(error.message, 'rate_limited', { statusCode: 429, cause: error });
  }
  return ModelError.fromError(error);
}
