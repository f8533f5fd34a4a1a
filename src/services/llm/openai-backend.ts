/**
 * OpenAI-compatible backend.
 *
 * Requests top-k logprobs for every generated token and converts them to
 * normalized entropies. Works against OpenAI and any server speaking the same
 * chat completions API (vLLM, llama.cpp server, OpenRouter).
 */

import OpenAI from 'openai';
import { entropyFromLogprobs } from './entropy.js';
import {
  ModelError,
  type BackendCompletion,
  type ChatMessage,
  type FinishReason,
  type GenerateRequest,
  type ModelBackend,
  type TokenEntropy,
} from '../../types/llm.js';

const TOP_LOGPROBS = 5;
const CONTINUE_INSTRUCTION = 'Continue your previous message from exactly where it stops. Do not repeat any of it.';

export interface OpenAIBackendOptions {
  apiKey: string;
  baseURL?: string;
  model: string;
  /** Set false for servers that reject the logprobs parameters */
  logprobs?: boolean;
}

function toOpenAIMessage(message: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

function mapFinishReason(reason: string | null): FinishReason {
  switch (reason) {
    case 'stop':
      return 'stop';
    case 'length':
      return 'length';
    case 'content_filter':
      return 'content_filter';
    default:
      return 'other';
  }
}

export class OpenAIBackend implements ModelBackend {
  readonly provider = 'openai' as const;
  readonly model: string;
  private readonly client: OpenAI;
  private readonly logprobs: boolean;

  constructor(options: OpenAIBackendOptions) {
    this.model = options.model;
    this.logprobs = options.logprobs ?? true;
    this.client = new OpenAI({
      apiKey: options.apiKey || 'not-required',
      baseURL: options.baseURL,
      maxRetries: 0,
    });
  }

  async complete(request: GenerateRequest, signal: AbortSignal): Promise<BackendCompletion> {
    const messages = request.messages.map(toOpenAIMessage);
    if (request.prefix) {
      messages.push({ role: 'assistant', content: request.prefix });
      messages.push({ role: 'user', content: CONTINUE_INSTRUCTION });
    }

    try {
      const completion = await this.client.chat.completions.create(
        {
          model: this.model,
          messages,
          temperature: request.temperature ?? 0.3,
          max_tokens: request.maxTokens ?? 1024,
          logprobs: this.logprobs,
          top_logprobs: this.logprobs ? TOP_LOGPROBS : undefined,
          stream: false,
        },
        { signal }
      );

      const choice = completion.choices[0];
      if (!choice) {
        throw new ModelError('No completion choices returned', 'backend_unavailable');
      }

      const text = choice.message.content ?? '';
      const tokens: TokenEntropy[] = [];
      let offset = 0;
      for (const item of choice.logprobs?.content ?? []) {
        const alternatives = item.top_logprobs.length > 0
          ? item.top_logprobs.map((alt) => alt.logprob)
          : [item.logprob];
        tokens.push({ text: item.token, offset, entropy: entropyFromLogprobs(alternatives) });
        offset += item.token.length;
      }

      return {
        text,
        tokens,
        finishReason: mapFinishReason(choice.finish_reason),
        model: completion.model,
        entropySource: tokens.length > 0 ? 'logprobs' : 'none',
        usage: {
          promptTokens: completion.usage?.prompt_tokens ?? 0,
          completionTokens: completion.usage?.completion_tokens ?? 0,
          totalTokens: completion.usage?.total_tokens ?? 0,
        },
      };
    } catch (error: unknown) {
      throw toModelError(error);
    }
  }
}

/**
 * Map OpenAI SDK errors onto the gateway's error kinds
 */
function toModelError(error: unknown): ModelError {
  if (error instanceof ModelError) return error;
  if (error instanceof OpenAI.APIUserAbortError) {
    return new ModelError(error.message, 'aborted', { cause: error });
  }
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new ModelError(error.message, 'backend_timeout', { cause: error });
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return new ModelError(error.message, 'backend_unavailable', { cause: error });
  }
  if (error instanceof OpenAI.RateLimitError) {
    return new ModelError(error.message, 'rate_limited', { statusCode: 429, cause: error });
  }
  return ModelError.fromError(error);
}
