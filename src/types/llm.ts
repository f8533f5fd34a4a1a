/**
 * Model gateway types
 *
 * Two model tiers sit behind the gateway: a small/fast model that drafts and a
 * large/capable model that takes over uncertain segments.
 */

export type ModelTier = 'small' | 'large';

export type ModelProviderName = 'openai' | 'anthropic' | 'scripted';

export type MessageRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: MessageRole;
  content: string;
}

/**
 * Generation request accepted by the gateway
 */
export interface GenerateRequest {
  tier: ModelTier;
  messages: ChatMessage[];
  /** Logical caller, e.g. 'intent', 'specialist:quant', 'draft', 'critic' */
  purpose?: string;
  /** Text the model must continue from (assistant prefill) */
  prefix?: string;
  maxTokens?: number;
  temperature?: number;
  correlationId?: string;
}

/**
 * One generated token with its normalized entropy in [0,1]
 */
export interface TokenEntropy {
  text: string;
  /** Character offset of the token in the completion text */
  offset: number;
  entropy: number;
}

export type FinishReason = 'stop' | 'length' | 'content_filter' | 'other';

/**
 * How the per-token entropy was obtained
 * - logprobs: from the backend's top-k token log probabilities
 * - self_consistency: from agreement between several samples
 * - none: backend gave no signal; tokens carry no entropy
 */
export type EntropySource = 'logprobs' | 'self_consistency' | 'none';

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/**
 * Model and token spend attributed to one agent hop
 */
export interface ModelUsage {
  model: string;
  tokens: number;
}

/**
 * Completion returned by a backend
 */
export interface BackendCompletion {
  text: string;
  tokens: TokenEntropy[];
  finishReason: FinishReason;
  model: string;
  entropySource: EntropySource;
  usage?: TokenUsage;
}

/**
 * Completion returned by the gateway
 */
export interface GenerateResult extends BackendCompletion {
  tier: ModelTier;
  latencyMs: number;
  attempts: number;
  /** Set when the requested tier was unavailable and the other tier answered */
  fallbackFrom?: ModelTier;
}

/**
 * A text-generation backend. Implementations must honor the abort signal.
 */
export interface ModelBackend {
  readonly provider: ModelProviderName;
  readonly model: string;
  /** Upstream requests issued per completion; defaults to 1 */
  readonly callsPerCompletion?: number;
  complete(request: GenerateRequest, signal: AbortSignal): Promise<BackendCompletion>;
}

/**
 * Error kinds shared by the gateway's retry policy table
 */
export type ErrorKind =
  | 'backend_unavailable'
  | 'backend_timeout'
  | 'rate_limited'
  | 'schema_violation'
  | 'aborted';

function readStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

/**
 * Error raised by model backends and returned by the gateway
 */
export class ModelError extends Error {
  public readonly kind: ErrorKind;
  public readonly statusCode?: number;
  public readonly details?: string[];

  constructor(message: string, kind: ErrorKind, options: { statusCode?: number; cause?: unknown; details?: string[] } = {}) {
    super(message, { cause: options.cause });
    this.name = 'ModelError';
    this.kind = kind;
    this.statusCode = options.statusCode;
    this.details = options.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ModelError);
    }
  }

  /**
   * Classify an unknown error thrown by a backend
   */
  static fromError(error: unknown): ModelError {
    if (error instanceof ModelError) {
      return error;
    }

    const status = readStatus(error);

    if (error instanceof Error) {
      const message = error.message.toLowerCase();

      if (error.name === 'AbortError' || message.includes('aborted')) {
        return new ModelError(error.message, 'aborted', { cause: error });
      }

      if (status === 429 || message.includes('rate limit')) {
        return new ModelError(error.message, 'rate_limited', { statusCode: 429, cause: error });
      }

      if (status === 408 || message.includes('timeout') || message.includes('timed out')) {
        return new ModelError(error.message, 'backend_timeout', { statusCode: status, cause: error });
      }

      return new ModelError(error.message, 'backend_unavailable', { statusCode: status, cause: error });
    }

    return new ModelError(String(error), 'backend_unavailable', { statusCode: status });
  }
}
