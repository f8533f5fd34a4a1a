/**
 * R-Stitch Router
 *
 * Drafts a reasoning trajectory with the small model and escalates uncertain
 * segments to the large model:
 *
 *   1. The small model drafts a chunk continuing the committed prefix.
 *   2. Each complete segment of the chunk is scored by its mean token entropy.
 *   3. Segments at or below τ are committed as-is.
 *   4. The first segment above τ is re-issued to the large model with the same
 *      prefix; the large model's first segment replaces it and the rest of the
 *      small chunk is discarded. Drafting resumes from the new prefix.
 *
 * Model calls are strictly sequential. Given deterministic model outputs and a
 * fixed τ the routing decisions are reproducible.
 */

import { ensureClosed, joinContinuation, splitSegments, type TextSegment } from './segmenter.js';
import { summarizeSpan, type EntropySummary } from '../llm/entropy.js';
import { createLogger, loggers } from '../logging/index.js';
import { DEFAULT_ROUTER_CONFIG, type RouterConfig } from '../../config/advisory.js';
import { err, ok, type Result } from '../../types/result.js';
import { combineUsage, usageOf } from '../llm/usage.js';
import type { ModelGateway } from '../llm/gateway.js';
import { ModelError, type ChatMessage, type GenerateResult, type ModelUsage } from '../../types/llm.js';
import type { ReasoningSegment } from '../../types/decision.js';

const logger = createLogger({ module: 'rstitch-router' });

export interface DraftRequest {
  messages: ChatMessage[];
  purpose: string;
  correlationId?: string;
  draftIndex?: number;
  /** Index given to the first emitted segment */
  startIndex?: number;
  signal?: AbortSignal;
  /** Called for each committed segment, in order */
  onSegment?: (segment: ReasoningSegment) => void;
}

export interface Trajectory {
  text: string;
  segments: ReasoningSegment[];
  smallSegments: number;
  largeSegments: number;
  lowConfidenceSegments: number;
  /** Mean of the segment mean entropies */
  meanEntropy: number;
  /** Spend over every small and large call of the draft */
  usage?: ModelUsage;
}

interface Candidate {
  segment: TextSegment;
  entropy: EntropySummary;
}

export class RStitchRouter {
  private readonly config: RouterConfig;

  constructor(private readonly gateway: ModelGateway, config: Partial<RouterConfig> = {}) {
    this.config = { ...DEFAULT_ROUTER_CONFIG, ...config };
  }

  async draft(request: DraftRequest): Promise<Result<Trajectory, ModelError>> {
    const { entropyThreshold, maxSegments } = this.config;
    const segments: ReasoningSegment[] = [];
    let prefix = '';
    let finished = false;
    let rounds = 0;
    const spend: ModelUsage[] = [];

    const commit = (text: string, source: GenerateResult, entropy: EntropySummary, lowConfidence: boolean): boolean => {
      if (text.length === 0) return false;
      const segment: ReasoningSegment = {
        index: (request.startIndex ?? 0) + segments.length,
        draftIndex: request.draftIndex ?? 0,
        text,
        sourceModel: source.tier,
        model: source.model,
        entropy,
        lowConfidence,
      };
      segments.push(segment);
      prefix = joinContinuation(prefix, `${text} `);
      request.onSegment?.(segment);
      return true;
    };

    while (!finished && segments.length < maxSegments && rounds++ < maxSegments * 2) {
      const small = await this.gateway.generate(
        {
          tier: 'small',
          purpose: request.purpose,
          correlationId: request.correlationId,
          messages: request.messages,
          prefix: prefix || undefined,
          maxTokens: this.config.chunkMaxTokens,
        },
        request.signal
      );

      if (!small.ok) {
        if (segments.length === 0 || small.error.kind === 'aborted') {
          return err(small.error);
        }
        logger.warn({ correlationId: request.correlationId, error: small.error.message }, 'Small model failed mid-draft, keeping committed segments');
        break;
      }
      spend.push(usageOf(small.value));

      const candidates = this.candidates(small.value);
      if (candidates.length === 0) {
        break;
      }

      let escalated = false;
      // A fragment that closes to nothing would be requested again unchanged
      let stalled = false;
      for (const candidate of candidates) {
        if (segments.length >= maxSegments) break;

        const index = (request.startIndex ?? 0) + segments.length;
        if (candidate.entropy.mean <= entropyThreshold) {
          loggers.routing({
            correlationId: request.correlationId,
            segmentIndex: index,
            entropy: candidate.entropy.mean,
            threshold: entropyThreshold,
            routedTo: 'small',
          });
          if (!commit(this.closeIfNeeded(candidate.segment), small.value, candidate.entropy, false)) {
            stalled = true;
            break;
          }
          continue;
        }

        loggers.routing({
          correlationId: request.correlationId,
          segmentIndex: index,
          entropy: candidate.entropy.mean,
          threshold: entropyThreshold,
          routedTo: 'large',
        });

        const escalation = await this.escalate(request, prefix);
        if (!escalation.ok && escalation.error.kind === 'aborted') {
          return err(escalation.error);
        }
        let committed: boolean;
        if (escalation.ok && escalation.value) {
          const { segment, entropy, result } = escalation.value;
          spend.push(usageOf(result));
          committed = commit(this.closeIfNeeded(segment), result, entropy, entropy.mean > this.config.lowConfidenceThreshold);
        } else {
          // Large tier could not help: keep the small segment, flagged
          committed = commit(this.closeIfNeeded(candidate.segment), small.value, candidate.entropy, true);
        }
        stalled = !committed;
        escalated = true;
        break;
      }

      if (stalled || (!escalated && small.value.finishReason !== 'length')) {
        finished = true;
      }
    }

    const text = segments.map((s) => s.text).join(' ');
    const trajectory: Trajectory = {
      text,
      segments,
      smallSegments: segments.filter((s) => s.sourceModel === 'small').length,
      largeSegments: segments.filter((s) => s.sourceModel === 'large').length,
      lowConfidenceSegments: segments.filter((s) => s.lowConfidence).length,
      meanEntropy: segments.length > 0
        ? Math.round((segments.reduce((acc, s) => acc + s.entropy.mean, 0) / segments.length) * 10000) / 10000
        : 0,
      usage: combineUsage(spend),
    };

    logger.info({
      correlationId: request.correlationId,
      purpose: request.purpose,
      segments: segments.length,
      small: trajectory.smallSegments,
      large: trajectory.largeSegments,
      lowConfidence: trajectory.lowConfidenceSegments,
    }, 'Trajectory drafted');

    if (segments.length === 0) {
      return err(new ModelError('Model produced no usable segments', 'schema_violation'));
    }
    return ok(trajectory);
  }

  /**
   * Complete segments of a small-model chunk. A trailing fragment is kept only
   * when the model stopped on its own, or when nothing else was produced.
   */
  private candidates(result: GenerateResult): Candidate[] {
    const pieces = splitSegments(result.text);
    const last = pieces[pieces.length - 1];
    if (last && !last.complete && result.finishReason === 'length' && pieces.length > 1) {
      pieces.pop();
    }
    return pieces.map((segment) => ({
      segment,
      entropy: summarizeSpan(result.tokens, segment.start, segment.end),
    }));
  }

  private async escalate(
    request: DraftRequest,
    prefix: string
  ): Promise<Result<{ segment: TextSegment; entropy: EntropySummary; result: GenerateResult } | undefined, ModelError>> {
    const large = await this.gateway.generate(
      {
        tier: 'large',
        purpose: request.purpose,
        correlationId: request.correlationId,
        messages: request.messages,
        prefix: prefix || undefined,
        maxTokens: this.config.segmentMaxTokens,
      },
      request.signal
    );
    if (!large.ok) {
      logger.warn({ correlationId: request.correlationId, error: large.error.message }, 'Large model re-issue failed');
      return large;
    }

    const first = splitSegments(large.value.text)[0];
    if (!first) {
      return ok(undefined);
    }
    return ok({
      segment: first,
      entropy: summarizeSpan(large.value.tokens, first.start, first.end),
      result: large.value,
    });
  }

  private closeIfNeeded(segment: TextSegment): string {
    return segment.complete ? segment.text : ensureClosed(segment.text);
  }
}
