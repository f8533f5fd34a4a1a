/**
 * Proposer Agent
 *
 * Drafts the advisory thesis through the R-Stitch router and writes
 * rebuttals when the critic refutes. When drafting fails the thesis can be
 * stitched together from the specialist narratives instead.
 */

import pino from 'pino';
import {
  PROPOSER_SYSTEM_PROMPT,
  buildDraftUserPrompt,
  buildRebuttalUserPrompt,
  formatEvidence,
} from './prompts/index.js';
import type { RStitchRouter, Trajectory } from '../router/rstitch-router.js';
import type { ReasoningSegment } from '../../types/decision.js';
import type { ModelError } from '../../types/llm.js';
import type { Result } from '../../types/result.js';
import type { SpecialistResult } from '../../types/specialist.js';

const logger = pino({
  name: 'proposer-agent',
  level: process.env.LOG_LEVEL || 'info',
});

export interface ProposerInput {
  query: string;
  evidence: readonly SpecialistResult[];
  correlationId: string;
  /** Index for the first segment this call emits */
  startIndex: number;
  signal?: AbortSignal;
  onSegment?: (segment: ReasoningSegment) => void;
}

export interface DraftInput extends ProposerInput {
  priorThesis?: string;
  challenge?: string;
}

export interface RebuttalInput extends ProposerInput {
  thesis: string;
  objection: string;
  draftIndex: number;
}

export class ProposerAgent {
  constructor(private readonly router: RStitchRouter) {}

  async draft(input: DraftInput): Promise<Result<Trajectory, ModelError>> {
    logger.debug({ correlationId: input.correlationId }, 'Drafting thesis');
    return this.router.draft({
      purpose: 'draft',
      correlationId: input.correlationId,
      draftIndex: 0,
      startIndex: input.startIndex,
      signal: input.signal,
      onSegment: input.onSegment,
      messages: [
        { role: 'system', content: PROPOSER_SYSTEM_PROMPT },
        {
          role: 'user',
          content: buildDraftUserPrompt(input.query, formatEvidence(input.evidence), input.priorThesis, input.challenge),
        },
      ],
    });
  }

  async rebut(input: RebuttalInput): Promise<Result<Trajectory, ModelError>> {
    logger.debug({ correlationId: input.correlationId, draftIndex: input.draftIndex }, 'Drafting rebuttal');
    return this.router.draft({
      purpose: 'rebuttal',
      correlationId: input.correlationId,
      draftIndex: input.draftIndex,
      startIndex: input.startIndex,
      signal: input.signal,
      onSegment: input.onSegment,
      messages: [
        { role: 'system', content: PROPOSER_SYSTEM_PROMPT },
        {
          role: 'user',
          content: buildRebuttalUserPrompt(input.query, formatEvidence(input.evidence), input.thesis, input.objection),
        },
      ],
    });
  }
}

/**
 * Stitch successful specialist narratives into a plain evidence summary.
 * Returns undefined when there is no successful evidence to stitch.
 */
export function stitchEvidenceNarrative(results: readonly SpecialistResult[]): string | undefined {
  const lines = results
    .filter((r) => !r.error && r.narrative.trim().length > 0)
    .map((r) => `${capitalize(r.tag)} view${r.stance ? ` (${r.stance})` : ''}: ${r.narrative.trim()}`);
  if (lines.length === 0) return undefined;
  return `${lines.join(' ')} No synthesized recommendation could be drafted; weigh these views directly.`;
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
