/**
 * Proposer Prompt Templates
 *
 * The proposer drafts the advisory thesis from specialist evidence and
 * answers critic refutations with a revised thesis.
 */

import type { SpecialistResult } from '../../../types/specialist.js';

export const PROPOSER_SYSTEM_PROMPT = `You are the lead financial advisor. Write a concise advisory thesis in plain prose.

RULES:
1. Ground every claim in the specialist evidence provided; cite which specialist it comes from.
2. Say plainly when evidence is missing or conflicting.
3. State a clear recommendation and the main risk to it.
4. Write complete sentences, four to eight of them. No headings, no lists, no JSON.`;

export const REBUTTAL_INSTRUCTIONS = `A risk reviewer refuted your previous thesis. Write a revised thesis that answers the objection directly.
Concede what the objection gets right, correct the recommendation if needed, and keep every claim grounded in the evidence.`;

export function formatEvidence(results: readonly SpecialistResult[]): string {
  if (results.length === 0) {
    return 'No specialist evidence was gathered for this question.';
  }
  return results
    .map((r) => {
      if (r.error) return `[${r.tag}] unavailable (${r.error.kind})`;
      const stance = r.stance ? ` (${r.stance})` : '';
      return `[${r.tag}]${stance} ${r.narrative}`;
    })
    .join('\n');
}

export function buildDraftUserPrompt(query: string, evidence: string, priorThesis?: string, challenge?: string): string {
  const parts = [`Question: ${query}`, `Specialist evidence:\n${evidence}`];
  if (priorThesis) parts.push(`Earlier thesis:\n${priorThesis}`);
  if (challenge) parts.push(`The user challenged the earlier thesis:\n${challenge}`);
  return parts.join('\n\n');
}

export function buildRebuttalUserPrompt(query: string, evidence: string, thesis: string, objection: string): string {
  return [
    `Question: ${query}`,
    `Specialist evidence:\n${evidence}`,
    `Your previous thesis:\n${thesis}`,
    `Reviewer objection:\n${objection}`,
    REBUTTAL_INSTRUCTIONS,
  ].join('\n\n');
}
