/**
 * Specialist Prompt Templates
 *
 * One focus statement per specialist tag; all share the same output contract.
 */

import type { ContextSnapshot, SpecialistTag } from '../../../types/specialist.js';

const SPECIALIST_FOCUS: Record<SpecialistTag, string> = {
  quant: 'You are a quantitative analyst. Assess price action, valuation multiples, volatility and technical levels.',
  sentiment: 'You are a market sentiment analyst. Assess news flow, social chatter and positioning mood.',
  forecast: 'You are a forecasting analyst. Give a forward-looking view over the next one to three months with explicit uncertainty.',
  research: 'You are a fundamental research analyst. Assess business quality, earnings, filings and analyst coverage.',
  whale: 'You are an institutional flow analyst. Assess large holder activity, fund flows and unusual block trades.',
};

const OUTPUT_CONTRACT = `OUTPUT FORMAT:
Return valid JSON with this exact structure:
{
  "stance": "bullish" | "bearish" | "neutral",
  "summary": "Two or three sentences of evidence-backed analysis",
  "signals": { "name": value }
}
Signals are short named measurements (numbers, strings or booleans). Do not invent data you do not have; say so in the summary instead.`;

export function buildSpecialistSystemPrompt(tag: SpecialistTag): string {
  return `${SPECIALIST_FOCUS[tag]}\n\n${OUTPUT_CONTRACT}`;
}

export function buildSpecialistUserPrompt(query: string, context: ContextSnapshot): string {
  const lines = [`Question: ${query}`, `Intent: ${context.intent}`];
  if (context.ticker) lines.push(`Instrument: ${context.ticker}`);
  if (context.accountScope) lines.push(`Account scope: ${context.accountScope}`);
  if (context.priorThesis) lines.push(`Earlier advisory under review: ${context.priorThesis}`);
  return lines.join('\n');
}
