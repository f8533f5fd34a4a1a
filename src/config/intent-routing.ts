/**
 * Default specialist selection per intent.
 * Used when the classifier returns no specialists for an intent that needs
 * them, and for the fallback classification.
 */

import type { Intent, SpecialistTag } from '../types/specialist.js';

export const DEFAULT_INTENT_SPECIALISTS: Readonly<Record<Intent, readonly SpecialistTag[]>> = {
  price_check: ['quant'],
  market_analysis: ['quant', 'sentiment', 'research'],
  portfolio_review: ['quant', 'research', 'forecast'],
  trade_idea: ['quant', 'sentiment', 'forecast', 'whale'],
  goal_planning: ['forecast'],
  educational: [],
};

export const FALLBACK_INTENT: Intent = 'market_analysis';
