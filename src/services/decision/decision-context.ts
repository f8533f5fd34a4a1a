/**
 * DecisionContext assembly.
 *
 * Phases hand their results back to the orchestrator as return values; the
 * context is assembled once from those values and frozen before the final
 * event is published.
 */

import type { DecisionContext } from '../../types/decision.js';

function freezeArray<T>(items: readonly T[]): readonly T[] {
  return Object.freeze(items.map((item) => (typeof item === 'object' && item !== null ? Object.freeze({ ...item }) : item)));
}

export function createDecisionContext(fields: DecisionContext): DecisionContext {
  return Object.freeze({
    ...fields,
    specialistResults: freezeArray(fields.specialistResults),
    segments: freezeArray(fields.segments),
    debate: freezeArray(fields.debate),
    degradations: Object.freeze([...new Set(fields.degradations)]),
    reservations: Object.freeze([...fields.reservations]),
    confidence: Object.freeze({ ...fields.confidence }),
  });
}
