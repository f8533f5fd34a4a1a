/**
 * Specialist capability contract
 */

import type { Result } from '../../types/result.js';
import type {
  ContextSnapshot,
  SpecialistError,
  SpecialistOutput,
  SpecialistTag,
} from '../../types/specialist.js';

export interface SpecialistInvokeOptions {
  timeoutMs: number;
  signal: AbortSignal;
}

/**
 * An independently invocable analysis unit. Implementations may return an
 * error result or throw; the burst isolates both.
 */
export interface Specialist {
  readonly tag: SpecialistTag;
  invoke(
    query: string,
    context: ContextSnapshot,
    options: SpecialistInvokeOptions
  ): Promise<Result<SpecialistOutput, SpecialistError>>;
}
