export { SpecialistRegistry } from './registry.js';
export { runSpecialistBurst, type BurstOptions, type BurstOutcome } from './burst.js';
export { ModelSpecialist, createDefaultRegistry, specialistResponseSchema } from './model-specialist.js';
export type { Specialist, SpecialistInvokeOptions } from './types.js';
