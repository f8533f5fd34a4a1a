export { INTENT_SYSTEM_PROMPT, buildIntentUserPrompt } from './intent-prompts.js';
export { buildSpecialistSystemPrompt, buildSpecialistUserPrompt } from './specialist-prompts.js';
export {
  PROPOSER_SYSTEM_PROMPT,
  REBUTTAL_INSTRUCTIONS,
  formatEvidence,
  buildDraftUserPrompt,
  buildRebuttalUserPrompt,
} from './proposer-prompts.js';
export { CRITIC_SYSTEM_PROMPT, buildCriticUserPrompt } from './critic-prompts.js';
