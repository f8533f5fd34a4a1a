export { IntentClassifier, classificationSchema, type ClassifyOptions } from './intent-classifier.js';
export { ProposerAgent, stitchEvidenceNarrative, type DraftInput, type RebuttalInput } from './proposer-agent.js';
export { CriticAgent, verdictSchema, type CriticReview, type ReviewInput } from './critic-agent.js';
