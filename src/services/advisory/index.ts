export { AdvisoryService, type StartedAdvisory, type StartAdvisoryInput, type ChallengeError } from './advisory-service.js';
export { AdvisoryStore, type AdvisoryRecord, type AdvisoryStatus } from './advisory-store.js';
export { OrchestratorRegistry, type RunningSummary, type StoppableOrchestrator } from './orchestrator-registry.js';
