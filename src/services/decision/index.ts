export { OrchestratorStateMachine, InvalidTransitionError, type StateTransitionEvent } from './state-machine.js';
export {
  estimateConfidence,
  specialistAgreement,
  debateStability,
  routerConfidence,
  labelFor,
  type ConfidenceInputs,
} from './confidence-estimator.js';
export { createDecisionContext } from './decision-context.js';
export {
  ActionGate,
  LoggingActionSink,
  requiresHumanApproval,
  AUTHORIZE_SCOPE,
  type ActionSink,
  type ActionRecord,
  type ActionGateError,
} from './action-gate.js';
export {
  AdvisoryOrchestrator,
  type AdvisoryRequest,
  type OrchestratorDependencies,
  type OrchestrationOutcome,
} from './advisory-orchestrator.js';
