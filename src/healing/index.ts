export { BlueprintHealer, type HealerOptions, type HealingPhase, type HealResult } from "./blueprint-healer.js";
export { normaliseBindings, type DefaultPortResolver, type NormalisedBindings } from "./binding-normaliser.js";
export {
  HealingOrchestrator,
  syncWorkingDocument,
  type HealingFailure,
  type HealingOrchestratorDeps,
  type HealingOutcome,
  type HealingSuccess,
  type HealOptions,
} from "./healing-orchestrator.js";
export { TemplatePortInference, type PortInference } from "./port-inference.js";
export { createHealingSession, recordAttempt, type AttemptVerdict, type HealingSession } from "./session.js";
