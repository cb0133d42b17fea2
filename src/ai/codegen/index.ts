export { extractArtifactSource } from "./artifact.js";
export { CodeValidator, buildCodeContext } from "./code-validator.js";
export type { CodeValidatorOptions, SyntaxCheckResult, SyntaxErrorDetails } from "./code-validator.js";
export { createGenerationGraph } from "./generation-graph.js";
export type { ArtifactValidator, CompletionRouter, GenerationGraph } from "./generation-graph.js";
export { GenerationOrchestrator } from "./orchestrator.js";
export type { OrchestratorOptions } from "./orchestrator.js";
export {
  SECTION_DESCRIPTIONS,
  SECTION_TITLES,
  buildCodePrompt,
  buildRepairPrompt,
  buildRulesPrompt,
} from "./prompts.js";
export type { GameMetadata, SectionTitle } from "./prompts.js";
export { generateRules } from "./rules-generator.js";
export type { GeneratedRules } from "./rules-generator.js";
export { ArtifactSandbox } from "./sandbox/sandbox.js";
export type { SandboxOptions, SandboxRunResult } from "./sandbox/sandbox.js";
export { IllegalTransitionError, isTerminal, transition } from "./session-machine.js";
export type { SessionEvent, SessionPhase } from "./session-machine.js";
export { GenerationAbortedError, describeOutcome, isFailedOutcome } from "./types.js";
export type {
  FailedOutcome,
  FinalOutcome,
  GenerationAttempt,
  GenerationResult,
  GenerationRunOptions,
  ValidationOutcome,
} from "./types.js";
export { ProviderRouter } from "../providers/provider-router.js";
export { ChatModelProviderClient } from "../providers/provider-client.js";
export { ProviderError } from "../providers/types.js";
export type { ProviderClient, ProviderEndpoint, ProviderRole, ProviderSlot } from "../providers/types.js";
export { loadConfig, ConfigError } from "../../config.js";
export type { GeneratorConfig } from "../../config.js";
export { createGenerationServices } from "../../services.js";
