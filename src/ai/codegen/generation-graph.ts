/**
 * Generation Graph
 *
 * Drives one session through generate -> validate -> repair until the
 * artifact passes or the retry budget is spent:
 * - start_session: first attempt uses the rules prompt as is
 * - generate: ask the router for a program and extract its source
 * - validate: static parse and sandbox smoke run
 * - repair: build the next prompt from the last failure
 *
 * Flow:
 * - START -> start_session -> generate
 * - generate -> validate (text received) | repair (all providers failed) | END (budget spent)
 * - validate -> repair (failed, budget left) | END (success or budget spent)
 * - repair -> generate
 *
 * The graph holds no per-session state, so one compiled graph serves
 * concurrent sessions.
 */

import { END, START, StateGraph } from "@langchain/langgraph";
import { RunnableConfig } from "@langchain/core/runnables";
import { ProviderRole, ProviderSlot, RoutedCompletion } from "../providers/types.js";
import { extractArtifactSource } from "./artifact.js";
import { buildRepairPrompt } from "./prompts.js";
import { transition } from "./session-machine.js";
import {
  GenerationSessionState,
  GenerationSessionStateType,
  GenerationSessionUpdate,
} from "./session-state.js";
import {
  FailedOutcome,
  GenerationAbortedError,
  GenerationAttempt,
  ValidationOutcome,
  describeOutcome,
  isFailedOutcome,
} from "./types.js";

export interface CompletionRouter {
  generate(prompt: string, role: ProviderRole, signal?: AbortSignal): Promise<RoutedCompletion>;
}

export interface ArtifactValidator {
  validate(source: string, signal?: AbortSignal): Promise<ValidationOutcome>;
}

export interface GenerationGraphDeps {
  router: CompletionRouter;
  validator: ArtifactValidator;
  debugMode?: boolean;
}

/**
 * Steps one attempt takes at most, used to derive the recursion limit
 */
export const STEPS_PER_ATTEMPT = 3;

function contextOf(state: GenerationSessionStateType) {
  return { attemptNumber: state.attemptNumber, retryBudget: state.retryBudget };
}

/**
 * The caller's signal travels in `configurable` as well as `signal`, since
 * not every runtime forwards the latter to nodes.
 */
export function signalOf(config: RunnableConfig | undefined): AbortSignal | undefined {
  const fromConfigurable: unknown = config?.configurable?.abortSignal;
  if (fromConfigurable instanceof AbortSignal) {
    return fromConfigurable;
  }
  return config?.signal;
}

function throwIfAborted(state: GenerationSessionStateType, signal: AbortSignal | undefined, cause?: unknown): void {
  if (signal?.aborted) {
    throw new GenerationAbortedError(state.sessionId, { cause: cause ?? signal.reason });
  }
}

function recordAttempt(
  state: GenerationSessionStateType,
  providerUsed: ProviderSlot,
  sourceText: string
): GenerationAttempt {
  const attempt: GenerationAttempt = {
    attemptNumber: state.attemptNumber,
    providerUsed,
    sourceText,
    prompt: state.currentPrompt,
    timestamp: new Date().toISOString(),
  };
  return Object.freeze(attempt);
}

function startSession() {
  return async (state: GenerationSessionStateType): Promise<GenerationSessionUpdate> => {
    console.log(`[GenerationGraph] Session ${state.sessionId} started, budget ${state.retryBudget}`);
    return {
      phase: transition(state.phase, { type: "start" }, contextOf(state)),
      attemptNumber: 1,
      currentPrompt: state.rulesPrompt,
    };
  };
}

function generate(router: CompletionRouter, debugMode: boolean) {
  return async (state: GenerationSessionStateType, config?: RunnableConfig): Promise<GenerationSessionUpdate> => {
    const signal = signalOf(config);
    const label = `Attempt ${state.attemptNumber}/${state.retryBudget}`;

    const generationFailed = (attempt: GenerationAttempt, outcome: FailedOutcome): GenerationSessionUpdate => {
      const phase = transition(state.phase, { type: "generation_failed" }, contextOf(state));
      console.warn(`[GenerationGraph] ${label} produced no program: ${outcome.message}`);
      return {
        phase,
        attempts: [attempt],
        outcomes: [outcome],
        pendingArtifact: "",
        finalOutcome: phase === "EXHAUSTED" ? { status: "failure", outcome } : undefined,
      };
    };

    let completion: RoutedCompletion;
    try {
      completion = await router.generate(state.currentPrompt, state.role, signal);
    } catch (error) {
      throwIfAborted(state, signal, error);
      const message = error instanceof Error ? error.message : String(error);
      // Every provider was tried; the fallback was the last
      const attempt = recordAttempt(state, "FALLBACK", "");
      return generationFailed(attempt, { kind: "provider_error", message });
    }

    const source = extractArtifactSource(completion.text);
    const attempt = recordAttempt(state, completion.providerUsed, source);

    if (source === "") {
      return generationFailed(attempt, {
        kind: "provider_error",
        message: `${completion.providerUsed} provider returned no program text`,
      });
    }

    if (debugMode) {
      console.debug(`[GenerationGraph] ${label} received ${source.length} chars from ${completion.providerUsed}`);
    }

    return {
      phase: transition(state.phase, { type: "generated" }, contextOf(state)),
      attempts: [attempt],
      pendingArtifact: source,
    };
  };
}

function validate(validator: ArtifactValidator) {
  return async (state: GenerationSessionStateType, config?: RunnableConfig): Promise<GenerationSessionUpdate> => {
    const signal = signalOf(config);
    const outcome = await validator.validate(state.pendingArtifact, signal);
    throwIfAborted(state, signal);

    const phase = transition(state.phase, { type: "validated", outcome }, contextOf(state));
    console.log(
      `[GenerationGraph] Attempt ${state.attemptNumber}/${state.retryBudget}: ${describeOutcome(outcome)}`
    );

    const update: GenerationSessionUpdate = { phase, outcomes: [outcome] };
    if (phase === "SUCCESS") {
      const attempt = state.attempts.at(-1);
      if (attempt === undefined) {
        throw new Error("Validated an artifact without a recorded attempt");
      }
      update.finalOutcome = { status: "success", artifact: state.pendingArtifact, attempt };
    } else if (phase === "EXHAUSTED" && isFailedOutcome(outcome)) {
      update.finalOutcome = { status: "failure", outcome };
    }
    return update;
  };
}

function repair() {
  return async (state: GenerationSessionStateType): Promise<GenerationSessionUpdate> => {
    const lastOutcome = state.outcomes.at(-1);
    if (lastOutcome === undefined || !isFailedOutcome(lastOutcome)) {
      throw new Error("Repair requested without a failed outcome");
    }

    const phase = transition(state.phase, { type: "retry" }, contextOf(state));
    console.log(
      `[GenerationGraph] Repairing after attempt ${state.attemptNumber}/${state.retryBudget} (${lastOutcome.kind})`
    );
    return {
      phase,
      attemptNumber: state.attemptNumber + 1,
      currentPrompt: await buildRepairPrompt(state.rulesPrompt, lastOutcome),
      pendingArtifact: "",
    };
  };
}

function routeAfterGenerate(state: GenerationSessionStateType): "validate" | "repair" | typeof END {
  switch (state.phase) {
    case "VALIDATING":
      return "validate";
    case "REPAIRING":
      return "repair";
    default:
      return END;
  }
}

function routeAfterValidate(state: GenerationSessionStateType): "repair" | typeof END {
  return state.phase === "REPAIRING" ? "repair" : END;
}

/**
 * Creates and compiles the generation graph.
 */
export function createGenerationGraph({ router, validator, debugMode = false }: GenerationGraphDeps) {
  const workflow = new StateGraph(GenerationSessionState)
    .addNode("start_session", startSession())
    .addNode("generate", generate(router, debugMode))
    .addNode("validate", validate(validator))
    .addNode("repair", repair())
    .addEdge(START, "start_session")
    .addEdge("start_session", "generate")
    .addConditionalEdges("generate", routeAfterGenerate, ["validate", "repair", END])
    .addConditionalEdges("validate", routeAfterValidate, ["repair", END])
    .addEdge("repair", "generate");

  return workflow.compile();
}

export type GenerationGraph = ReturnType<typeof createGenerationGraph>;
