/**
 * GenerationOrchestrator turns a rules prompt into a validated artifact by
 * running the generation graph with a fixed retry budget.
 */

import { v4 as uuidv4 } from "uuid";
import {
  ArtifactValidator,
  CompletionRouter,
  GenerationGraph,
  STEPS_PER_ATTEMPT,
  createGenerationGraph,
} from "./generation-graph.js";
import { GenerationSessionStateType } from "./session-state.js";
import { GenerationAbortedError, GenerationResult, GenerationRunOptions } from "./types.js";

export interface OrchestratorOptions {
  router: CompletionRouter;
  validator: ArtifactValidator;
  retryBudget: number;
  debugMode?: boolean;
}

export class GenerationOrchestrator {
  private readonly graph: GenerationGraph;
  private readonly retryBudget: number;

  constructor(options: OrchestratorOptions) {
    if (!Number.isInteger(options.retryBudget) || options.retryBudget < 1) {
      throw new RangeError(`retryBudget must be a positive integer, got ${options.retryBudget}`);
    }
    this.retryBudget = options.retryBudget;
    this.graph = createGenerationGraph({
      router: options.router,
      validator: options.validator,
      debugMode: options.debugMode,
    });
  }

  /**
   * Run one generation session to success or exhaustion.
   *
   * @throws GenerationAbortedError when the caller's signal aborts
   */
  async run(rulesPrompt: string, options: GenerationRunOptions = {}): Promise<GenerationResult> {
    const sessionId = uuidv4();
    const { signal, role = "code" } = options;

    if (signal?.aborted) {
      throw new GenerationAbortedError(sessionId, { cause: signal.reason });
    }

    let finalState: GenerationSessionStateType;
    try {
      finalState = await this.graph.invoke(
        {
          sessionId,
          rulesPrompt,
          role,
          retryBudget: this.retryBudget,
        },
        {
          signal,
          configurable: { abortSignal: signal },
          recursionLimit: this.retryBudget * STEPS_PER_ATTEMPT + 5,
        }
      );
    } catch (error) {
      if (error instanceof GenerationAbortedError) {
        throw error;
      }
      if (signal?.aborted) {
        throw new GenerationAbortedError(sessionId, { cause: error });
      }
      throw error;
    }

    return this.toResult(finalState);
  }

  private toResult(state: GenerationSessionStateType): GenerationResult {
    const { finalOutcome, sessionId, attempts, outcomes } = state;
    if (finalOutcome === undefined) {
      throw new Error(`Session ${sessionId} ended in phase ${state.phase} without a final outcome`);
    }

    if (finalOutcome.status === "success") {
      console.log(
        `[GenerationOrchestrator] Session ${sessionId} succeeded on attempt ${finalOutcome.attempt.attemptNumber} ` +
          `(${finalOutcome.attempt.providerUsed}, ${finalOutcome.artifact.length} chars)`
      );
      return {
        status: "success",
        sessionId,
        artifact: finalOutcome.artifact,
        providerUsed: finalOutcome.attempt.providerUsed,
        attemptNumber: finalOutcome.attempt.attemptNumber,
        attempts,
        outcomes,
      };
    }

    console.warn(
      `[GenerationOrchestrator] Session ${sessionId} exhausted after ${attempts.length} attempts (${finalOutcome.outcome.kind})`
    );
    return {
      status: "exhausted",
      sessionId,
      lastOutcome: finalOutcome.outcome,
      attempts,
      outcomes,
    };
  }
}
