/**
 * Generation session data model
 */

import { ProviderRole, ProviderSlot } from "../providers/types.js";

/**
 * Classification of one generation attempt.
 */
export type ValidationOutcome =
  | { kind: "success" }
  | { kind: "syntax_error"; message: string; line?: number; column?: number; snippet?: string }
  | { kind: "runtime_error"; message: string; trace?: string; output?: string }
  | { kind: "provider_error"; message: string };

export type FailedOutcome = Exclude<ValidationOutcome, { kind: "success" }>;

/**
 * One loop iteration. Frozen once created.
 */
export interface GenerationAttempt {
  readonly attemptNumber: number;
  readonly providerUsed: ProviderSlot;
  readonly sourceText: string;
  readonly prompt: string;
  readonly timestamp: string;
}

export type FinalOutcome =
  | { status: "success"; artifact: string; attempt: GenerationAttempt }
  | { status: "failure"; outcome: FailedOutcome };

export interface GenerationSuccess {
  status: "success";
  sessionId: string;
  artifact: string;
  providerUsed: ProviderSlot;
  attemptNumber: number;
  attempts: GenerationAttempt[];
  outcomes: ValidationOutcome[];
}

export interface GenerationExhausted {
  status: "exhausted";
  sessionId: string;
  lastOutcome: FailedOutcome;
  attempts: GenerationAttempt[];
  outcomes: ValidationOutcome[];
}

export type GenerationResult = GenerationSuccess | GenerationExhausted;

export interface GenerationRunOptions {
  role?: ProviderRole;
  signal?: AbortSignal;
}

/**
 * The caller's signal aborted a session. Nothing else escapes a run.
 */
export class GenerationAbortedError extends Error {
  constructor(
    readonly sessionId: string,
    options?: { cause?: unknown }
  ) {
    super(`Generation session ${sessionId} was aborted`, options);
    this.name = "GenerationAbortedError";
  }
}

export function isFailedOutcome(outcome: ValidationOutcome): outcome is FailedOutcome {
  return outcome.kind !== "success";
}

/**
 * One-line human readable summary of an outcome.
 */
export function describeOutcome(outcome: ValidationOutcome): string {
  switch (outcome.kind) {
    case "success":
      return "Success";
    case "syntax_error": {
      const location =
        outcome.line !== undefined
          ? ` at line ${outcome.line}${outcome.column !== undefined ? `, column ${outcome.column}` : ""}`
          : "";
      return `SyntaxError${location}: ${outcome.message}`;
    }
    case "runtime_error":
      return `RuntimeError: ${outcome.message}`;
    case "provider_error":
      return `ProviderError: ${outcome.message}`;
  }
}
