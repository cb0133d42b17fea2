/**
 * Phase machine for one generation session.
 *
 * INIT -> GENERATING -> VALIDATING -> SUCCESS | REPAIRING | EXHAUSTED
 * REPAIRING -> GENERATING
 *
 * Every phase change in the generation graph goes through transition(), and
 * the graph's conditional edges route on the phase it returns.
 */

import { ValidationOutcome } from "./types.js";

export type SessionPhase = "INIT" | "GENERATING" | "VALIDATING" | "REPAIRING" | "SUCCESS" | "EXHAUSTED";

export type SessionEvent =
  | { type: "start" }
  | { type: "generated" }
  | { type: "generation_failed" }
  | { type: "validated"; outcome: ValidationOutcome }
  | { type: "retry" };

export interface TransitionContext {
  attemptNumber: number;
  retryBudget: number;
}

export class IllegalTransitionError extends Error {
  constructor(
    readonly phase: SessionPhase,
    readonly event: SessionEvent["type"]
  ) {
    super(`Illegal session transition: ${event} in phase ${phase}`);
    this.name = "IllegalTransitionError";
  }
}

export function isTerminal(phase: SessionPhase): boolean {
  return phase === "SUCCESS" || phase === "EXHAUSTED";
}

function afterFailure({ attemptNumber, retryBudget }: TransitionContext): SessionPhase {
  return attemptNumber < retryBudget ? "REPAIRING" : "EXHAUSTED";
}

export function transition(phase: SessionPhase, event: SessionEvent, context: TransitionContext): SessionPhase {
  switch (phase) {
    case "INIT":
      if (event.type === "start") return "GENERATING";
      break;
    case "GENERATING":
      if (event.type === "generated") return "VALIDATING";
      if (event.type === "generation_failed") return afterFailure(context);
      break;
    case "VALIDATING":
      if (event.type === "validated") {
        return event.outcome.kind === "success" ? "SUCCESS" : afterFailure(context);
      }
      break;
    case "REPAIRING":
      // The budget was checked on the way in; a retry past it is a bug
      if (event.type === "retry" && context.attemptNumber < context.retryBudget) return "GENERATING";
      break;
    case "SUCCESS":
    case "EXHAUSTED":
      break;
  }
  throw new IllegalTransitionError(phase, event.type);
}
