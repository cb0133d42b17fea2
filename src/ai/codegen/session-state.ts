import { Annotation } from "@langchain/langgraph";
import { ProviderRole } from "../providers/types.js";
import { SessionPhase } from "./session-machine.js";
import { FinalOutcome, GenerationAttempt, ValidationOutcome } from "./types.js";

export type GenerationSessionStateType = typeof GenerationSessionState.State;
export type GenerationSessionUpdate = typeof GenerationSessionState.Update;

export const GenerationSessionState = Annotation.Root({
  // Inputs
  sessionId: Annotation<string>({
    reducer: (_, y) => y,
    default: () => "",
  }),
  rulesPrompt: Annotation<string>({
    reducer: (_, y) => y,
    default: () => "",
  }),
  role: Annotation<ProviderRole>({
    reducer: (_, y) => y,
    default: () => "code",
  }),
  retryBudget: Annotation<number>({
    reducer: (_, y) => y,
    default: () => 1,
  }),

  // Loop state
  phase: Annotation<SessionPhase>({
    reducer: (_, y) => y,
    default: () => "INIT",
  }),
  attemptNumber: Annotation<number>({
    reducer: (_, y) => y,
    default: () => 0,
  }),
  currentPrompt: Annotation<string>({
    reducer: (_, y) => y,
    default: () => "",
  }),
  /** Extracted source of the attempt awaiting validation */
  pendingArtifact: Annotation<string>({
    reducer: (_, y) => y,
    default: () => "",
  }),

  // History, append only
  attempts: Annotation<GenerationAttempt[]>({
    reducer: (x, y) => [...x, ...y],
    default: () => [],
  }),
  outcomes: Annotation<ValidationOutcome[]>({
    reducer: (x, y) => [...x, ...y],
    default: () => [],
  }),

  finalOutcome: Annotation<FinalOutcome | undefined>({
    reducer: (x, y) => {
      if (x !== undefined && y !== undefined) {
        throw new Error("finalOutcome is already set for this session");
      }
      return x ?? y;
    },
    default: () => undefined,
  }),
});
