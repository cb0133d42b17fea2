/**
 * Provider Types
 *
 * Shared contracts for LLM completion endpoints and the router that
 * chooses between them.
 */

/**
 * Logical role a completion serves. Each provider maps a role to its own
 * model identifier.
 */
export type ProviderRole = "code" | "rules";

/**
 * Which configured provider served a call.
 */
export type ProviderSlot = "PRIMARY" | "FALLBACK";

export type ProviderErrorReason =
  | "network"
  | "auth"
  | "malformed"
  | "empty"
  | "timeout"
  | "aborted";

/**
 * Failure of a single provider call (or of every provider, when raised by
 * the router).
 */
export class ProviderError extends Error {
  readonly reason: ProviderErrorReason;
  readonly provider?: string;
  readonly status?: number;
  readonly causes: ProviderError[];

  constructor(
    message: string,
    options: {
      reason: ProviderErrorReason;
      provider?: string;
      status?: number;
      causes?: ProviderError[];
      cause?: unknown;
    }
  ) {
    super(message, { cause: options.cause });
    this.name = "ProviderError";
    this.reason = options.reason;
    this.provider = options.provider;
    this.status = options.status;
    this.causes = options.causes ?? [];
  }
}

export function isProviderError(error: unknown): error is ProviderError {
  return error instanceof ProviderError;
}

/**
 * Connection details for one provider. Read-only configuration.
 */
export interface ProviderEndpoint {
  readonly name: string;
  readonly baseUrl: string;
  readonly apiKey: string;
  readonly models: Readonly<Record<ProviderRole, string>>;
}

export interface CompletionOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
  maxTokens?: number;
}

/**
 * Uniform interface to a single LLM completion endpoint.
 *
 * Implementations make exactly one outbound call per invocation and never
 * retry; retry policy belongs to the caller.
 */
export interface ProviderClient {
  readonly endpoint: ProviderEndpoint;
  complete(prompt: string, modelId: string, options?: CompletionOptions): Promise<string>;
}

export interface RoutedCompletion {
  text: string;
  providerUsed: ProviderSlot;
}
