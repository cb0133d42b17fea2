/**
 * ProviderRouter decides which provider backs each call.
 *
 * The primary is probed before every call (fallback is never sticky). The
 * probe is only a hint: any ProviderError from the primary still falls
 * through to the secondary for that same call.
 */

import {
  ProviderClient,
  ProviderError,
  ProviderRole,
  RoutedCompletion,
  isProviderError,
} from "./types.js";

export interface RouterConfig {
  readonly primary: ProviderClient;
  readonly fallback: ProviderClient;
  readonly probeTimeoutMs: number;
  readonly requestTimeoutMs: number;
  readonly debugMode?: boolean;
}

const PROBE_PROMPT = "Reply with the single word: ok";

function asProviderError(error: unknown, provider: string): ProviderError {
  if (isProviderError(error)) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ProviderError(`${provider} request failed: ${message}`, {
    reason: "network",
    provider,
    cause: error,
  });
}

export class ProviderRouter {
  constructor(private readonly config: RouterConfig) {}

  /**
   * Issue a minimal completion against the primary. Never throws.
   */
  async isPrimaryAvailable(signal?: AbortSignal): Promise<boolean> {
    const { primary, probeTimeoutMs } = this.config;
    try {
      await primary.complete(PROBE_PROMPT, primary.endpoint.models.code, {
        signal,
        timeoutMs: probeTimeoutMs,
        maxTokens: 1,
      });
      return true;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[ProviderRouter] ${primary.endpoint.name} is unavailable: ${message}`);
      return false;
    }
  }

  /**
   * Generate text for a role, preferring the primary provider.
   *
   * @throws ProviderError when every provider fails; the individual
   *   failures are in `causes`
   */
  async generate(prompt: string, role: ProviderRole, signal?: AbortSignal): Promise<RoutedCompletion> {
    const { primary, fallback, requestTimeoutMs } = this.config;
    const failures: ProviderError[] = [];

    if (await this.isPrimaryAvailable(signal)) {
      try {
        const text = await primary.complete(prompt, primary.endpoint.models[role], {
          signal,
          timeoutMs: requestTimeoutMs,
        });
        this.debug(`${role} completion served by ${primary.endpoint.name} (${text.length} chars)`);
        return { text, providerUsed: "PRIMARY" };
      } catch (error) {
        const failure = asProviderError(error, primary.endpoint.name);
        if (failure.reason === "aborted") {
          throw failure;
        }
        console.warn(
          `[ProviderRouter] ${primary.endpoint.name} failed (${failure.reason}), falling back to ${fallback.endpoint.name}`
        );
        failures.push(failure);
      }
    }

    if (signal?.aborted) {
      throw new ProviderError("Generation aborted before fallback", { reason: "aborted" });
    }

    try {
      const text = await fallback.complete(prompt, fallback.endpoint.models[role], {
        signal,
        timeoutMs: requestTimeoutMs,
      });
      this.debug(`${role} completion served by ${fallback.endpoint.name} (${text.length} chars)`);
      return { text, providerUsed: "FALLBACK" };
    } catch (error) {
      const failure = asProviderError(error, fallback.endpoint.name);
      if (failure.reason === "aborted") {
        throw failure;
      }
      failures.push(failure);
      const summary = failures.map((f) => f.message).join("; ");
      throw new ProviderError(`All providers failed: ${summary}`, {
        reason: failure.reason,
        causes: failures,
      });
    }
  }

  private debug(message: string): void {
    if (this.config.debugMode) {
      console.debug(`[ProviderRouter] ${message}`);
    }
  }
}
