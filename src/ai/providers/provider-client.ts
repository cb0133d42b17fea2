/**
 * ChatModelProviderClient talks to one LLM completion endpoint through a
 * LangChain chat model and normalizes every failure into a ProviderError.
 */

import { HumanMessage, MessageContent } from "@langchain/core/messages";
import { BaseCallbackHandler } from "@langchain/core/callbacks/base";
import { ChatModelFactory, getModel } from "../model.js";
import {
  CompletionOptions,
  ProviderClient,
  ProviderEndpoint,
  ProviderError,
} from "./types.js";

export interface ChatModelProviderClientOptions {
  requestTimeoutMs: number;
  temperature?: number;
  maxTokens?: number;
  callbacks?: BaseCallbackHandler[];
  /** Defaults to the shared, cached model factory */
  getChatModel?: ChatModelFactory;
}

/**
 * Flatten chat message content into plain text. Returns null when the
 * content carries no text parts at all.
 */
export function extractMessageText(content: MessageContent): string | null {
  if (typeof content === "string") {
    return content;
  }

  const texts: string[] = [];
  for (const part of content) {
    if (typeof part === "object" && part !== null && "text" in part && typeof part.text === "string") {
      texts.push(part.text);
    }
  }
  return texts.length > 0 ? texts.join("") : null;
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return undefined;
}

// Settle as soon as the signal fires, even if the underlying call ignores it
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new Error("Request aborted"));
    signal.addEventListener("abort", onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

export class ChatModelProviderClient implements ProviderClient {
  private readonly getChatModel: ChatModelFactory;

  constructor(
    readonly endpoint: ProviderEndpoint,
    private readonly options: ChatModelProviderClientOptions
  ) {
    this.getChatModel = options.getChatModel ?? getModel;
  }

  async complete(prompt: string, modelId: string, options: CompletionOptions = {}): Promise<string> {
    const provider = this.endpoint.name;
    const timeoutMs = options.timeoutMs ?? this.options.requestTimeoutMs;

    if (options.signal?.aborted) {
      throw new ProviderError(`${provider} request aborted before it started`, {
        reason: "aborted",
        provider,
      });
    }

    const controller = new AbortController();
    const forwardAbort = () => controller.abort();
    options.signal?.addEventListener("abort", forwardAbort, { once: true });

    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);

    let content: MessageContent;
    try {
      const model = this.getChatModel(this.endpoint, modelId, {
        temperature: this.options.temperature,
        maxTokens: options.maxTokens ?? this.options.maxTokens,
      });
      const response = await untilAborted(
        model.invoke([new HumanMessage(prompt)], {
          signal: controller.signal,
          callbacks: this.options.callbacks,
          metadata: { provider, model: modelId },
        }),
        controller.signal
      );
      content = response.content;
    } catch (error) {
      throw this.toProviderError(error, {
        timedOut,
        aborted: options.signal?.aborted ?? false,
        timeoutMs,
      });
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", forwardAbort);
    }

    const text = extractMessageText(content);
    if (text === null) {
      throw new ProviderError(`${provider} returned a response without text content`, {
        reason: "malformed",
        provider,
      });
    }
    if (text.trim() === "") {
      throw new ProviderError(`${provider} returned an empty completion`, {
        reason: "empty",
        provider,
      });
    }
    return text;
  }

  private toProviderError(
    error: unknown,
    context: { timedOut: boolean; aborted: boolean; timeoutMs: number }
  ): ProviderError {
    const provider = this.endpoint.name;
    const message = error instanceof Error ? error.message : String(error);

    if (context.aborted) {
      return new ProviderError(`${provider} request aborted`, { reason: "aborted", provider, cause: error });
    }
    if (context.timedOut) {
      return new ProviderError(`${provider} request timed out after ${context.timeoutMs}ms`, {
        reason: "timeout",
        provider,
        cause: error,
      });
    }

    const status = statusOf(error);
    if (status === 401 || status === 403 || /api key/i.test(message)) {
      return new ProviderError(`${provider} rejected the credentials: ${message}`, {
        reason: "auth",
        provider,
        status,
        cause: error,
      });
    }

    return new ProviderError(`${provider} request failed: ${message}`, {
      reason: "network",
      provider,
      status,
      cause: error,
    });
  }
}
