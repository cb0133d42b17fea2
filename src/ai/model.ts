import { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { BaseCallbackHandler } from "@langchain/core/callbacks/base";
import { LangChainTracer } from "@langchain/core/tracers/tracer_langchain";
import { ChatAnthropic } from "@langchain/anthropic";
import { ChatOpenAI } from "@langchain/openai";
import { ProviderEndpoint } from "./providers/types.js";

export interface ChatModelOptions {
  temperature?: number;
  maxTokens?: number;
}

export type ChatModelFactory = (
  endpoint: ProviderEndpoint,
  modelName: string,
  options: ChatModelOptions
) => BaseChatModel;

// Local OpenAI-compatible servers ignore the key, but the SDK refuses to start without one
const PLACEHOLDER_API_KEY = "not-needed";

/**
 * Build a chat model for an endpoint. Retries are disabled: the router and
 * the repair loop own retry policy.
 */
export const createChatModel: ChatModelFactory = (endpoint, modelName, options) => {
  if (modelName.startsWith("claude-")) {
    return new ChatAnthropic({
      model: modelName,
      apiKey: endpoint.apiKey,
      anthropicApiUrl: endpoint.baseUrl,
      maxTokens: options.maxTokens ?? 4096,
      temperature: options.temperature,
      maxRetries: 0,
    });
  }

  return new ChatOpenAI({
    model: modelName,
    apiKey: endpoint.apiKey || PLACEHOLDER_API_KEY,
    configuration: { baseURL: endpoint.baseUrl },
    maxTokens: options.maxTokens,
    temperature: options.temperature,
    maxRetries: 0,
  });
};

// Cache models by endpoint, name AND maxTokens to avoid re-initialization
const modelCache = new Map<string, BaseChatModel>();

export const getModel = (
  endpoint: ProviderEndpoint,
  modelName: string,
  options: ChatModelOptions = {}
): BaseChatModel => {
  const cacheKey = [endpoint.name, endpoint.baseUrl, modelName, options.maxTokens ?? "", options.temperature ?? ""].join("|");

  const cached = modelCache.get(cacheKey);
  if (cached) {
    return cached;
  }

  console.debug(
    `[getModel] Initializing new model: ${modelName} on ${endpoint.name}${options.maxTokens ? ` with maxTokens: ${options.maxTokens}` : ""}`
  );
  const model = createChatModel(endpoint, modelName, options);
  modelCache.set(cacheKey, model);
  return model;
};

/**
 * Create callbacks array with tracer project name if provided
 * @param tracerProjectName Optional tracer project name for tracing
 */
export const createTracerCallbacks = (tracerProjectName?: string): BaseCallbackHandler[] => {
  if (!tracerProjectName) {
    return [];
  }

  const tracer = new LangChainTracer({
    projectName: tracerProjectName,
  });

  console.debug(`[createTracerCallbacks] Created tracer for project: ${tracerProjectName}`);
  return [tracer];
};
