import { GeneratorConfig } from "./config.js";
import { createTracerCallbacks } from "./ai/model.js";
import { ChatModelProviderClient } from "./ai/providers/provider-client.js";
import { ProviderRouter } from "./ai/providers/provider-router.js";
import { ProviderClient } from "./ai/providers/types.js";
import { CodeValidator } from "./ai/codegen/code-validator.js";
import { GenerationOrchestrator } from "./ai/codegen/orchestrator.js";
import { ArtifactSandbox } from "./ai/codegen/sandbox/sandbox.js";

export interface GenerationServices {
  router: ProviderRouter;
  validator: CodeValidator;
  orchestrator: GenerationOrchestrator;
}

export interface ServiceOverrides {
  primary?: ProviderClient;
  fallback?: ProviderClient;
}

/**
 * Wire the router, validator and orchestrator from one configuration.
 * Clients may be swapped out, which is how tests avoid the network.
 */
export function createGenerationServices(
  config: GeneratorConfig,
  overrides: ServiceOverrides = {}
): GenerationServices {
  const callbacks = createTracerCallbacks(config.tracerProject);
  const clientOptions = {
    requestTimeoutMs: config.requestTimeoutMs,
    temperature: config.temperature,
    maxTokens: config.maxTokens,
    callbacks,
  };

  const router = new ProviderRouter({
    primary: overrides.primary ?? new ChatModelProviderClient(config.primary, clientOptions),
    fallback: overrides.fallback ?? new ChatModelProviderClient(config.fallback, clientOptions),
    probeTimeoutMs: config.probeTimeoutMs,
    requestTimeoutMs: config.requestTimeoutMs,
    debugMode: config.debugMode,
  });

  const validator = new CodeValidator({
    sandbox: new ArtifactSandbox({
      timeoutMs: config.sandbox.timeoutMs,
      smokeInput: [...config.sandbox.smokeInput],
      maxHeapMb: config.sandbox.maxHeapMb,
      debugMode: config.debugMode,
    }),
    treatTimeoutAsSuccess: config.sandbox.timeoutIsSuccess,
    debugMode: config.debugMode,
  });

  const orchestrator = new GenerationOrchestrator({
    router,
    validator,
    retryBudget: config.retryBudget,
    debugMode: config.debugMode,
  });

  return { router, validator, orchestrator };
}
