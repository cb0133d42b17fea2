import { ProviderError, ProviderSlot } from "../providers/types.js";
import { CompletionRouter } from "./generation-graph.js";
import { buildRulesPrompt } from "./prompts.js";

export interface GeneratedRules {
  rules: string;
  providerUsed: ProviderSlot;
}

/**
 * Ask the router for the rules of a new game. The text is prose, so it is
 * returned without code validation.
 *
 * @throws ProviderError when every provider fails or the text is blank
 */
export async function generateRules(
  router: CompletionRouter,
  gameName: string,
  options: { signal?: AbortSignal } = {}
): Promise<GeneratedRules> {
  const prompt = await buildRulesPrompt(gameName);
  console.log(`[RulesGenerator] Generating rules for "${gameName}"`);

  const completion = await router.generate(prompt, "rules", options.signal);
  const rules = completion.text.trim();
  if (rules === "") {
    throw new ProviderError(`${completion.providerUsed} provider returned empty rules`, { reason: "empty" });
  }

  console.log(`[RulesGenerator] Received ${rules.length} chars of rules from ${completion.providerUsed}`);
  return { rules, providerUsed: completion.providerUsed };
}
