/**
 * Utility functions for safe logging that prevents accidental exposure of secrets
 *
 * SECURITY PRINCIPLE: Never log user input, prompts, generated code or API keys.
 * Only log explicitly whitelisted, known-safe values.
 */

import { GeneratorConfig } from '../config.js';

/**
 * Log the non-secret parts of the configuration
 */
export function logSafeEnvironmentInfo(config: GeneratorConfig) {
  const safeSettings = {
    NODE_ENV: process.env.NODE_ENV,
    PORT: config.server.port,
    HOST: config.server.host,
    primaryCodeModel: config.primary.models.code,
    fallbackCodeModel: config.fallback.models.code,
    retryBudget: config.retryBudget,
    sandboxTimeoutMs: config.sandbox.timeoutMs,
  };

  console.log("[environment] Safe settings:", safeSettings);
}

/**
 * Safely log that a secret/token was found without exposing its value
 * @param secretName - Name of the secret (e.g., "GAMESYNTH_API_KEY")
 */
export function logSecretStatus(secretName: string, value: string | undefined) {
  if (value) {
    console.log(`[security] ${secretName}: ✓ loaded (${value.length} chars)`);
  } else {
    console.warn(`[security] ${secretName}: ✗ not found`);
  }
}

/**
 * Log application events with only safe, known values
 * Use this for logging application state, not user input or external data
 * @param component - Component name (e.g., "web-api", "cli")
 * @param event - Event name (e.g., "started", "game-generated")
 * @param details - Only log known-safe details (numbers, booleans, predefined strings)
 */
export function logApplicationEvent(component: string, event: string, details?: Record<string, string | number | boolean>) {
  const logEntry = {
    component,
    event,
    timestamp: new Date().toISOString(),
    ...details
  };
  console.log(`[${component}] ${event}`, logEntry);
}
