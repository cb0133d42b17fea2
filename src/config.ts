/**
 * Configuration is read from the environment once, checked against a zod
 * schema and handed to the components as a deep-frozen object. Nothing reads
 * process.env after loadConfig().
 */

import { z } from "zod";
import { ProviderEndpoint } from "./ai/providers/types.js";

export interface SandboxConfig {
  readonly timeoutMs: number;
  readonly timeoutIsSuccess: boolean;
  readonly maxHeapMb: number;
  readonly smokeInput: readonly string[];
}

export interface ServerConfig {
  readonly apiKey?: string;
  readonly port: number;
  readonly host: string;
}

export interface GeneratorConfig {
  readonly primary: ProviderEndpoint;
  readonly fallback: ProviderEndpoint;
  readonly temperature: number;
  readonly maxTokens: number;
  readonly retryBudget: number;
  readonly probeTimeoutMs: number;
  readonly requestTimeoutMs: number;
  readonly sandbox: SandboxConfig;
  readonly tracerProject?: string;
  readonly server: ServerConfig;
  readonly debugMode: boolean;
}

export class ConfigError extends Error {
  constructor(readonly issues: z.ZodIssue[]) {
    super(
      `Invalid configuration: ${issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ")}`
    );
    this.name = "ConfigError";
  }
}

// Unset and blank variables both mean "use the default"
function fromEnv<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (typeof value === "string" && value.trim() === "" ? undefined : value), schema);
}

const positiveInt = z.coerce.number().int().positive();
const flag = z.enum(["true", "false", "1", "0"]).transform((value) => value === "true" || value === "1");

const EnvSchema = z
  .object({
    GAMESYNTH_PRIMARY_BASE_URL: fromEnv(z.string({ required_error: "is required" }).url()),
    GAMESYNTH_PRIMARY_API_KEY: fromEnv(z.string().default("")),
    GAMESYNTH_PRIMARY_CODE_MODEL: fromEnv(z.string().default("codellama")),
    GAMESYNTH_PRIMARY_RULES_MODEL: fromEnv(z.string().default("llama3.1")),
    GAMESYNTH_FALLBACK_BASE_URL: fromEnv(z.string().url().default("https://api.openai.com/v1")),
    GAMESYNTH_FALLBACK_API_KEY: fromEnv(z.string().optional()),
    OPENAI_API_KEY: fromEnv(z.string().optional()),
    GAMESYNTH_FALLBACK_CODE_MODEL: fromEnv(z.string().default("gpt-4o")),
    GAMESYNTH_FALLBACK_RULES_MODEL: fromEnv(z.string().default("gpt-4o")),
    GAMESYNTH_TEMPERATURE: fromEnv(z.coerce.number().min(0).max(2).default(0.5)),
    GAMESYNTH_MAX_TOKENS: fromEnv(positiveInt.default(4096)),
    GAMESYNTH_RETRY_BUDGET: fromEnv(positiveInt.default(3)),
    GAMESYNTH_PROBE_TIMEOUT_MS: fromEnv(positiveInt.default(5000)),
    GAMESYNTH_REQUEST_TIMEOUT_MS: fromEnv(positiveInt.default(120000)),
    GAMESYNTH_SANDBOX_TIMEOUT_MS: fromEnv(positiveInt.default(5000)),
    GAMESYNTH_SANDBOX_TIMEOUT_IS_SUCCESS: fromEnv(flag.default("false")),
    GAMESYNTH_SANDBOX_MAX_HEAP_MB: fromEnv(positiveInt.default(64)),
    GAMESYNTH_SMOKE_INPUT: fromEnv(z.string().default("1\\n2\\n3\\nq")),
    GAMESYNTH_TRACER_PROJECT: fromEnv(z.string().optional()),
    GAMESYNTH_API_KEY: fromEnv(z.string().optional()),
    GAMESYNTH_WEB_API_PORT: fromEnv(z.coerce.number().int().min(0).max(65535).default(3000)),
    GAMESYNTH_WEB_API_HOST: fromEnv(z.string().default("0.0.0.0")),
    GAMESYNTH_DEBUG: fromEnv(flag.default("false")),
  })
  .superRefine((env, ctx) => {
    if (env.GAMESYNTH_FALLBACK_API_KEY === undefined && env.OPENAI_API_KEY === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["GAMESYNTH_FALLBACK_API_KEY"],
        message: "is required (or set OPENAI_API_KEY)",
      });
    }
  });

/**
 * Smoke input lines are separated by real newlines or by a literal "\n",
 * which is what a single-line .env value holds.
 */
export function parseSmokeInput(value: string): string[] {
  return value.split(/\\n|\r?\n/);
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): GeneratorConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues);
  }
  const e = parsed.data;

  const config: GeneratorConfig = {
    primary: {
      name: "primary",
      baseUrl: e.GAMESYNTH_PRIMARY_BASE_URL,
      apiKey: e.GAMESYNTH_PRIMARY_API_KEY,
      models: { code: e.GAMESYNTH_PRIMARY_CODE_MODEL, rules: e.GAMESYNTH_PRIMARY_RULES_MODEL },
    },
    fallback: {
      name: "fallback",
      baseUrl: e.GAMESYNTH_FALLBACK_BASE_URL,
      apiKey: e.GAMESYNTH_FALLBACK_API_KEY ?? e.OPENAI_API_KEY ?? "",
      models: { code: e.GAMESYNTH_FALLBACK_CODE_MODEL, rules: e.GAMESYNTH_FALLBACK_RULES_MODEL },
    },
    temperature: e.GAMESYNTH_TEMPERATURE,
    maxTokens: e.GAMESYNTH_MAX_TOKENS,
    retryBudget: e.GAMESYNTH_RETRY_BUDGET,
    probeTimeoutMs: e.GAMESYNTH_PROBE_TIMEOUT_MS,
    requestTimeoutMs: e.GAMESYNTH_REQUEST_TIMEOUT_MS,
    sandbox: {
      timeoutMs: e.GAMESYNTH_SANDBOX_TIMEOUT_MS,
      timeoutIsSuccess: e.GAMESYNTH_SANDBOX_TIMEOUT_IS_SUCCESS,
      maxHeapMb: e.GAMESYNTH_SANDBOX_MAX_HEAP_MB,
      smokeInput: parseSmokeInput(e.GAMESYNTH_SMOKE_INPUT),
    },
    tracerProject: e.GAMESYNTH_TRACER_PROJECT,
    server: {
      apiKey: e.GAMESYNTH_API_KEY,
      port: e.GAMESYNTH_WEB_API_PORT,
      host: e.GAMESYNTH_WEB_API_HOST,
    },
    debugMode: e.GAMESYNTH_DEBUG,
  };
  return deepFreeze(config);
}
