/**
 * Narrative Generation Configuration
 *
 * Centralized settings for model tiers, retry policy, validation, caching and
 * concurrency. Values come from presets, explicit overrides and environment
 * variables, and are always validated against NarrativeConfigZ.
 */

import { z } from "zod";
import { ConfigurationError } from "./errors";
import { modelTierEnum, type ModelDescriptor, type ModelTier } from "./types";

// ═══════════════════════════════════════════════════════════════════════════════
// SCHEMA
// ═══════════════════════════════════════════════════════════════════════════════

const ModelEntryZ = z.union([
  z.string().min(1),
  z.object({
    id: z.string().min(1),
    contextLimit: z.number().int().positive().optional(),
  }),
]);

const PerTierZ = <T extends z.ZodTypeAny>(schema: T) =>
  z.object({ domain: schema, synthesis: schema, large: schema });

export const NarrativeConfigZ = z
  .object({
    backendKind: z.enum(["local", "hosted"]),
    models: PerTierZ(z.array(ModelEntryZ)),
    defaultContextLimit: z.number().int().positive(),
    maxRetries: z.number().int().min(1).max(10),
    validationThreshold: z.number().min(0).max(100),
    workerCount: z.number().int().min(1).max(64),
    /** null keeps the cache in memory for the lifetime of the process */
    cacheLocation: z.string().min(1).nullable(),
    temperature: PerTierZ(z.number().min(0).max(2)),
    maxOutputTokens: z.number().int().positive(),
    callTimeoutMs: z.number().int().positive(),
    taskTimeBudgetMs: z.number().int().positive(),
    exhaustionPolicy: z.enum(["degrade", "fail"]),
    validator: z.object({
      strict: z.boolean(),
      minChars: z.number().int().nonnegative().optional(),
      maxChars: z.number().int().positive().optional(),
    }),
    local: z.object({ baseUrl: z.string().url() }),
    hosted: z.object({
      openaiApiKey: z.string().optional(),
      anthropicApiKey: z.string().optional(),
    }),
    telemetrySink: z.enum(["none", "file", "database"]),
  })
  .refine((c) => c.callTimeoutMs <= c.taskTimeBudgetMs, {
    message: "callTimeoutMs must not exceed taskTimeBudgetMs",
    path: ["callTimeoutMs"],
  });

export type NarrativeConfig = z.infer<typeof NarrativeConfigZ>;
export type ModelEntry = z.infer<typeof ModelEntryZ>;
export type ExhaustionPolicy = NarrativeConfig["exhaustionPolicy"];

export interface NarrativeConfigOverrides
  extends Partial<Omit<NarrativeConfig, "models" | "temperature" | "validator" | "local" | "hosted">> {
  models?: Partial<NarrativeConfig["models"]>;
  temperature?: Partial<NarrativeConfig["temperature"]>;
  validator?: Partial<NarrativeConfig["validator"]>;
  local?: Partial<NarrativeConfig["local"]>;
  hosted?: Partial<NarrativeConfig["hosted"]>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// PRESETS
// ═══════════════════════════════════════════════════════════════════════════════

// Quantized local models, newest first, then proven fallbacks
const LOCAL_MODELS: NarrativeConfig["models"] = {
  domain: [
    "gemma3:4b-it-qat",
    "qwen3:4b-instruct-2507-q4_K_M",
    "llama3.2:3b-instruct-q4_K_M",
    "mistral:7b-instruct-v0.3-q4_K_M",
    "qwen3:8b-q4_K_M",
    { id: "phi3:medium-128k-q4_K_M", contextLimit: 128000 },
    "llama3:8b-instruct-q4_K_M",
  ],
  synthesis: [
    "gemma3:12b-it-qat",
    "qwen3:8b-q8_0",
    "llama3:8b-instruct-q8_0",
    "mixtral:8x7b-instruct-q4_K_M",
    "qwen3:14b-q4_K_M",
    "solar:10.7b-instruct-q4_K_M",
  ],
  large: [
    "gemma3:27b-it-qat",
    "gpt-oss:20b",
    "qwen3:30b-a3b-instruct-2507-q4_K_M",
    "command-r:35b-v0.1-q4_K_M",
    "qwen3:32b-q4_K_M",
    "yi:34b-chat-q4_K_M",
  ],
};

const HOSTED_MODELS: NarrativeConfig["models"] = {
  domain: [
    { id: "gpt-4o-mini", contextLimit: 128000 },
    { id: "claude-haiku-4-5-20251015", contextLimit: 200000 },
  ],
  synthesis: [
    { id: "gpt-4o", contextLimit: 128000 },
    { id: "claude-sonnet-4-5-20250929", contextLimit: 200000 },
  ],
  large: [
    { id: "claude-sonnet-4-5-20250929", contextLimit: 200000 },
    { id: "gpt-4o", contextLimit: 128000 },
  ],
};

export const DEFAULT_NARRATIVE_CONFIG: NarrativeConfig = {
  backendKind: "local",
  models: LOCAL_MODELS,
  defaultContextLimit: 8192,
  maxRetries: 2,
  validationThreshold: 70,
  workerCount: 3,
  cacheLocation: null,
  temperature: {
    domain: 0.2, // routine summaries
    synthesis: 0.35,
    large: 0.3,
  },
  maxOutputTokens: 1024,
  callTimeoutMs: 120000,
  taskTimeBudgetMs: 600000,
  exhaustionPolicy: "degrade",
  validator: { strict: false },
  local: { baseUrl: "http://localhost:11434/v1" },
  hosted: {},
  telemetrySink: "none",
};

export const CONFIG_PRESETS: Record<"local" | "hosted", NarrativeConfigOverrides> = {
  local: {
    backendKind: "local",
    models: LOCAL_MODELS,
    defaultContextLimit: 8192,
  },
  hosted: {
    backendKind: "hosted",
    models: HOSTED_MODELS,
    defaultContextLimit: 128000,
    workerCount: 5,
    callTimeoutMs: 60000,
  },
};

// ═══════════════════════════════════════════════════════════════════════════════
// CONSTRUCTION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Merge overrides onto a base configuration (nested objects merged one level
 * deep) and validate the result.
 */
export function createNarrativeConfig(
  overrides: NarrativeConfigOverrides = {},
  base: NarrativeConfig = DEFAULT_NARRATIVE_CONFIG,
): NarrativeConfig {
  const merged = {
    ...base,
    ...overrides,
    models: { ...base.models, ...overrides.models },
    temperature: { ...base.temperature, ...overrides.temperature },
    validator: { ...base.validator, ...overrides.validator },
    local: { ...base.local, ...overrides.local },
    hosted: { ...base.hosted, ...overrides.hosted },
  };

  const parsed = NarrativeConfigZ.safeParse(merged);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid narrative configuration: ${details}`);
  }
  return parsed.data;
}

type Env = Record<string, string | undefined>;

function parseList(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  const items = value.split(",").map((item) => item.trim()).filter((item) => item.length > 0);
  return items.length > 0 ? items : undefined;
}

function parseNumber(key: string, value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new ConfigurationError(`${key} must be a number (got "${value}")`);
  }
  return parsed;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  return ["1", "true", "yes", "on"].includes(value.toLowerCase());
}

function parseEnum<T extends string>(key: string, value: string | undefined, allowed: readonly T[]): T | undefined {
  if (!value) return undefined;
  const match = allowed.find((candidate) => candidate === value);
  if (!match) {
    throw new ConfigurationError(`${key} must be one of ${allowed.join(", ")} (got "${value}")`);
  }
  return match;
}

/** Drop undefined values so they never shadow a preset. */
function defined<T extends object>(value: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key in value) {
    if (value[key] !== undefined) {
      result[key] = value[key];
    }
  }
  return result;
}

/**
 * Build the configuration from environment variables on top of the preset
 * matching NARRATIVE_BACKEND.
 */
export function loadNarrativeConfig(env: Env = process.env): NarrativeConfig {
  const backendKind = parseEnum("NARRATIVE_BACKEND", env.NARRATIVE_BACKEND, ["local", "hosted"] as const) ?? "local";
  const preset = createNarrativeConfig(CONFIG_PRESETS[backendKind]);

  const cacheDir = env.NARRATIVE_CACHE_DIR?.trim();

  return createNarrativeConfig(
    {
      ...defined({
        maxRetries: parseNumber("NARRATIVE_MAX_RETRIES", env.NARRATIVE_MAX_RETRIES),
        validationThreshold: parseNumber("NARRATIVE_VALIDATION_THRESHOLD", env.NARRATIVE_VALIDATION_THRESHOLD),
        workerCount: parseNumber("NARRATIVE_WORKERS", env.NARRATIVE_WORKERS),
        maxOutputTokens: parseNumber("NARRATIVE_MAX_OUTPUT_TOKENS", env.NARRATIVE_MAX_OUTPUT_TOKENS),
        callTimeoutMs: parseNumber("NARRATIVE_CALL_TIMEOUT_MS", env.NARRATIVE_CALL_TIMEOUT_MS),
        taskTimeBudgetMs: parseNumber("NARRATIVE_TASK_BUDGET_MS", env.NARRATIVE_TASK_BUDGET_MS),
        exhaustionPolicy: parseEnum("NARRATIVE_EXHAUSTION_POLICY", env.NARRATIVE_EXHAUSTION_POLICY, ["degrade", "fail"] as const),
        telemetrySink: parseEnum("NARRATIVE_TELEMETRY_SINK", env.NARRATIVE_TELEMETRY_SINK, ["none", "file", "database"] as const),
      }),
      cacheLocation: cacheDir ? cacheDir : preset.cacheLocation,
      models: defined({
        domain: parseList(env.NARRATIVE_DOMAIN_MODELS),
        synthesis: parseList(env.NARRATIVE_SYNTHESIS_MODELS),
        large: parseList(env.NARRATIVE_LARGE_MODELS),
      }),
      temperature: defined({
        domain: parseNumber("NARRATIVE_DOMAIN_TEMPERATURE", env.NARRATIVE_DOMAIN_TEMPERATURE),
        synthesis: parseNumber("NARRATIVE_SYNTHESIS_TEMPERATURE", env.NARRATIVE_SYNTHESIS_TEMPERATURE),
        large: parseNumber("NARRATIVE_LARGE_TEMPERATURE", env.NARRATIVE_LARGE_TEMPERATURE),
      }),
      validator: defined({ strict: parseBoolean(env.NARRATIVE_STRICT_VALIDATION) }),
      local: defined({ baseUrl: env.LOCAL_LLM_BASE_URL }),
      hosted: defined({
        openaiApiKey: env.OPENAI_API_KEY || undefined,
        anthropicApiKey: env.ANTHROPIC_API_KEY || undefined,
      }),
    },
    preset,
  );
}

/**
 * Expand configured candidate lists into immutable descriptors. Priority is
 * the position in the configured list.
 */
export function buildModelDescriptors(config: NarrativeConfig): ModelDescriptor[] {
  const descriptors: ModelDescriptor[] = [];
  for (const tier of modelTierEnum) {
    config.models[tier].forEach((entry, priority) => {
      const id = typeof entry === "string" ? entry : entry.id;
      const contextLimit =
        typeof entry === "string" ? config.defaultContextLimit : entry.contextLimit ?? config.defaultContextLimit;
      descriptors.push(Object.freeze({ id, tier, priority, contextLimit }));
    });
  }
  return descriptors;
}

export function temperatureFor(config: NarrativeConfig, tier: ModelTier): number {
  return config.temperature[tier];
}
