import type { ModelTier } from "./types";

export type NarrativeErrorCode =
  | "BACKEND_UNAVAILABLE"
  | "NO_MODEL_AVAILABLE"
  | "GENERATION_TIMEOUT"
  | "GENERATION_ERROR"
  | "VALIDATION_FAILURE"
  | "ALL_MODELS_FAILED"
  | "CACHE_CORRUPTION"
  | "INVALID_BATCH"
  | "CONFIGURATION";

export class NarrativeError extends Error {
  readonly code: NarrativeErrorCode;
  readonly httpStatus: number;

  constructor(code: NarrativeErrorCode, message: string, httpStatus = 500) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.httpStatus = httpStatus;
  }
}

/** No backend answered at all. Aborts the whole batch. */
export class BackendUnavailableError extends NarrativeError {
  constructor(message: string) {
    super("BACKEND_UNAVAILABLE", message, 503);
  }
}

/** The tier has no reachable candidate. Fatal for tasks of that tier only. */
export class NoModelAvailableError extends NarrativeError {
  readonly tier: ModelTier;

  constructor(tier: ModelTier, configured: string[]) {
    super(
      "NO_MODEL_AVAILABLE",
      configured.length > 0
        ? `No ${tier} model available. Install one of: ${configured.slice(0, 3).join(", ")}`
        : `No ${tier} models configured`,
      503,
    );
    this.tier = tier;
  }
}

export class GenerationTimeout extends NarrativeError {
  constructor(modelId: string, timeoutMs: number) {
    super("GENERATION_TIMEOUT", `${modelId} did not answer within ${timeoutMs}ms`, 504);
  }
}

export class GenerationError extends NarrativeError {
  constructor(modelId: string, detail: string) {
    super("GENERATION_ERROR", `${modelId} failed: ${detail}`, 502);
  }
}

export class ValidationFailure extends NarrativeError {
  readonly score: number;
  readonly issues: string[];

  constructor(score: number, issues: string[]) {
    super(
      "VALIDATION_FAILURE",
      issues.length > 0
        ? `Output rejected (score ${score}): ${issues.join("; ")}`
        : `Output rejected (score ${score} below threshold)`,
      422,
    );
    this.score = score;
    this.issues = issues;
  }
}

export class AllModelsFailed extends NarrativeError {
  constructor(taskId: string, attempts: number) {
    super("ALL_MODELS_FAILED", `Task ${taskId}: no output after ${attempts} attempt(s)`, 502);
  }
}

/** Raised inside the cache only; callers see a miss. */
export class CacheCorruptionError extends NarrativeError {
  constructor(key: string, detail: string) {
    super("CACHE_CORRUPTION", `Cache entry ${key} unreadable: ${detail}`);
  }
}

export class InvalidBatchError extends NarrativeError {
  constructor(message: string) {
    super("INVALID_BATCH", message, 400);
  }
}

export class ConfigurationError extends NarrativeError {
  constructor(message: string) {
    super("CONFIGURATION", message, 500);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
