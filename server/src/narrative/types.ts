/**
 * Narrative Generation Types
 *
 * Shared shapes for the model registry, backend adapters, validator, cache,
 * usage log, orchestrator and scheduler.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// MODELS
// ═══════════════════════════════════════════════════════════════════════════════

export const modelTierEnum = ["domain", "synthesis", "large"] as const;
export type ModelTier = typeof modelTierEnum[number];

export interface ModelDescriptor {
  readonly id: string;
  readonly tier: ModelTier;
  /** 0 = tried first */
  readonly priority: number;
  readonly contextLimit: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// BACKEND CALLS
// ═══════════════════════════════════════════════════════════════════════════════

export type BackendKind = "local" | "hosted";

export interface GenerationPrompt {
  system: string;
  user: string;
}

export interface GenerationParams {
  temperature: number;
  maxOutputTokens: number;
  timeoutMs: number;
}

export type CallStatus = "success" | "error" | "timeout";

export interface BackendCallResult {
  text: string;
  tokensIn: number;
  tokensOut: number;
  durationMs: number;
  status: CallStatus;
  errorMessage?: string;
}

// ═══════════════════════════════════════════════════════════════════════════════
// TASKS
// ═══════════════════════════════════════════════════════════════════════════════

export interface GenerationTask {
  taskId: string;
  domainKey: string;
  inputText: string;
  tier: ModelTier;
  templateId: string;
  temperature: number;
  maxOutputTokens: number;
  /** Synthesis tasks wait for these to reach a terminal state */
  dependsOn?: string[];
}

export interface ValidationMetrics {
  length: number;
  percentileMentions: number;
  scoreMentions: number;
  testNameMentions: number;
  clinicalTerms: number;
  sentences: number;
  meanWordsPerSentence: number;
}

export interface ValidationResult {
  attemptId: string;
  score: number;
  issues: string[];
  warnings: string[];
  passed: boolean;
  metrics: ValidationMetrics;
}

export interface GenerationAttempt {
  attemptId: string;
  taskId: string;
  modelId: string;
  attemptNumber: number;
  startedAt: string;
  endedAt: string;
  durationMs: number;
  outcome: CallStatus;
  text: string;
  tokensIn: number;
  tokensOut: number;
  errorMessage?: string;
  validation?: ValidationResult;
}

export type TaskState =
  | "PENDING"
  | "ATTEMPTING"
  | "VALIDATING"
  | "RETRY_SAME_MODEL"
  | "FALLBACK_NEXT_MODEL"
  | "ACCEPTED"
  | "EXHAUSTED"
  | "FAILED"
  | "SKIPPED";

export type FailureReason = "AllModelsFailed" | "NoModelAvailable" | "ValidationFailure";

export type ResultSource = "generated" | "cache" | "cache-race";

export interface NarrativeResult {
  text: string;
  modelId: string;
  validation: ValidationResult;
  lowConfidence: boolean;
  source: ResultSource;
}

export type TaskOutcome =
  | { status: "accepted"; taskId: string; domainKey: string; result: NarrativeResult; attempts: GenerationAttempt[] }
  | { status: "exhausted"; taskId: string; domainKey: string; result: NarrativeResult; attempts: GenerationAttempt[] }
  | { status: "failed"; taskId: string; domainKey: string; reason: FailureReason; message: string; attempts: GenerationAttempt[] }
  | { status: "skipped"; taskId: string; domainKey: string; blockedBy: string[] };

export interface BatchReport {
  batchId: string;
  startedAt: string;
  completedAt: string;
  durationMs: number;
  outcomes: TaskOutcome[];
  counts: {
    total: number;
    accepted: number;
    exhausted: number;
    failed: number;
    skipped: number;
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// CACHE & TELEMETRY
// ═══════════════════════════════════════════════════════════════════════════════

export interface CacheEntry {
  key: string;
  text: string;
  modelId: string;
  templateId: string;
  validation: ValidationResult;
  createdAt: string;
}

export interface UsageLogRecord {
  recordId: string;
  batchId: string;
  taskId: string;
  domainKey: string;
  tier: ModelTier;
  modelId: string;
  attemptNumber: number;
  outcome: CallStatus;
  tokensIn: number;
  tokensOut: number;
  totalTokens: number;
  durationMs: number;
  qualityScore?: number;
  passed?: boolean;
  errorMessage?: string;
  startedAt: string;
  endedAt: string;
}

export interface TaskTransition {
  sequence: number;
  taskId: string;
  from: TaskState;
  to: TaskState;
  modelId?: string;
  attemptNumber?: number;
  at: string;
}
