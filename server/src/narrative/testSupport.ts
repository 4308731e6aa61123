/**
 * In-process stand-ins shared by the narrative tests.
 */

import { BackendUnavailableError, GenerationTimeout } from "./errors";
import type { BackendAdapter } from "./backends";
import type { QualityValidator, ValidationContext } from "./qualityValidator";
import type {
  BackendCallResult,
  BackendKind,
  GenerationParams,
  GenerationPrompt,
  GenerationTask,
  ValidationResult,
} from "./types";

export type ScriptedReply =
  | { status: "success"; text: string }
  | { status: "error"; errorMessage: string }
  | { status: "timeout" };

export const reply = {
  ok: (text: string): ScriptedReply => ({ status: "success", text }),
  error: (errorMessage = "connection reset"): ScriptedReply => ({ status: "error", errorMessage }),
  timeout: (): ScriptedReply => ({ status: "timeout" }),
};

export interface RecordedCall {
  modelId: string;
  prompt: GenerationPrompt;
  params: GenerationParams;
}

export interface FakeBackendOptions {
  /** reachable model ids */
  models: string[];
  kind?: BackendKind;
  /** per-model queue of replies, consumed in order */
  replies?: Record<string, ScriptedReply[]>;
  /** used once a model's queue is empty */
  fallback?: ScriptedReply;
  delayMs?: number;
  durationMs?: number;
  unavailable?: boolean;
  /** runs at the start of every call, before the reply is produced */
  onCall?: (call: RecordedCall) => void;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function toCallResult(
  modelId: string,
  next: ScriptedReply,
  params: GenerationParams,
  durationMs: number,
): BackendCallResult {
  if (next.status === "success") {
    return { text: next.text, tokensIn: 40, tokensOut: 20, durationMs, status: "success" };
  }
  if (next.status === "error") {
    return { text: "", tokensIn: 40, tokensOut: 0, durationMs, status: "error", errorMessage: next.errorMessage };
  }
  return {
    text: "",
    tokensIn: 40,
    tokensOut: 0,
    durationMs: params.timeoutMs,
    status: "timeout",
    errorMessage: new GenerationTimeout(modelId, params.timeoutMs).message,
  };
}

/** Scripted BackendAdapter that records calls and peak concurrency. */
export class FakeBackend implements BackendAdapter {
  readonly kind: BackendKind;
  readonly calls: RecordedCall[] = [];
  active = 0;
  maxActive = 0;
  private readonly queues = new Map<string, ScriptedReply[]>();

  constructor(private readonly options: FakeBackendOptions) {
    this.kind = options.kind ?? "local";
    for (const [modelId, replies] of Object.entries(options.replies ?? {})) {
      this.queues.set(modelId, [...replies]);
    }
  }

  async listAvailableModels(): Promise<string[]> {
    if (this.options.unavailable) {
      throw new BackendUnavailableError("fake backend offline");
    }
    return [...this.options.models];
  }

  async generate(modelId: string, prompt: GenerationPrompt, params: GenerationParams): Promise<BackendCallResult> {
    const call = { modelId, prompt, params };
    this.calls.push(call);
    this.options.onCall?.(call);
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      if (this.options.delayMs) {
        await sleep(this.options.delayMs);
      }
      const next = this.queues.get(modelId)?.shift() ?? this.options.fallback ?? reply.error("no scripted reply");
      return toCallResult(modelId, next, params, this.options.durationMs ?? 5);
    } finally {
      this.active--;
    }
  }
}

/**
 * Validator driven by the text itself: "score=N" sets the score (default 100)
 * and a score under 50 adds a blocking issue.
 */
export class ScoreTagValidator implements QualityValidator {
  constructor(readonly threshold = 70) {}

  validate(attemptId: string, text: string, _context: ValidationContext): ValidationResult {
    const match = /score=(\d+)/.exec(text);
    const score = match ? Number(match[1]) : 100;
    const issues = score < 50 ? [`score ${score} is below the floor`] : [];
    return {
      attemptId,
      score,
      issues,
      warnings: [],
      passed: issues.length === 0 && score >= this.threshold,
      metrics: {
        length: text.length,
        percentileMentions: 0,
        scoreMentions: 0,
        testNameMentions: 0,
        clinicalTerms: 0,
        sentences: 0,
        meanWordsPerSentence: 0,
      },
    };
  }
}

export function makeTask(overrides: Partial<GenerationTask> = {}): GenerationTask {
  return {
    taskId: "memory",
    domainKey: "memory",
    inputText: "Learning and recall were in the average range.",
    tier: "domain",
    templateId: "memory-v1",
    temperature: 0.2,
    maxOutputTokens: 256,
    ...overrides,
  };
}

/** Passes the clinical validator with score 100. */
export const CLINICAL_PARAGRAPH = [
  "The patient demonstrated average cognitive functioning across most areas assessed.",
  "Verbal reasoning skills were a relative strength, while processing speed showed mild difficulties.",
  "Overall performance suggests adequate ability to manage everyday academic demands.",
].join(" ");
