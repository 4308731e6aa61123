/**
 * Generation Orchestrator
 *
 * Drives one GenerationTask to exactly one terminal outcome:
 *
 *   PENDING → ATTEMPTING(model, n) → VALIDATING → ACCEPTED
 *                  ↑                      │
 *                  └── RETRY_SAME_MODEL ──┤
 *                  └── FALLBACK_NEXT_MODEL┘
 *
 * ending in ACCEPTED, EXHAUSTED (best output kept, flagged) or FAILED.
 * Every attempt and every transition lands in the batch's UsageLog before the
 * next step runs.
 */

import { v4 as uuidv4 } from "uuid";
import type { ExhaustionPolicy } from "./config";
import { estimateTokens, promptText, type BackendAdapter } from "./backends";
import {
  AllModelsFailed,
  ConfigurationError,
  NoModelAvailableError,
  ValidationFailure,
  describeError,
} from "./errors";
import type { ModelRegistry } from "./modelRegistry";
import { cacheKeyFor, type NarrativeCache } from "./narrativeCache";
import type { OutputSlot } from "./outputSlots";
import { buildPrompt, type TemplateStore } from "./promptTemplates";
import type { QualityValidator } from "./qualityValidator";
import type {
  FailureReason,
  GenerationAttempt,
  GenerationPrompt,
  GenerationTask,
  ModelDescriptor,
  NarrativeResult,
  TaskOutcome,
  TaskState,
  ValidationResult,
} from "./types";
import type { UsageLog } from "./usageLog";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface OrchestratorSettings {
  /** attempts per candidate model */
  maxRetries: number;
  callTimeoutMs: number;
  taskTimeBudgetMs: number;
  exhaustionPolicy: ExhaustionPolicy;
}

export interface OrchestratorDependencies {
  registry: ModelRegistry;
  backend: BackendAdapter;
  validator: QualityValidator;
  cache: NarrativeCache;
  templates: TemplateStore;
  usageLog: UsageLog;
  outputSlot?: OutputSlot;
  settings: OrchestratorSettings;
  /** milliseconds clock; tests substitute a fake */
  now?: () => number;
}

type ScoredAttempt = GenerationAttempt & { validation: ValidationResult };

/** Per-run bookkeeping: current state plus the attempts made so far. */
class TaskRun {
  state: TaskState = "PENDING";
  readonly attempts: GenerationAttempt[] = [];

  constructor(
    readonly task: GenerationTask,
    private readonly usageLog: UsageLog,
  ) {}

  moveTo(to: TaskState, details: { modelId?: string; attemptNumber?: number } = {}): void {
    this.usageLog.recordTransition(this.task.taskId, this.state, to, details);
    this.state = to;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// ORCHESTRATOR
// ═══════════════════════════════════════════════════════════════════════════════

export class GenerationOrchestrator {
  private readonly now: () => number;

  constructor(private readonly deps: OrchestratorDependencies) {
    this.now = deps.now ?? Date.now;
  }

  async run(task: GenerationTask): Promise<TaskOutcome> {
    const run = new TaskRun(task, this.deps.usageLog);
    const template = this.deps.templates.getTemplate(task.templateId);
    if (!template) {
      throw new ConfigurationError(`Prompt template '${task.templateId}' not found for task ${task.taskId}`);
    }
    const prompt = buildPrompt(template, task.inputText);

    const candidates = this.candidatesFor(task, prompt);
    if (typeof candidates === "string") {
      console.warn(`[Orchestrator] ${task.taskId}: ${candidates}`);
      return this.fail(run, "NoModelAvailable", candidates);
    }

    const cached = await this.lookupCache(run, candidates);
    if (cached) return cached;

    const startedAt = this.now();
    let attemptNumber = 0;

    candidateLoop: for (const [index, candidate] of candidates.entries()) {
      for (let retry = 0; retry < this.deps.settings.maxRetries; retry++) {
        const remaining = this.deps.settings.taskTimeBudgetMs - (this.now() - startedAt);
        if (remaining <= 0) {
          console.warn(`[Orchestrator] ${task.taskId}: time budget spent after ${run.attempts.length} attempt(s)`);
          break candidateLoop;
        }

        attemptNumber++;
        const attempt = await this.attempt(run, candidate, prompt, attemptNumber, remaining);
        if (attempt.validation?.passed) {
          return this.accept(run, attempt, attempt.validation);
        }

        const retriesLeft = retry + 1 < this.deps.settings.maxRetries;
        if (retriesLeft) {
          run.moveTo("RETRY_SAME_MODEL", { modelId: candidate.id, attemptNumber });
        } else if (index + 1 < candidates.length) {
          run.moveTo("FALLBACK_NEXT_MODEL", { modelId: candidate.id, attemptNumber });
        }
      }
    }

    return this.exhaust(run);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Candidate selection
  // ─────────────────────────────────────────────────────────────────────────────

  /** Ordered candidates, or the reason none can serve the task. */
  private candidatesFor(task: GenerationTask, prompt: GenerationPrompt): ModelDescriptor[] | string {
    const available = this.deps.registry.availableCandidates(task.tier);
    if (available.length === 0) {
      const configured = this.deps.registry.configured(task.tier).map((d) => d.id);
      return new NoModelAvailableError(task.tier, configured).message;
    }

    const needed = estimateTokens(promptText(prompt)) + task.maxOutputTokens;
    const fitting = available.filter((d) => d.contextLimit >= needed);
    if (fitting.length === 0) {
      return `No ${task.tier} model has a context window of ${needed} tokens (largest: ${Math.max(...available.map((d) => d.contextLimit))})`;
    }
    return fitting;
  }

  private async lookupCache(run: TaskRun, candidates: ModelDescriptor[]): Promise<TaskOutcome | undefined> {
    const { task } = run;
    for (const candidate of candidates) {
      const entry = await this.deps.cache.get(this.cacheKey(task, candidate.id));
      if (!entry) continue;

      const { validation } = entry;
      if (!this.meetsThreshold(validation)) continue;

      console.log(`[Orchestrator] ${task.taskId}: cache hit on ${entry.modelId}`);
      run.moveTo("ACCEPTED", { modelId: entry.modelId });
      return this.settle(run, "accepted", {
        text: entry.text,
        modelId: entry.modelId,
        validation,
        lowConfidence: false,
        source: "cache",
      });
    }
    return undefined;
  }

  /** Stored validations are re-checked against the current threshold. */
  private meetsThreshold(validation: ValidationResult): boolean {
    return validation.issues.length === 0 && validation.score >= this.deps.validator.threshold;
  }

  private cacheKey(task: GenerationTask, modelId: string): string {
    return cacheKeyFor({
      inputText: task.inputText,
      modelId,
      templateId: task.templateId,
      temperature: task.temperature,
    });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Attempts
  // ─────────────────────────────────────────────────────────────────────────────

  private async attempt(
    run: TaskRun,
    candidate: ModelDescriptor,
    prompt: GenerationPrompt,
    attemptNumber: number,
    remainingBudgetMs: number,
  ): Promise<GenerationAttempt> {
    const { task } = run;
    const attemptId = uuidv4();
    const timeoutMs = Math.min(this.deps.settings.callTimeoutMs, remainingBudgetMs);

    run.moveTo("ATTEMPTING", { modelId: candidate.id, attemptNumber });
    const startedAt = new Date(this.now()).toISOString();
    const call = await this.deps.backend.generate(candidate.id, prompt, {
      temperature: task.temperature,
      maxOutputTokens: task.maxOutputTokens,
      timeoutMs,
    });
    const endedAt = new Date(this.now()).toISOString();

    const attempt: GenerationAttempt = {
      attemptId,
      taskId: task.taskId,
      modelId: candidate.id,
      attemptNumber,
      startedAt,
      endedAt,
      durationMs: call.durationMs,
      outcome: call.status,
      text: call.text,
      tokensIn: call.tokensIn,
      tokensOut: call.tokensOut,
      errorMessage: call.errorMessage,
    };

    if (call.status === "success") {
      run.moveTo("VALIDATING", { modelId: candidate.id, attemptNumber });
      attempt.validation = this.deps.validator.validate(attemptId, call.text, {
        taskId: task.taskId,
        domainKey: task.domainKey,
        tier: task.tier,
      });
    }

    run.attempts.push(attempt);
    this.deps.usageLog.recordAttempt(task, attempt);
    this.logAttempt(task, attempt);
    return attempt;
  }

  private logAttempt(task: GenerationTask, attempt: GenerationAttempt): void {
    const prefix = `[Orchestrator] ${task.taskId} attempt ${attempt.attemptNumber} on ${attempt.modelId}`;
    if (attempt.outcome !== "success") {
      console.warn(`${prefix}: ${attempt.outcome} - ${attempt.errorMessage ?? "no detail"}`);
      return;
    }
    const v = attempt.validation;
    if (v && !v.passed) {
      console.warn(`${prefix}: rejected (score ${v.score}) ${v.issues.join("; ")}`);
    } else {
      console.log(`${prefix}: accepted (score ${v?.score ?? "n/a"}, ${attempt.durationMs}ms)`);
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Terminal states
  // ─────────────────────────────────────────────────────────────────────────────

  private async accept(run: TaskRun, attempt: GenerationAttempt, validation: ValidationResult): Promise<TaskOutcome> {
    const { task } = run;
    const key = this.cacheKey(task, attempt.modelId);
    let result: NarrativeResult = {
      text: attempt.text,
      modelId: attempt.modelId,
      validation,
      lowConfidence: false,
      source: "generated",
    };

    try {
      const stored = await this.deps.cache.putIfAbsent(key, {
        key,
        text: attempt.text,
        modelId: attempt.modelId,
        templateId: task.templateId,
        validation,
        createdAt: new Date(this.now()).toISOString(),
      });
      if (!stored) {
        // Another writer got there first. Its entry is authoritative only if
        // it still passes; a stale entry stays in place but is not returned.
        const winner = await this.deps.cache.get(key);
        if (winner && this.meetsThreshold(winner.validation)) {
          result = {
            text: winner.text,
            modelId: winner.modelId,
            validation: winner.validation,
            lowConfidence: false,
            source: "cache-race",
          };
        }
      }
    } catch (error) {
      console.warn(`[Orchestrator] ${task.taskId}: cache write failed, result not cached:`, describeError(error));
    }

    run.moveTo("ACCEPTED", { modelId: attempt.modelId, attemptNumber: attempt.attemptNumber });
    return this.settle(run, "accepted", result);
  }

  private async exhaust(run: TaskRun): Promise<TaskOutcome> {
    const { task } = run;
    const best = this.bestOutput(run.attempts);

    if (!best) {
      return this.fail(run, "AllModelsFailed", new AllModelsFailed(task.taskId, run.attempts.length).message);
    }

    if (this.deps.settings.exhaustionPolicy === "fail") {
      const failure = new ValidationFailure(best.validation.score, best.validation.issues);
      return this.fail(run, "ValidationFailure", failure.message);
    }

    console.warn(
      `[Orchestrator] ${task.taskId}: no output passed validation; keeping best (score ${best.validation.score}) from ${best.modelId} as low confidence`,
    );
    run.moveTo("EXHAUSTED", { modelId: best.modelId, attemptNumber: best.attemptNumber });
    return this.settle(run, "exhausted", {
      text: best.text,
      modelId: best.modelId,
      validation: best.validation,
      lowConfidence: true,
      source: "generated",
    });
  }

  /** Highest score wins; on a tie the later attempt wins. */
  private bestOutput(attempts: GenerationAttempt[]): ScoredAttempt | undefined {
    let best: ScoredAttempt | undefined;
    for (const attempt of attempts) {
      const { validation } = attempt;
      if (attempt.outcome !== "success" || !validation || attempt.text.trim().length === 0) continue;
      if (!best || validation.score >= best.validation.score) {
        best = { ...attempt, validation };
      }
    }
    return best;
  }

  private fail(run: TaskRun, reason: FailureReason, message: string): TaskOutcome {
    run.moveTo("FAILED");
    console.error(`[Orchestrator] ${run.task.taskId} failed (${reason}): ${message}`);
    return {
      status: "failed",
      taskId: run.task.taskId,
      domainKey: run.task.domainKey,
      reason,
      message,
      attempts: run.attempts,
    };
  }

  private async settle(
    run: TaskRun,
    status: "accepted" | "exhausted",
    result: NarrativeResult,
  ): Promise<TaskOutcome> {
    const { task } = run;
    if (this.deps.outputSlot) {
      try {
        await this.deps.outputSlot.write({
          taskId: task.taskId,
          domainKey: task.domainKey,
          text: result.text,
          modelId: result.modelId,
          qualityScore: result.validation.score,
          lowConfidence: result.lowConfidence,
          generatedAt: new Date(this.now()).toISOString(),
        });
      } catch (error) {
        console.error(`[Orchestrator] ${task.taskId}: output slot write failed:`, describeError(error));
      }
    }

    return { status, taskId: task.taskId, domainKey: task.domainKey, result, attempts: run.attempts };
  }
}
