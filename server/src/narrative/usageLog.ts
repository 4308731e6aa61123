/**
 * Usage Log - append-only record of every generation attempt
 *
 * One instance per batch run: constructed when the batch starts, closed when
 * it ends. Closing flushes the records to the configured sink; appends after
 * close are rejected. State transitions are kept in their own stream so the
 * attempt log length always equals the number of backend calls.
 */

import { v4 as uuidv4 } from "uuid";
import type {
  CallStatus,
  GenerationAttempt,
  GenerationTask,
  TaskState,
  TaskTransition,
  UsageLogRecord,
} from "./types";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface UsageLogSink {
  readonly name: string;
  write(records: readonly UsageLogRecord[], transitions: readonly TaskTransition[]): Promise<void>;
}

export interface UsageStats {
  calls: number;
  successful: number;
  failed: number;
  timeouts: number;
  /** calls that returned text the validator rejected */
  rejected: number;
  totalTokens: number;
  meanLatencyMs: number;
}

export interface UsageSummary extends UsageStats {
  batchId: string;
  byModel: Record<string, UsageStats>;
  byDomain: Record<string, UsageStats>;
}

export interface AttemptFilter {
  taskId?: string;
  modelId?: string;
  domainKey?: string;
  outcome?: CallStatus;
}

// ═══════════════════════════════════════════════════════════════════════════════
// AGGREGATION
// ═══════════════════════════════════════════════════════════════════════════════

function aggregate(records: readonly UsageLogRecord[]): UsageStats {
  const stats: UsageStats = {
    calls: records.length,
    successful: 0,
    failed: 0,
    timeouts: 0,
    rejected: 0,
    totalTokens: 0,
    meanLatencyMs: 0,
  };
  let latency = 0;

  for (const record of records) {
    if (record.outcome === "success") {
      stats.successful++;
      if (record.passed === false) stats.rejected++;
    } else {
      stats.failed++;
      if (record.outcome === "timeout") stats.timeouts++;
    }
    stats.totalTokens += record.totalTokens;
    latency += record.durationMs;
  }

  stats.meanLatencyMs = records.length > 0 ? Math.round((latency / records.length) * 10) / 10 : 0;
  return stats;
}

function groupBy(records: readonly UsageLogRecord[], keyOf: (r: UsageLogRecord) => string): Record<string, UsageStats> {
  const groups = new Map<string, UsageLogRecord[]>();
  for (const record of records) {
    const key = keyOf(record);
    const bucket = groups.get(key);
    if (bucket) {
      bucket.push(record);
    } else {
      groups.set(key, [record]);
    }
  }
  return Object.fromEntries(Array.from(groups, ([key, bucket]) => [key, aggregate(bucket)]));
}

// ═══════════════════════════════════════════════════════════════════════════════
// LOG
// ═══════════════════════════════════════════════════════════════════════════════

export class UsageLog {
  private readonly records: UsageLogRecord[] = [];
  private readonly transitions: TaskTransition[] = [];
  private sequence = 0;
  private closing: Promise<void> | null = null;

  constructor(
    readonly batchId: string,
    private readonly sink?: UsageLogSink,
  ) {}

  get length(): number {
    return this.records.length;
  }

  get closed(): boolean {
    return this.closing !== null;
  }

  recordAttempt(task: GenerationTask, attempt: GenerationAttempt): UsageLogRecord {
    this.assertOpen();
    const record: UsageLogRecord = {
      recordId: uuidv4(),
      batchId: this.batchId,
      taskId: task.taskId,
      domainKey: task.domainKey,
      tier: task.tier,
      modelId: attempt.modelId,
      attemptNumber: attempt.attemptNumber,
      outcome: attempt.outcome,
      tokensIn: attempt.tokensIn,
      tokensOut: attempt.tokensOut,
      totalTokens: attempt.tokensIn + attempt.tokensOut,
      durationMs: attempt.durationMs,
      qualityScore: attempt.validation?.score,
      passed: attempt.validation?.passed,
      errorMessage: attempt.errorMessage,
      startedAt: attempt.startedAt,
      endedAt: attempt.endedAt,
    };
    this.records.push(Object.freeze(record));
    return record;
  }

  recordTransition(
    taskId: string,
    from: TaskState,
    to: TaskState,
    details: { modelId?: string; attemptNumber?: number } = {},
  ): TaskTransition {
    this.assertOpen();
    const transition: TaskTransition = {
      sequence: ++this.sequence,
      taskId,
      from,
      to,
      ...details,
      at: new Date().toISOString(),
    };
    this.transitions.push(Object.freeze(transition));
    return transition;
  }

  listAttempts(filter: AttemptFilter = {}): UsageLogRecord[] {
    return this.records.filter((r) =>
      (filter.taskId === undefined || r.taskId === filter.taskId) &&
      (filter.modelId === undefined || r.modelId === filter.modelId) &&
      (filter.domainKey === undefined || r.domainKey === filter.domainKey) &&
      (filter.outcome === undefined || r.outcome === filter.outcome),
    );
  }

  listTransitions(taskId?: string): TaskTransition[] {
    return taskId === undefined
      ? [...this.transitions]
      : this.transitions.filter((t) => t.taskId === taskId);
  }

  summary(): UsageSummary {
    return {
      batchId: this.batchId,
      ...aggregate(this.records),
      byModel: groupBy(this.records, (r) => r.modelId),
      byDomain: groupBy(this.records, (r) => r.domainKey),
    };
  }

  /** Flush to the sink once. Later calls wait on the same flush. */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.flush();
    }
    return this.closing;
  }

  private async flush(): Promise<void> {
    if (!this.sink) return;
    await this.sink.write(this.records, this.transitions);
    console.log(`[UsageLog] Flushed ${this.records.length} attempt record(s) for batch ${this.batchId} to ${this.sink.name}`);
  }

  private assertOpen(): void {
    if (this.closing) {
      throw new Error(`[UsageLog] Batch ${this.batchId} log is closed`);
    }
  }
}
