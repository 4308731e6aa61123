import { promises as fs } from "fs";
import path from "path";
import { generationAttempts, type InsertGenerationAttempt } from "@shared/schema";
import { getDb, type Database } from "../../db";
import type { NarrativeConfig } from "./config";
import { ConfigurationError } from "./errors";
import type { TaskTransition, UsageLogRecord } from "./types";
import type { UsageLogSink } from "./usageLog";

/**
 * Appends one JSON line per attempt (and per transition, tagged by kind) to
 * a file beside the cache.
 */
export class JsonlUsageLogSink implements UsageLogSink {
  readonly name: string;

  constructor(private readonly filePath: string) {
    this.name = `jsonl:${filePath}`;
  }

  async write(records: readonly UsageLogRecord[], transitions: readonly TaskTransition[]): Promise<void> {
    if (records.length === 0 && transitions.length === 0) return;
    const lines = [
      ...records.map((record) => JSON.stringify({ kind: "attempt", ...record })),
      ...transitions.map((transition) => JSON.stringify({ kind: "transition", ...transition })),
    ];
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.appendFile(this.filePath, `${lines.join("\n")}\n`, "utf-8");
  }
}

export function toAttemptRow(record: UsageLogRecord): InsertGenerationAttempt {
  return {
    recordId: record.recordId,
    batchId: record.batchId,
    taskId: record.taskId,
    domainKey: record.domainKey,
    tier: record.tier,
    modelId: record.modelId,
    attemptNumber: record.attemptNumber,
    outcome: record.outcome,
    tokensIn: record.tokensIn,
    tokensOut: record.tokensOut,
    totalTokens: record.totalTokens,
    durationMs: Math.round(record.durationMs),
    qualityScore: record.qualityScore ?? null,
    passed: record.passed ?? null,
    errorMessage: record.errorMessage ?? null,
    startedAt: new Date(record.startedAt),
    endedAt: new Date(record.endedAt),
  };
}

const INSERT_CHUNK = 500;

/** Inserts attempt records into generation_attempts. Transitions stay in memory. */
export class DatabaseUsageLogSink implements UsageLogSink {
  readonly name = "database:generation_attempts";

  constructor(private readonly db: Database) {}

  async write(records: readonly UsageLogRecord[]): Promise<void> {
    for (let i = 0; i < records.length; i += INSERT_CHUNK) {
      const rows = records.slice(i, i + INSERT_CHUNK).map(toAttemptRow);
      await this.db.insert(generationAttempts).values(rows);
    }
  }
}

/**
 * Sink for the configured telemetrySink. The JSONL log lives beside the file
 * cache, so "file" needs a cacheLocation.
 */
export function createUsageLogSink(config: NarrativeConfig): UsageLogSink | undefined {
  switch (config.telemetrySink) {
    case "none":
      return undefined;
    case "file":
      if (!config.cacheLocation) {
        throw new ConfigurationError("telemetrySink 'file' requires cacheLocation (NARRATIVE_CACHE_DIR)");
      }
      return new JsonlUsageLogSink(path.join(config.cacheLocation, "usage_log.jsonl"));
    case "database":
      return new DatabaseUsageLogSink(getDb());
  }
}
