import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { createNarrativeConfig } from "./config";
import { ConfigurationError } from "./errors";
import { makeTask } from "./testSupport";
import type { GenerationAttempt, TaskTransition, UsageLogRecord } from "./types";
import { UsageLog, type UsageLogSink } from "./usageLog";
import { JsonlUsageLogSink, createUsageLogSink, toAttemptRow } from "./usageLogSinks";

function attempt(overrides: Partial<GenerationAttempt> = {}): GenerationAttempt {
  return {
    attemptId: "attempt-1",
    taskId: "memory",
    modelId: "model-a",
    attemptNumber: 1,
    startedAt: "2026-03-01T10:00:00.000Z",
    endedAt: "2026-03-01T10:00:01.000Z",
    durationMs: 1000,
    outcome: "success",
    text: "Narrative",
    tokensIn: 100,
    tokensOut: 50,
    ...overrides,
  };
}

class RecordingSink implements UsageLogSink {
  readonly name = "recording";
  readonly writes: Array<{ records: readonly UsageLogRecord[]; transitions: readonly TaskTransition[] }> = [];

  async write(records: readonly UsageLogRecord[], transitions: readonly TaskTransition[]): Promise<void> {
    this.writes.push({ records: [...records], transitions: [...transitions] });
  }
}

describe("UsageLog", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("appends one record per attempt", () => {
    const log = new UsageLog("batch-1");
    const task = makeTask();

    const record = log.recordAttempt(task, attempt());
    log.recordAttempt(task, attempt({ attemptNumber: 2, outcome: "timeout", text: "", tokensOut: 0 }));

    expect(log.length).toBe(2);
    expect(record).toMatchObject({
      batchId: "batch-1",
      taskId: "memory",
      domainKey: "memory",
      tier: "domain",
      modelId: "model-a",
      totalTokens: 150,
    });
    expect(Object.isFrozen(log.listAttempts()[0])).toBe(true);
  });

  it("summarizes overall, by model and by domain", () => {
    const log = new UsageLog("batch-1");
    const memory = makeTask();
    const verbal = makeTask({ taskId: "verbal", domainKey: "verbal" });
    const passing = { attemptId: "x", score: 90, issues: [], warnings: [], passed: true, metrics: {
      length: 1, percentileMentions: 0, scoreMentions: 0, testNameMentions: 0, clinicalTerms: 0, sentences: 0, meanWordsPerSentence: 0,
    } };

    log.recordAttempt(memory, attempt({ outcome: "error", durationMs: 100, tokensIn: 10, tokensOut: 0 }));
    log.recordAttempt(memory, attempt({ modelId: "model-b", durationMs: 200, validation: { ...passing, passed: false, score: 40 } }));
    log.recordAttempt(verbal, attempt({ modelId: "model-b", durationMs: 301, validation: passing }));

    const summary = log.summary();

    expect(summary).toMatchObject({
      batchId: "batch-1",
      calls: 3,
      successful: 2,
      failed: 1,
      timeouts: 0,
      rejected: 1,
      totalTokens: 310,
      meanLatencyMs: 200.3,
    });
    expect(summary.byModel["model-b"]?.calls).toBe(2);
    expect(summary.byModel["model-a"]?.failed).toBe(1);
    expect(summary.byDomain["verbal"]).toMatchObject({ calls: 1, successful: 1, meanLatencyMs: 301 });
  });

  it("filters attempts", () => {
    const log = new UsageLog("batch-1");
    log.recordAttempt(makeTask(), attempt({ outcome: "timeout" }));
    log.recordAttempt(makeTask({ taskId: "verbal", domainKey: "verbal" }), attempt({ modelId: "model-b" }));

    expect(log.listAttempts({ outcome: "timeout" })).toHaveLength(1);
    expect(log.listAttempts({ domainKey: "verbal", modelId: "model-b" })).toHaveLength(1);
    expect(log.listAttempts({ taskId: "memory", modelId: "model-b" })).toHaveLength(0);
  });

  it("numbers transitions in order", () => {
    const log = new UsageLog("batch-1");

    log.recordTransition("memory", "PENDING", "ATTEMPTING", { modelId: "model-a", attemptNumber: 1 });
    log.recordTransition("verbal", "PENDING", "SKIPPED");

    expect(log.listTransitions().map((t) => t.sequence)).toEqual([1, 2]);
    expect(log.listTransitions("memory")[0]).toMatchObject({ from: "PENDING", to: "ATTEMPTING", modelId: "model-a" });
    expect(log.length).toBe(0);
  });

  it("flushes to its sink once and rejects appends after close", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const sink = new RecordingSink();
    const log = new UsageLog("batch-1", sink);
    log.recordAttempt(makeTask(), attempt());
    log.recordTransition("memory", "PENDING", "ATTEMPTING");

    await Promise.all([log.close(), log.close()]);

    expect(log.closed).toBe(true);
    expect(sink.writes).toHaveLength(1);
    expect(sink.writes[0]?.records).toHaveLength(1);
    expect(sink.writes[0]?.transitions).toHaveLength(1);
    expect(() => log.recordAttempt(makeTask(), attempt())).toThrow("[UsageLog] Batch batch-1 log is closed");
  });
});

describe("usage log sinks", () => {
  let directory: string | undefined;

  afterEach(async () => {
    vi.restoreAllMocks();
    if (directory) await fs.rm(directory, { recursive: true, force: true });
    directory = undefined;
  });

  it("appends JSON lines tagged by kind", async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), "usage-log-"));
    const file = path.join(directory, "nested", "usage_log.jsonl");
    const log = new UsageLog("batch-1");
    const record = log.recordAttempt(makeTask(), attempt());
    const transition = log.recordTransition("memory", "PENDING", "ATTEMPTING");
    const sink = new JsonlUsageLogSink(file);

    await sink.write([record], [transition]);
    await sink.write([record], []);

    const lines = (await fs.readFile(file, "utf-8")).trimEnd().split("\n").map((line) => JSON.parse(line));
    expect(lines.map((line) => line.kind)).toEqual(["attempt", "transition", "attempt"]);
    expect(lines[0]).toMatchObject({ recordId: record.recordId, batchId: "batch-1", totalTokens: 150 });
    expect(sink.name).toBe(`jsonl:${file}`);
  });

  it("maps records to database rows", () => {
    const log = new UsageLog("batch-1");
    const record = log.recordAttempt(makeTask(), attempt({ durationMs: 12.6, outcome: "error", errorMessage: "boom" }));

    expect(toAttemptRow(record)).toEqual({
      recordId: record.recordId,
      batchId: "batch-1",
      taskId: "memory",
      domainKey: "memory",
      tier: "domain",
      modelId: "model-a",
      attemptNumber: 1,
      outcome: "error",
      tokensIn: 100,
      tokensOut: 50,
      totalTokens: 150,
      durationMs: 13,
      qualityScore: null,
      passed: null,
      errorMessage: "boom",
      startedAt: new Date("2026-03-01T10:00:00.000Z"),
      endedAt: new Date("2026-03-01T10:00:01.000Z"),
    });
  });

  it("creates the sink named by configuration", () => {
    expect(createUsageLogSink(createNarrativeConfig())).toBeUndefined();

    const sink = createUsageLogSink(createNarrativeConfig({ telemetrySink: "file", cacheLocation: "/var/cache/narratives" }));
    expect(sink).toBeInstanceOf(JsonlUsageLogSink);
    expect(sink?.name).toBe(`jsonl:${path.join("/var/cache/narratives", "usage_log.jsonl")}`);

    expect(() => createUsageLogSink(createNarrativeConfig({ telemetrySink: "file" }))).toThrow(ConfigurationError);
  });
});
