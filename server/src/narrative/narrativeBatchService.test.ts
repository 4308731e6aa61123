/**
 * Narrative Batch Service Tests
 *
 * Whole-batch runs through the real validator, cache and usage log with a
 * scripted backend.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createNarrativeConfig } from "./config";
import { BackendUnavailableError, ConfigurationError } from "./errors";
import { MemoryNarrativeCache } from "./narrativeCache";
import { NarrativeBatchService, runNarrativeBatch, type DomainNarrativeInput } from "./narrativeBatchService";
import { MemoryOutputSlot } from "./outputSlots";
import { MemoryTemplateStore } from "./promptTemplates";
import { CLINICAL_PARAGRAPH, FakeBackend, reply } from "./testSupport";
import type { TaskTransition, UsageLogRecord } from "./types";
import type { UsageLogSink } from "./usageLog";

const CONFIG = createNarrativeConfig({
  models: { domain: ["model-a", "model-b"], synthesis: ["model-s"], large: [] },
  workerCount: 2,
});

const TEMPLATES = new MemoryTemplateStore([
  { id: "memory-v1", keyword: "memory", systemPrompt: "Summarize memory." },
  { id: "verbal-v1", keyword: "verbal", systemPrompt: "Summarize language." },
  { id: "sirf-v1", keyword: "pro.sirf", systemPrompt: "Integrate the domains." },
]);

const MEMORY: DomainNarrativeInput = { domainKey: "memory", inputText: "Recall and recognition were average." };
const VERBAL: DomainNarrativeInput = { domainKey: "verbal", inputText: "Naming and fluency were low average." };
const SYNTHESIS: DomainNarrativeInput = {
  domainKey: "pro.sirf",
  taskId: "sirf",
  inputText: "Overall impression.",
  tier: "synthesis",
  dependsOn: ["memory", "verbal"],
};
const INPUTS = [MEMORY, VERBAL, SYNTHESIS];

class RecordingSink implements UsageLogSink {
  readonly name = "recording";
  readonly writes: Array<{ records: number; transitions: number }> = [];

  async write(records: readonly UsageLogRecord[], transitions: readonly TaskTransition[]): Promise<void> {
    this.writes.push({ records: records.length, transitions: transitions.length });
  }
}

describe("NarrativeBatchService", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("runs domain tasks, then the synthesis task over their narratives", async () => {
    const backend = new FakeBackend({ models: ["model-a", "model-b", "model-s"], fallback: reply.ok(CLINICAL_PARAGRAPH) });
    const outputSlot = new MemoryOutputSlot();
    const sink = new RecordingSink();
    const service = new NarrativeBatchService(CONFIG, { templateStore: TEMPLATES, backend, outputSlot, sink });

    const { report, usageLog } = await service.runBatch(INPUTS);

    expect(report.counts).toEqual({ total: 3, accepted: 3, exhausted: 0, failed: 0, skipped: 0 });
    expect(backend.calls.map((c) => c.modelId)).toEqual(["model-a", "model-a", "model-s"]);
    expect(backend.calls[2]?.prompt.system).toBe("Integrate the domains.");
    expect(backend.calls[2]?.prompt.user).toContain(`## memory\n${CLINICAL_PARAGRAPH}\n\n## verbal\n${CLINICAL_PARAGRAPH}`);
    expect(backend.calls[2]?.params.temperature).toBe(0.35);
    expect(outputSlot.all().map((o) => o.domainKey).sort()).toEqual(["memory", "pro.sirf", "verbal"]);

    expect(usageLog.closed).toBe(true);
    expect(usageLog.length).toBe(3);
    expect(sink.writes).toEqual([{ records: 3, transitions: usageLog.listTransitions().length }]);
    expect(service.getRun(report.batchId)?.report).toBe(report);
    expect(service.listRuns()).toEqual([report]);
  });

  it("serves a repeated batch from the cache", async () => {
    const backend = new FakeBackend({ models: ["model-a", "model-b", "model-s"], fallback: reply.ok(CLINICAL_PARAGRAPH) });
    const service = new NarrativeBatchService(CONFIG, {
      templateStore: TEMPLATES,
      backend,
      cache: new MemoryNarrativeCache(),
      sink: null,
    });
    const domainOnly = [MEMORY, VERBAL];

    await service.runBatch(domainOnly);
    const second = await service.runBatch(domainOnly);

    expect(backend.calls).toHaveLength(2);
    expect(second.usageLog.length).toBe(0);
    expect(
      second.report.outcomes.map((o) => (o.status === "accepted" ? o.result.source : o.status)),
    ).toEqual(["cache", "cache"]);
  });

  it("keeps a rejected narrative as low confidence and still runs dependents", async () => {
    const backend = new FakeBackend({
      models: ["model-a", "model-s"],
      replies: { "model-a": [reply.ok("Too short."), reply.ok("Too short.")] },
      fallback: reply.ok(CLINICAL_PARAGRAPH),
    });

    const { report } = await runNarrativeBatch(
      CONFIG,
      [MEMORY, { ...SYNTHESIS, dependsOn: ["memory"] }],
      { templateStore: TEMPLATES, backend, sink: null },
    );

    expect(report.counts).toMatchObject({ exhausted: 1, accepted: 1 });
    const memory = report.outcomes.find((o) => o.taskId === "memory");
    expect(memory?.status).toBe("exhausted");
    if (memory?.status === "exhausted") {
      expect(memory.result.text).toBe("Too short.");
      expect(memory.attempts).toHaveLength(2);
      expect(memory.result.lowConfidence).toBe(true);
    }
  });

  it("aborts when the backend is unreachable and still closes the log", async () => {
    const sink = new RecordingSink();
    const service = new NarrativeBatchService(CONFIG, {
      templateStore: TEMPLATES,
      backend: new FakeBackend({ models: [], unavailable: true }),
      sink,
    });

    await expect(service.runBatch(INPUTS)).rejects.toBeInstanceOf(BackendUnavailableError);
    expect(sink.writes).toEqual([{ records: 0, transitions: 0 }]);
    expect(service.listRuns()).toEqual([]);
  });

  it("rejects a domain without a prompt template", () => {
    const service = new NarrativeBatchService(CONFIG, { templateStore: TEMPLATES, backend: new FakeBackend({ models: [] }) });

    expect(() => service.buildTasks([{ domainKey: "motor", inputText: "Fine motor speed was slow." }])).toThrow(
      new ConfigurationError("No prompt template for domain 'motor'"),
    );
  });

  it("builds tasks with tier settings and template ids", () => {
    const service = new NarrativeBatchService(CONFIG, { templateStore: TEMPLATES, backend: new FakeBackend({ models: [] }) });

    expect(service.buildTasks([SYNTHESIS])).toEqual([
      {
        taskId: "sirf",
        domainKey: "pro.sirf",
        inputText: "Overall impression.",
        tier: "synthesis",
        templateId: "sirf-v1",
        temperature: 0.35,
        maxOutputTokens: 1024,
        dependsOn: ["memory", "verbal"],
      },
    ]);
  });

  it("reports backend health", async () => {
    const healthy = new NarrativeBatchService(CONFIG, {
      templateStore: TEMPLATES,
      backend: new FakeBackend({ models: ["model-a"] }),
    });
    const offline = new NarrativeBatchService(CONFIG, {
      templateStore: TEMPLATES,
      backend: new FakeBackend({ models: [], unavailable: true }),
    });

    expect(await healthy.health()).toEqual({ backendKind: "local", reachable: true, models: ["model-a"] });
    expect(await offline.health()).toEqual({
      backendKind: "local",
      reachable: false,
      models: [],
      error: "fake backend offline",
    });
  });
});
