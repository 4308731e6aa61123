import { describe, expect, it, vi } from "vitest";
import { BackendUnavailableError, NoModelAvailableError } from "./errors";
import { ModelRegistry, matchesInstalledModel } from "./modelRegistry";
import { FakeBackend } from "./testSupport";
import type { ModelDescriptor } from "./types";

const DESCRIPTORS: ModelDescriptor[] = [
  { id: "qwen3:8b", tier: "domain", priority: 1, contextLimit: 8192 },
  { id: "gemma3:4b-it-qat", tier: "domain", priority: 0, contextLimit: 8192 },
  { id: "llama3:8b", tier: "domain", priority: 2, contextLimit: 8192 },
  { id: "gemma3:12b-it-qat", tier: "synthesis", priority: 0, contextLimit: 8192 },
  { id: "qwen3:14b", tier: "synthesis", priority: 1, contextLimit: 8192 },
];

describe("matchesInstalledModel", () => {
  it("matches exact ids, :latest tags and installed variants of a configured prefix", () => {
    expect(matchesInstalledModel("gemma3:4b-it-qat", ["gemma3:4b-it-qat"])).toBe(true);
    expect(matchesInstalledModel("gemma3", ["gemma3:latest"])).toBe(true);
    expect(matchesInstalledModel("qwen3:8b", ["QWEN3:8b-q4_K_M"])).toBe(true);
  });

  it("requires exact ids on hosted backends", () => {
    expect(matchesInstalledModel("gpt-4o", ["gpt-4o-mini"], "hosted")).toBe(false);
    expect(matchesInstalledModel("gpt-4o", ["gpt-4o-mini", "gpt-4o"], "hosted")).toBe(true);
    expect(matchesInstalledModel("gpt-4o", ["gpt-4o-mini"], "local")).toBe(true);
  });

  it("does not match unrelated models", () => {
    expect(matchesInstalledModel("llama3:8b", ["qwen3:8b", "llama3.2:3b"])).toBe(false);
  });
});

describe("ModelRegistry", () => {
  it("requires availability to be refreshed before selecting", () => {
    const registry = new ModelRegistry(DESCRIPTORS, new FakeBackend({ models: [] }));

    expect(() => registry.availableCandidates("domain")).toThrow(
      "[ModelRegistry] refreshAvailability() must run before selecting models",
    );
  });

  it("filters to reachable models in configured priority order", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const backend = new FakeBackend({ models: ["llama3:8b-instruct-q4_K_M", "gemma3:4b-it-qat", "qwen3:14b"] });
    const registry = new ModelRegistry(DESCRIPTORS, backend);

    await registry.refreshAvailability();

    expect(registry.availableCandidates("domain").map((d) => d.id)).toEqual(["gemma3:4b-it-qat", "llama3:8b"]);
    expect(registry.selectBest("synthesis").id).toBe("qwen3:14b");
    expect(registry.configured("domain").map((d) => d.priority)).toEqual([0, 1, 2]);
    vi.restoreAllMocks();
  });

  it("does not treat a longer hosted id as the configured one", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const hostedTiers: ModelDescriptor[] = [
      { id: "gpt-4o", tier: "synthesis", priority: 0, contextLimit: 128000 },
      { id: "gpt-4o-mini", tier: "synthesis", priority: 1, contextLimit: 128000 },
    ];
    const registry = new ModelRegistry(hostedTiers, new FakeBackend({ kind: "hosted", models: ["gpt-4o-mini"] }));
    await registry.refreshAvailability();

    expect(registry.availableCandidates("synthesis").map((d) => d.id)).toEqual(["gpt-4o-mini"]);
    vi.restoreAllMocks();
  });

  it("throws NoModelAvailableError naming the configured candidates", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const registry = new ModelRegistry(DESCRIPTORS, new FakeBackend({ models: ["mistral:7b"] }));
    await registry.refreshAvailability();

    let caught: unknown;
    try {
      registry.selectBest("synthesis");
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(NoModelAvailableError);
    if (caught instanceof NoModelAvailableError) {
      expect(caught.tier).toBe("synthesis");
      expect(caught.message).toBe("No synthesis model available. Install one of: gemma3:12b-it-qat, qwen3:14b");
    }
    expect(() => registry.selectBest("large")).toThrow("No large models configured");
    vi.restoreAllMocks();
  });

  it("propagates BackendUnavailableError from the backend", async () => {
    const registry = new ModelRegistry(DESCRIPTORS, new FakeBackend({ models: [], unavailable: true }));

    await expect(registry.refreshAvailability()).rejects.toBeInstanceOf(BackendUnavailableError);
  });
});
