import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { fileURLToPath } from "url";
import { describe, expect, it } from "vitest";
import { ConfigurationError } from "./errors";
import {
  JsonTemplateStore,
  MemoryTemplateStore,
  buildPrompt,
  canonicalKeyword,
  composeSynthesisInput,
  sanitizeSystemPrompt,
} from "./promptTemplates";

const repoRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../..");

describe("template lookup", () => {
  it("canonicalizes keywords", () => {
    expect(canonicalKeyword("Pro.SIRF")).toBe("prosirf");
    expect(canonicalKeyword("pro-sirf")).toBe("prosirf");
  });

  it("finds templates by keyword variant and by id", () => {
    const store = new MemoryTemplateStore([{ id: "sirf-v1", keyword: "pro.sirf", systemPrompt: "Integrate." }]);

    expect(store.templateFor("prosirf")?.id).toBe("sirf-v1");
    expect(store.templateFor("PRO_SIRF")?.id).toBe("sirf-v1");
    expect(store.getTemplate("sirf-v1")?.keyword).toBe("pro.sirf");
    expect(store.templateFor("memory")).toBeUndefined();
  });

  it("rejects duplicate template ids", () => {
    const store = new MemoryTemplateStore([{ id: "memory-v1", keyword: "memory", systemPrompt: "A" }]);

    expect(() => store.add({ id: "memory-v1", keyword: "recall", systemPrompt: "B" })).toThrow(ConfigurationError);
  });

  it("loads the bundled template file", async () => {
    const store = await JsonTemplateStore.fromFile(path.join(repoRoot, "config", "prompt-templates.json"));

    expect(store.templateFor("memory")?.id).toBe("memory-v1");
    expect(store.templateFor("prosirf")?.id).toBe("sirf-v1");
  });

  it("rejects a template file that does not match the schema", async () => {
    const directory = await fs.mkdtemp(path.join(os.tmpdir(), "templates-"));
    const file = path.join(directory, "templates.json");
    await fs.writeFile(file, JSON.stringify([{ id: "x", keyword: "" }]), "utf-8");

    await expect(JsonTemplateStore.fromFile(file)).rejects.toBeInstanceOf(ConfigurationError);
    await fs.rm(directory, { recursive: true, force: true });
  });
});

describe("prompt assembly", () => {
  it("frames the domain text between markers", () => {
    const prompt = buildPrompt({ id: "memory-v1", keyword: "memory", systemPrompt: "  Summarize memory.  " }, "\nRecall was average.\n");

    expect(prompt.system).toBe("Summarize memory.");
    expect(prompt.user.split("\n").slice(-3)).toEqual([
      "=== TARGET DOMAIN TEXT BEGIN ===",
      "Recall was average.",
      "=== TARGET DOMAIN TEXT END ===",
    ]);
  });

  it("drops reasoning scaffolding from system prompts", () => {
    const text = "Write the summary.\nBefore writing, think inside <summary>scratch</summary>\nKeep it brief.";

    expect(sanitizeSystemPrompt(text)).toBe("Write the summary.\nKeep it brief.");
  });

  it("appends dependency narratives under their domain headings", () => {
    expect(
      composeSynthesisInput("Integrate.", [
        { domainKey: "memory", text: "Memory text.\n" },
        { domainKey: "verbal", text: "Verbal text." },
      ]),
    ).toBe("Integrate.\n\n## memory\nMemory text.\n\n## verbal\nVerbal text.");
    expect(composeSynthesisInput("", [{ domainKey: "memory", text: "Only." }])).toBe("## memory\nOnly.");
  });
});
