/**
 * Narrative Cache - content-addressed store of accepted narratives
 *
 * Keys are derived from (normalized input text, model id, template id,
 * temperature). Entries are insert-if-absent: the first accepted result for a
 * key stays authoritative and is never overwritten. There is no expiry.
 */

import { createHash, randomUUID } from "crypto";
import { promises as fs } from "fs";
import path from "path";
import { z } from "zod";
import { CacheCorruptionError, describeError } from "./errors";
import type { CacheEntry } from "./types";

// ═══════════════════════════════════════════════════════════════════════════════
// KEYS
// ═══════════════════════════════════════════════════════════════════════════════

export interface CacheKeyInput {
  inputText: string;
  modelId: string;
  templateId: string;
  temperature: number;
}

export function normalizeInputText(text: string): string {
  return text
    .replace(/\r\n?/g, "\n")
    .split("\n")
    .map((line) => line.trimEnd())
    .join("\n")
    .trim();
}

function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(",")}]`;
  }
  if (value && typeof value === "object") {
    const body = Object.entries(value)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([key, val]) => `${JSON.stringify(key)}:${stableStringify(val)}`)
      .join(",");
    return `{${body}}`;
  }
  return JSON.stringify(value);
}

export function cacheKeyFor(input: CacheKeyInput): string {
  const canonical = stableStringify({
    inputText: normalizeInputText(input.inputText),
    modelId: input.modelId,
    templateId: input.templateId,
    temperature: input.temperature,
  });
  return createHash("sha256").update(canonical).digest("hex");
}

// ═══════════════════════════════════════════════════════════════════════════════
// STORES
// ═══════════════════════════════════════════════════════════════════════════════

export interface NarrativeCache {
  get(key: string): Promise<CacheEntry | undefined>;
  /** true when this call wrote the entry, false when one already existed */
  putIfAbsent(key: string, entry: CacheEntry): Promise<boolean>;
}

export class MemoryNarrativeCache implements NarrativeCache {
  private readonly entries = new Map<string, CacheEntry>();

  async get(key: string): Promise<CacheEntry | undefined> {
    return this.entries.get(key);
  }

  async putIfAbsent(key: string, entry: CacheEntry): Promise<boolean> {
    if (this.entries.has(key)) return false;
    this.entries.set(key, entry);
    return true;
  }

  get size(): number {
    return this.entries.size;
  }
}

const ValidationResultZ = z.object({
  attemptId: z.string(),
  score: z.number().min(0).max(100),
  issues: z.array(z.string()),
  warnings: z.array(z.string()),
  passed: z.boolean(),
  metrics: z.object({
    length: z.number(),
    percentileMentions: z.number(),
    scoreMentions: z.number(),
    testNameMentions: z.number(),
    clinicalTerms: z.number(),
    sentences: z.number(),
    meanWordsPerSentence: z.number(),
  }),
});

export const CacheEntryZ = z.object({
  key: z.string().min(1),
  text: z.string(),
  modelId: z.string().min(1),
  templateId: z.string().min(1),
  validation: ValidationResultZ,
  createdAt: z.string(),
});

function hasErrorCode(error: unknown, code: string): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === code;
}

/**
 * One JSON file per key under the cache directory. A complete temp file is
 * hard-linked into place, so a second writer (in this process or another)
 * gets EEXIST and loses, and readers never see a partial entry.
 */
export class FileNarrativeCache implements NarrativeCache {
  private readonly writes = new Map<string, Promise<boolean>>();

  constructor(readonly directory: string) {}

  private entryPath(key: string): string {
    return path.join(this.directory, `${key}.json`);
  }

  async get(key: string): Promise<CacheEntry | undefined> {
    const file = this.entryPath(key);
    let raw: string;
    try {
      raw = await fs.readFile(file, "utf-8");
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) return undefined;
      return this.quarantine(key, file, describeError(error));
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      return this.quarantine(key, file, describeError(error));
    }

    const result = CacheEntryZ.safeParse(parsed);
    if (!result.success || result.data.key !== key) {
      const detail = result.success ? "key mismatch" : result.error.issues[0]?.message ?? "schema mismatch";
      return this.quarantine(key, file, detail);
    }
    return result.data;
  }

  async putIfAbsent(key: string, entry: CacheEntry): Promise<boolean> {
    const previous = this.writes.get(key) ?? Promise.resolve(false);
    const write = previous.then(
      () => this.linkEntry(key, entry),
      () => this.linkEntry(key, entry),
    );
    this.writes.set(key, write);
    try {
      return await write;
    } finally {
      if (this.writes.get(key) === write) {
        this.writes.delete(key);
      }
    }
  }

  private async linkEntry(key: string, entry: CacheEntry): Promise<boolean> {
    await fs.mkdir(this.directory, { recursive: true });
    const target = this.entryPath(key);
    const temp = `${target}.${randomUUID()}.tmp`;

    await fs.writeFile(temp, JSON.stringify(entry, null, 2), "utf-8");
    try {
      await fs.link(temp, target);
      return true;
    } catch (error) {
      if (hasErrorCode(error, "EEXIST")) return false;
      throw error;
    } finally {
      await fs.rm(temp, { force: true });
    }
  }

  /** Move an unreadable entry aside so the key can be regenerated. */
  private async quarantine(key: string, file: string, detail: string): Promise<undefined> {
    const corruption = new CacheCorruptionError(key, detail);
    console.warn(`[NarrativeCache] ${corruption.message} - treating as miss`);
    try {
      await fs.rename(file, `${file}.corrupt-${Date.now()}`);
    } catch (error) {
      if (!hasErrorCode(error, "ENOENT")) {
        console.warn(`[NarrativeCache] Could not move corrupt entry ${key} aside:`, describeError(error));
      }
    }
    return undefined;
  }
}

export function createNarrativeCache(cacheLocation: string | null): NarrativeCache {
  return cacheLocation ? new FileNarrativeCache(cacheLocation) : new MemoryNarrativeCache();
}
