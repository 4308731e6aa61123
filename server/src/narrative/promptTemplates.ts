/**
 * Prompt templates and prompt assembly.
 *
 * Template content is inert data supplied by an external store; this module
 * only looks templates up by domain keyword and frames the domain text.
 */

import { promises as fs } from "fs";
import { z } from "zod";
import { ConfigurationError } from "./errors";
import type { GenerationPrompt } from "./types";

export interface PromptTemplate {
  id: string;
  keyword: string;
  name?: string;
  systemPrompt: string;
}

export interface TemplateStore {
  templateFor(domainKeyword: string): PromptTemplate | undefined;
  getTemplate(templateId: string): PromptTemplate | undefined;
}

/** "pro.sirf", "Pro-SIRF" and "prosirf" name the same domain. */
export function canonicalKeyword(keyword: string): string {
  return keyword.replace(/[^A-Za-z0-9]+/g, "").toLowerCase();
}

export class MemoryTemplateStore implements TemplateStore {
  private readonly byKeyword = new Map<string, PromptTemplate>();
  private readonly byId = new Map<string, PromptTemplate>();

  constructor(templates: PromptTemplate[] = []) {
    for (const template of templates) {
      this.add(template);
    }
  }

  add(template: PromptTemplate): void {
    if (this.byId.has(template.id)) {
      throw new ConfigurationError(`Duplicate prompt template id '${template.id}'`);
    }
    this.byId.set(template.id, template);
    this.byKeyword.set(canonicalKeyword(template.keyword), template);
  }

  templateFor(domainKeyword: string): PromptTemplate | undefined {
    return this.byKeyword.get(canonicalKeyword(domainKeyword));
  }

  getTemplate(templateId: string): PromptTemplate | undefined {
    return this.byId.get(templateId);
  }

  keywords(): string[] {
    return Array.from(this.byId.values(), (t) => t.keyword);
  }
}

const PromptTemplateFileZ = z.array(
  z.object({
    id: z.string().min(1),
    keyword: z.string().min(1),
    name: z.string().optional(),
    systemPrompt: z.string().min(1),
  }),
);

export class JsonTemplateStore extends MemoryTemplateStore {
  static async fromFile(filePath: string): Promise<JsonTemplateStore> {
    const raw = await fs.readFile(filePath, "utf-8");
    const parsed = PromptTemplateFileZ.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new ConfigurationError(
        `Prompt template file ${filePath} is invalid: ${parsed.error.issues.map((i) => i.message).join("; ")}`,
      );
    }
    return new JsonTemplateStore(parsed.data);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// PROMPT ASSEMBLY
// ═══════════════════════════════════════════════════════════════════════════════

/** Drop chain-of-thought scaffolding that some authored prompts carry. */
export function sanitizeSystemPrompt(text: string): string {
  return text
    .replace(/Before writing[\s\S]*?<summary>[\s\S]*?<\/summary>\s*/gi, "")
    .replace(/<neurocognitive_assessment_analysis>[\s\S]*?<\/neurocognitive_assessment_analysis>/gi, "")
    .trim();
}

export function buildPrompt(template: PromptTemplate, inputText: string): GenerationPrompt {
  const user = [
    "Use the following patient/domain text to produce a single-paragraph clinical summary.",
    "Avoid test names and raw/standard/T/scaled scores; use percentiles sparingly and only if extreme.",
    "",
    "=== TARGET DOMAIN TEXT BEGIN ===",
    inputText.trim(),
    "=== TARGET DOMAIN TEXT END ===",
  ].join("\n");

  return {
    system: sanitizeSystemPrompt(template.systemPrompt),
    user,
  };
}

/** Frame each dependency's narrative under its own heading for a synthesis task. */
export function composeSynthesisInput(
  ownInput: string,
  dependencies: Array<{ domainKey: string; text: string }>,
): string {
  const sections = dependencies.map((dep) => `## ${dep.domainKey}\n${dep.text.trim()}`);
  return [ownInput.trim(), ...sections].filter((part) => part.length > 0).join("\n\n");
}
