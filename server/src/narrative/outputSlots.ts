/**
 * Output slots receive the final narrative for each domain. Document assembly
 * reads them later; nothing here renders anything.
 */

import { promises as fs } from "fs";
import path from "path";
import { randomUUID } from "crypto";

export interface NarrativeOutput {
  taskId: string;
  domainKey: string;
  text: string;
  modelId: string;
  qualityScore: number;
  lowConfidence: boolean;
  generatedAt: string;
}

export interface OutputSlot {
  write(output: NarrativeOutput): Promise<void>;
}

export class MemoryOutputSlot implements OutputSlot {
  private readonly outputs = new Map<string, NarrativeOutput>();

  async write(output: NarrativeOutput): Promise<void> {
    this.outputs.set(output.domainKey, output);
  }

  get(domainKey: string): NarrativeOutput | undefined {
    return this.outputs.get(domainKey);
  }

  all(): NarrativeOutput[] {
    return Array.from(this.outputs.values());
  }
}

export function provenanceComment(output: NarrativeOutput): string {
  const flags = output.lowConfidence ? " | Low confidence" : "";
  return `<!-- Generated: ${output.generatedAt} | Model: ${output.modelId} | Quality: ${output.qualityScore}${flags} -->`;
}

/**
 * Replace the document's <summary> block (or an empty <summary/> marker) with
 * the given content; prepend a new block when the document has neither.
 */
export function injectSummaryBlock(document: string, content: string): string {
  const block = `<summary>\n\n${content}\n\n</summary>`;

  if (/<summary>[\s\S]*?<\/summary>/i.test(document)) {
    return document.replace(/<summary>[\s\S]*?<\/summary>/i, () => block);
  }
  if (/<summary\s*\/>/i.test(document)) {
    return document.replace(/<summary\s*\/>/i, () => block);
  }
  return `${block}\n\n${document}`;
}

async function readIfExists(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT") {
      return "";
    }
    throw error;
  }
}

/**
 * Writes each narrative into the <summary> block of the domain's target
 * document, with a provenance comment above the text.
 */
export class SummaryBlockOutputSlot implements OutputSlot {
  constructor(private readonly targetFor: (domainKey: string) => string | undefined) {}

  async write(output: NarrativeOutput): Promise<void> {
    const target = this.targetFor(output.domainKey);
    if (!target) {
      console.warn(`[OutputSlot] No target document for domain '${output.domainKey}', narrative not written`);
      return;
    }

    const existing = await readIfExists(target);
    const updated = injectSummaryBlock(existing, `${provenanceComment(output)}\n\n${output.text}`);

    await fs.mkdir(path.dirname(target), { recursive: true });
    const temp = `${target}.${randomUUID()}.tmp`;
    await fs.writeFile(temp, updated, "utf-8");
    await fs.rename(temp, target);
  }
}
