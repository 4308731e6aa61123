/**
 * Model Registry & Selector
 *
 * Holds the configured per-tier candidate lists and filters them to what the
 * backend can currently serve, keeping configured priority order.
 */

import type { BackendAdapter } from "./backends";
import { NoModelAvailableError } from "./errors";
import type { BackendKind, ModelDescriptor, ModelTier } from "./types";

function baseName(modelId: string): string {
  return modelId.replace(/:latest$/i, "").toLowerCase();
}

/**
 * Local servers list tags such as "qwen3:8b-q4_K_M" or "gemma3:latest"; there
 * a configured id matches an installed one it equals or prefixes. Hosted ids
 * must match exactly ("gpt-4o" is not "gpt-4o-mini").
 */
export function matchesInstalledModel(
  configuredId: string,
  installedIds: Iterable<string>,
  kind: BackendKind = "local",
): boolean {
  const wanted = baseName(configuredId);
  for (const installed of installedIds) {
    const candidate = baseName(installed);
    if (candidate === wanted || (kind === "local" && candidate.startsWith(wanted))) {
      return true;
    }
  }
  return false;
}

export class ModelRegistry {
  private readonly descriptors: readonly ModelDescriptor[];
  private installed: string[] | null = null;

  constructor(
    descriptors: ModelDescriptor[],
    private readonly backend: BackendAdapter,
  ) {
    this.descriptors = [...descriptors].sort((a, b) => a.priority - b.priority);
  }

  /**
   * Ask the backend what it serves. Throws BackendUnavailableError when the
   * backend cannot be reached at all.
   */
  async refreshAvailability(): Promise<string[]> {
    this.installed = await this.backend.listAvailableModels();
    console.log(`[ModelRegistry] ${this.installed.length} model(s) reachable on ${this.backend.kind} backend`);
    return this.installed;
  }

  configured(tier: ModelTier): ModelDescriptor[] {
    return this.descriptors.filter((d) => d.tier === tier);
  }

  availableCandidates(tier: ModelTier): ModelDescriptor[] {
    const installed = this.installed;
    if (installed === null) {
      throw new Error("[ModelRegistry] refreshAvailability() must run before selecting models");
    }
    return this.configured(tier).filter((d) => matchesInstalledModel(d.id, installed, this.backend.kind));
  }

  selectBest(tier: ModelTier): ModelDescriptor {
    const [best] = this.availableCandidates(tier);
    if (!best) {
      throw new NoModelAvailableError(tier, this.configured(tier).map((d) => d.id));
    }
    return best;
  }
}
