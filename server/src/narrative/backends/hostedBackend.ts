/**
 * Hosted backend - one adapter over OpenAI and Anthropic.
 *
 * Claude model ids go to Anthropic, everything else to OpenAI, so callers
 * never branch on provider.
 */

import type { BackendAdapter } from "./backendAdapter";
import { BackendUnavailableError, GenerationError, describeError } from "../errors";
import type {
  BackendCallResult,
  BackendKind,
  GenerationParams,
  GenerationPrompt,
} from "../types";

export function isAnthropicModel(modelId: string): boolean {
  return modelId.toLowerCase().startsWith("claude");
}

export class HostedBackend implements BackendAdapter {
  readonly kind: BackendKind = "hosted";

  constructor(
    private readonly providers: {
      openai?: BackendAdapter;
      anthropic?: BackendAdapter;
    },
  ) {}

  async listAvailableModels(): Promise<string[]> {
    const entries = Object.entries(this.providers).filter(
      (entry): entry is [string, BackendAdapter] => entry[1] !== undefined,
    );
    if (entries.length === 0) {
      throw new BackendUnavailableError(
        "No LLM provider configured. Set OPENAI_API_KEY or ANTHROPIC_API_KEY in .env",
      );
    }

    const settled = await Promise.allSettled(entries.map(([, adapter]) => adapter.listAvailableModels()));
    const available: string[] = [];
    const failures: string[] = [];

    settled.forEach((result, index) => {
      const name = entries[index]?.[0] ?? "provider";
      if (result.status === "fulfilled") {
        available.push(...result.value);
      } else {
        failures.push(`${name}: ${describeError(result.reason)}`);
        console.warn(`[LLM] ${name} unavailable, continuing with remaining providers:`, describeError(result.reason));
      }
    });

    if (failures.length === entries.length) {
      throw new BackendUnavailableError(`All hosted providers unreachable (${failures.join("; ")})`);
    }
    return available;
  }

  async generate(modelId: string, prompt: GenerationPrompt, params: GenerationParams): Promise<BackendCallResult> {
    const adapter = isAnthropicModel(modelId) ? this.providers.anthropic : this.providers.openai;
    if (!adapter) {
      return {
        text: "",
        tokensIn: 0,
        tokensOut: 0,
        durationMs: 0,
        status: "error",
        errorMessage: new GenerationError(modelId, "no provider configured").message,
      };
    }
    return adapter.generate(modelId, prompt, params);
  }
}
