/**
 * OpenAI-compatible chat completions backend.
 *
 * Serves hosted OpenAI models and, through baseURL, local inference servers
 * that expose the same API (Ollama at http://localhost:11434/v1).
 */

import OpenAI from "openai";
import type { BackendAdapter } from "./backendAdapter";
import { callWithTimeout } from "./backendAdapter";
import { BackendUnavailableError, describeError } from "../errors";
import type {
  BackendCallResult,
  BackendKind,
  GenerationParams,
  GenerationPrompt,
} from "../types";

export interface OpenAIBackendOptions {
  kind: BackendKind;
  apiKey: string;
  baseURL?: string;
  /** Pre-built client, mainly for tests */
  client?: OpenAI;
}

export class OpenAIBackend implements BackendAdapter {
  readonly kind: BackendKind;
  private readonly client: OpenAI;
  private readonly label: string;

  constructor(options: OpenAIBackendOptions) {
    this.kind = options.kind;
    // Retries belong to the orchestrator, never to the SDK
    this.client = options.client ?? new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      maxRetries: 0,
    });
    this.label = options.baseURL ? `OpenAI-compatible (${options.baseURL})` : "OpenAI";
  }

  async listAvailableModels(): Promise<string[]> {
    try {
      const ids: string[] = [];
      for await (const model of this.client.models.list()) {
        ids.push(model.id);
      }
      return ids;
    } catch (error) {
      throw new BackendUnavailableError(`${this.label} unreachable: ${describeError(error)}`);
    }
  }

  generate(modelId: string, prompt: GenerationPrompt, params: GenerationParams): Promise<BackendCallResult> {
    return callWithTimeout(modelId, params.timeoutMs, prompt, async (signal) => {
      const response = await this.client.chat.completions.create(
        {
          model: modelId,
          messages: [
            { role: "system", content: prompt.system },
            { role: "user", content: prompt.user },
          ],
          temperature: params.temperature,
          max_tokens: params.maxOutputTokens,
        },
        { signal, maxRetries: 0 },
      );

      const choice = response.choices[0];
      return {
        text: choice?.message.content ?? "",
        tokensIn: response.usage?.prompt_tokens,
        tokensOut: response.usage?.completion_tokens,
      };
    });
  }
}
