import Anthropic from "@anthropic-ai/sdk";
import type { BackendAdapter } from "./backendAdapter";
import { callWithTimeout } from "./backendAdapter";
import { BackendUnavailableError, describeError } from "../errors";
import type {
  BackendCallResult,
  BackendKind,
  GenerationParams,
  GenerationPrompt,
} from "../types";

export interface AnthropicBackendOptions {
  apiKey: string;
  client?: Anthropic;
}

export class AnthropicBackend implements BackendAdapter {
  readonly kind: BackendKind = "hosted";
  private readonly client: Anthropic;

  constructor(options: AnthropicBackendOptions) {
    this.client = options.client ?? new Anthropic({ apiKey: options.apiKey, maxRetries: 0 });
  }

  async listAvailableModels(): Promise<string[]> {
    try {
      const ids: string[] = [];
      for await (const model of this.client.models.list()) {
        ids.push(model.id);
      }
      return ids;
    } catch (error) {
      throw new BackendUnavailableError(`Anthropic unreachable: ${describeError(error)}`);
    }
  }

  generate(modelId: string, prompt: GenerationPrompt, params: GenerationParams): Promise<BackendCallResult> {
    return callWithTimeout(modelId, params.timeoutMs, prompt, async (signal) => {
      const response = await this.client.messages.create(
        {
          model: modelId,
          max_tokens: params.maxOutputTokens,
          temperature: params.temperature,
          system: prompt.system,
          messages: [{ role: "user", content: prompt.user }],
        },
        { signal, maxRetries: 0 },
      );

      const textContent = response.content.find((block) => block.type === "text");
      return {
        text: textContent?.type === "text" ? textContent.text : "",
        tokensIn: response.usage.input_tokens,
        tokensOut: response.usage.output_tokens,
      };
    });
  }
}
