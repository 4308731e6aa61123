import type { NarrativeConfig } from "../config";
import { BackendUnavailableError } from "../errors";
import { AnthropicBackend } from "./anthropicBackend";
import type { BackendAdapter } from "./backendAdapter";
import { HostedBackend } from "./hostedBackend";
import { OpenAIBackend } from "./openaiBackend";

export type { BackendAdapter, CompletionPayload } from "./backendAdapter";
export { callWithTimeout, estimateTokens, promptText, stripThinkBlocks } from "./backendAdapter";
export { OpenAIBackend } from "./openaiBackend";
export { AnthropicBackend } from "./anthropicBackend";
export { HostedBackend, isAnthropicModel } from "./hostedBackend";

// Local OpenAI-compatible servers accept any key
const LOCAL_API_KEY = "ollama";

export function createBackend(config: NarrativeConfig): BackendAdapter {
  if (config.backendKind === "local") {
    return new OpenAIBackend({
      kind: "local",
      apiKey: LOCAL_API_KEY,
      baseURL: config.local.baseUrl,
    });
  }

  const { openaiApiKey, anthropicApiKey } = config.hosted;
  if (!openaiApiKey && !anthropicApiKey) {
    throw new BackendUnavailableError(
      "No LLM provider configured. Set OPENAI_API_KEY or ANTHROPIC_API_KEY in .env",
    );
  }

  return new HostedBackend({
    openai: openaiApiKey ? new OpenAIBackend({ kind: "hosted", apiKey: openaiApiKey }) : undefined,
    anthropic: anthropicApiKey ? new AnthropicBackend({ apiKey: anthropicApiKey }) : undefined,
  });
}
