/**
 * Backend Adapter - uniform call interface over text-generation services
 *
 * Adapters never throw for a failed generation: every call resolves to a
 * BackendCallResult whose status separates success, backend error and
 * timeout. Only listAvailableModels() throws, and only BackendUnavailableError.
 */

import type {
  BackendCallResult,
  BackendKind,
  GenerationParams,
  GenerationPrompt,
} from "../types";
import { GenerationError, GenerationTimeout, describeError } from "../errors";

export interface BackendAdapter {
  readonly kind: BackendKind;
  /** Model ids the backend can serve right now. */
  listAvailableModels(): Promise<string[]>;
  generate(modelId: string, prompt: GenerationPrompt, params: GenerationParams): Promise<BackendCallResult>;
}

export interface CompletionPayload {
  text: string;
  tokensIn?: number;
  tokensOut?: number;
}

/** GPT-style rough estimate (~4 chars per token). */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

/** Local reasoning models wrap their scratchpad in <think> tags. */
export function stripThinkBlocks(text: string): string {
  return text.replace(/<think>[\s\S]*?<\/think>/gi, "").trim();
}

export function promptText(prompt: GenerationPrompt): string {
  return `${prompt.system}\n\n${prompt.user}`;
}

/**
 * Run one provider request under a hard timeout. The request is aborted when
 * the timer fires and the result reports "timeout" rather than "error".
 */
export async function callWithTimeout(
  modelId: string,
  timeoutMs: number,
  prompt: GenerationPrompt,
  request: (signal: AbortSignal) => Promise<CompletionPayload>,
): Promise<BackendCallResult> {
  const controller = new AbortController();
  const startedAt = Date.now();
  const tokensIn = estimateTokens(promptText(prompt));
  let timer: ReturnType<typeof setTimeout> | undefined;

  const expired = new Promise<"timeout">((resolve) => {
    timer = setTimeout(() => {
      controller.abort();
      resolve("timeout");
    }, timeoutMs);
  });

  try {
    const outcome = await Promise.race([request(controller.signal), expired]);
    if (outcome === "timeout") {
      return {
        text: "",
        tokensIn,
        tokensOut: 0,
        durationMs: Date.now() - startedAt,
        status: "timeout",
        errorMessage: new GenerationTimeout(modelId, timeoutMs).message,
      };
    }

    const text = stripThinkBlocks(outcome.text);
    return {
      text,
      tokensIn: outcome.tokensIn ?? tokensIn,
      tokensOut: outcome.tokensOut ?? estimateTokens(text),
      durationMs: Date.now() - startedAt,
      status: "success",
    };
  } catch (error) {
    const timedOut = controller.signal.aborted;
    return {
      text: "",
      tokensIn,
      tokensOut: 0,
      durationMs: Date.now() - startedAt,
      status: timedOut ? "timeout" : "error",
      errorMessage: timedOut
        ? new GenerationTimeout(modelId, timeoutMs).message
        : new GenerationError(modelId, describeError(error)).message,
    };
  } finally {
    clearTimeout(timer);
  }
}
