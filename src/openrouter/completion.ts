import type OpenAI from "openai";

import type { UsagePayload } from "../log/resultRecord.js";
import { getOpenRouterClient } from "./client.js";

export type CompletionResult = {
  readonly text: string | null;
  readonly usage: UsagePayload | null;
  readonly id: string | null;
  readonly created: number | null;
  /** Model id reported by the provider, which may differ from the requested alias. */
  readonly apiModel: string | null;
};

export type SubmitCompletion = (
  prompt: string,
  options: { readonly signal: AbortSignal },
) => Promise<CompletionResult>;

export type CompletionSubmitterOptions = {
  readonly model: string;
  readonly temperature: number;
  readonly maxTokens?: number;
  readonly client?: OpenAI;
};

/**
 * Single-message chat completion. Errors propagate untouched so the caller's
 * retry policy sees them.
 */
export function createCompletionSubmitter(options: CompletionSubmitterOptions): SubmitCompletion {
  return async (prompt, { signal }) => {
    const client = options.client ?? getOpenRouterClient();
    const response = await client.chat.completions.create(
      {
        model: options.model,
        messages: [{ role: "user", content: prompt }],
        temperature: options.temperature,
        ...(options.maxTokens !== undefined ? { max_tokens: options.maxTokens } : {}),
      },
      { signal },
    );
    const choice = response.choices[0];
    return {
      text: choice?.message.content ?? null,
      usage: response.usage ? Object.fromEntries(Object.entries(response.usage)) : null,
      id: response.id || null,
      created: typeof response.created === "number" ? response.created : null,
      apiModel: response.model || null,
    };
  };
}
