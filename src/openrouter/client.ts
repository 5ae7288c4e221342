import OpenAI from "openai";
import { Agent, fetch as undiciFetch, type Dispatcher } from "undici";

import { loadLocalEnv, readPositiveNumberEnv, requireEnv, type EnvSource } from "../utils/env.js";

const DEFAULT_OPENROUTER_BASE_URL = "https://openrouter.ai/api/v1";
const DEFAULT_OPENROUTER_TIMEOUT_MS = 15 * 60_000;

let cachedClient: OpenAI | null = null;
let cachedFetch: typeof fetch | null = null;

export type OpenRouterClientConfig = {
  readonly apiKey: string;
  readonly baseUrl: string;
  readonly timeoutMs: number;
};

/**
 * Reads `OPENROUTER_API_KEY`, `OPENROUTER_BASE_URL` and `OPENROUTER_TIMEOUT_MS`
 * from `env` (the process environment plus `.env.local` by default).
 */
export function resolveOpenRouterConfig(env: EnvSource = process.env): OpenRouterClientConfig {
  loadLocalEnv();
  const baseUrl = env.OPENROUTER_BASE_URL?.trim();
  return {
    apiKey: requireEnv("OPENROUTER_API_KEY", "Create a key at https://openrouter.ai/keys.", env),
    baseUrl: baseUrl && baseUrl.length > 0 ? baseUrl : DEFAULT_OPENROUTER_BASE_URL,
    timeoutMs: readPositiveNumberEnv("OPENROUTER_TIMEOUT_MS", env) ?? DEFAULT_OPENROUTER_TIMEOUT_MS,
  };
}

/** Routes SDK requests through undici's fetch with the given dispatcher. */
export function createOpenRouterFetch(dispatcher: Dispatcher): typeof fetch {
  return ((input: Parameters<typeof undiciFetch>[0], init?: Parameters<typeof undiciFetch>[1]) => {
    return undiciFetch(input, {
      ...(init ?? {}),
      dispatcher,
    });
  }) as unknown as typeof fetch;
}

function getOpenRouterFetch(timeoutMs: number): typeof fetch {
  cachedFetch ??= createOpenRouterFetch(
    new Agent({
      bodyTimeout: timeoutMs,
      headersTimeout: timeoutMs,
    }),
  );
  return cachedFetch;
}

/**
 * Shared OpenRouter client. SDK retries are disabled: the executor owns the
 * retry policy and the per-attempt timeout.
 */
export function getOpenRouterClient(config: OpenRouterClientConfig = resolveOpenRouterConfig()): OpenAI {
  if (cachedClient) {
    return cachedClient;
  }
  cachedClient = new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseUrl,
    timeout: config.timeoutMs,
    maxRetries: 0,
    fetch: getOpenRouterFetch(config.timeoutMs),
  });
  return cachedClient;
}
