import OpenAI from "openai";
import { MockAgent } from "undici";
import { afterEach, describe, expect, it } from "vitest";

import { createOpenRouterFetch } from "../src/openrouter/client.js";
import { createCompletionSubmitter } from "../src/openrouter/completion.js";

describe("OpenRouter completions", () => {
  const agent = new MockAgent();
  agent.disableNetConnect();

  afterEach(() => {
    agent.assertNoPendingInterceptors();
  });

  it("sends requests through the supplied undici dispatcher", async () => {
    agent
      .get("https://openrouter.test")
      .intercept({ path: "/api/v1/chat/completions", method: "POST" })
      .reply(
        200,
        {
          id: "gen-1",
          object: "chat.completion",
          created: 1_700_000_000,
          model: "openai/gpt-4o-2024-11-20",
          choices: [
            {
              index: 0,
              finish_reason: "stop",
              message: { role: "assistant", content: "<window>arma virumque cano</window>" },
            },
          ],
          usage: { prompt_tokens: 10, completion_tokens: 4, total_tokens: 14, cost: 0.0001 },
        },
        { headers: { "content-type": "application/json" } },
      );

    const client = new OpenAI({
      apiKey: "test-secret",
      baseURL: "https://openrouter.test/api/v1",
      maxRetries: 0,
      fetch: createOpenRouterFetch(agent),
    });
    const submit = createCompletionSubmitter({ model: "openai/gpt-4o", temperature: 0, client });

    const result = await submit("Find the quotation.", { signal: new AbortController().signal });

    expect(result).toEqual({
      text: "<window>arma virumque cano</window>",
      usage: { prompt_tokens: 10, completion_tokens: 4, total_tokens: 14, cost: 0.0001 },
      id: "gen-1",
      created: 1_700_000_000,
      apiModel: "openai/gpt-4o-2024-11-20",
    });
  });
});
