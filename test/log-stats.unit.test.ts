import { describe, expect, it } from "vitest";

import { computeLogStats, usageTotals } from "../src/log/stats.js";

describe("computeLogStats", () => {
  it("sums tokens and OpenRouter costs over every line, per model", () => {
    const stats = computeLogStats([
      {
        uuid: "u1",
        model: "a",
        status: "ok",
        usage: {
          prompt_tokens: 100,
          completion_tokens: 10,
          total_tokens: 110,
          cost: 0.0012345674,
          cost_details: {
            upstream_inference_prompt_cost: 0.001,
            upstream_inference_completions_cost: 0.0002345674,
          },
        },
      },
      { uuid: "u2", model: "a", status: "error", usage: null },
      { model: "b", status: "ok", usage: { prompt_tokens: 5, completion_tokens: 5, total_tokens: 10, cost: 0.5 } },
      { status: "ok" },
      "not a record",
    ]);

    expect(stats).toMatchObject({
      totalRequests: 4,
      okCount: 3,
      errorCount: 1,
      promptTokens: 105,
      completionTokens: 15,
      totalTokens: 120,
      promptCost: 0.001,
      completionCost: 0.000235,
      totalCost: 0.501235,
    });
    expect(stats.byModel.a).toEqual({
      requests: 2,
      okCount: 1,
      errorCount: 1,
      promptTokens: 100,
      completionTokens: 10,
      totalTokens: 110,
      promptCost: 0.001,
      completionCost: 0.000235,
      totalCost: 0.001235,
    });
    expect(Object.keys(stats.byModel)).toEqual(["a", "b", "unknown"]);
    expect(stats.byModel.unknown?.requests).toBe(1);
  });

  it("treats missing or non-numeric usage fields as zero", () => {
    expect(usageTotals({ prompt_tokens: "12", cost_details: "n/a" })).toEqual({
      promptTokens: 0,
      completionTokens: 0,
      totalTokens: 0,
      promptCost: 0,
      completionCost: 0,
      totalCost: 0,
    });
  });
});
