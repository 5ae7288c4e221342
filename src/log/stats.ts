import { statsRecordSchema, type UsagePayload } from "./resultRecord.js";

export type UsageTotals = {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  promptCost: number;
  completionCost: number;
  totalCost: number;
};

export type ModelLogStats = UsageTotals & {
  requests: number;
  okCount: number;
  errorCount: number;
};

export type LogStats = UsageTotals & {
  totalRequests: number;
  okCount: number;
  errorCount: number;
  byModel: Record<string, ModelLogStats>;
};

function emptyTotals(): UsageTotals {
  return {
    promptTokens: 0,
    completionTokens: 0,
    totalTokens: 0,
    promptCost: 0,
    completionCost: 0,
    totalCost: 0,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function numberAt(source: Readonly<Record<string, unknown>> | null | undefined, key: string): number {
  const value = source?.[key];
  return typeof value === "number" && Number.isFinite(value) ? value : 0;
}

/**
 * Token counts from the OpenAI-style usage block; costs from OpenRouter's
 * `cost` and `cost_details.upstream_inference_*_cost` fields.
 */
export function usageTotals(usage: UsagePayload | null): UsageTotals {
  const details = usage?.cost_details;
  const costDetails = isRecord(details) ? details : null;
  return {
    promptTokens: numberAt(usage, "prompt_tokens"),
    completionTokens: numberAt(usage, "completion_tokens"),
    totalTokens: numberAt(usage, "total_tokens"),
    promptCost: numberAt(costDetails, "upstream_inference_prompt_cost"),
    completionCost: numberAt(costDetails, "upstream_inference_completions_cost"),
    totalCost: numberAt(usage, "cost"),
  };
}

function addTotals(target: UsageTotals, delta: UsageTotals): void {
  target.promptTokens += delta.promptTokens;
  target.completionTokens += delta.completionTokens;
  target.totalTokens += delta.totalTokens;
  target.promptCost += delta.promptCost;
  target.completionCost += delta.completionCost;
  target.totalCost += delta.totalCost;
}

export function roundCost(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

function roundCosts(target: UsageTotals): void {
  target.promptCost = roundCost(target.promptCost);
  target.completionCost = roundCost(target.completionCost);
  target.totalCost = roundCost(target.totalCost);
}

/**
 * Aggregates every log line, including retries of the same key, since each
 * line is a billed request.
 */
export function computeLogStats(lines: readonly unknown[]): LogStats {
  const stats: LogStats = {
    totalRequests: 0,
    okCount: 0,
    errorCount: 0,
    ...emptyTotals(),
    byModel: {},
  };

  for (const line of lines) {
    const parsed = statsRecordSchema.safeParse(line);
    if (!parsed.success) {
      continue;
    }
    const { model, status, usage } = parsed.data;
    const perModel = (stats.byModel[model] ??= {
      requests: 0,
      okCount: 0,
      errorCount: 0,
      ...emptyTotals(),
    });

    stats.totalRequests += 1;
    perModel.requests += 1;
    if (status === "ok") {
      stats.okCount += 1;
      perModel.okCount += 1;
    } else {
      stats.errorCount += 1;
      perModel.errorCount += 1;
    }

    const totals = usageTotals(usage);
    addTotals(stats, totals);
    addTotals(perModel, totals);
  }

  roundCosts(stats);
  for (const perModel of Object.values(stats.byModel)) {
    roundCosts(perModel);
  }
  return stats;
}
