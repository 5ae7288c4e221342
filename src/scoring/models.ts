import { HUMAN_BASELINE } from "../config/defaults.js";

/** Used when a table has no `response_*` columns to discover models from. */
export const DEFAULT_EVAL_MODELS: readonly string[] = [
  HUMAN_BASELINE,
  "gemini-2.5-pro-preview-05-06",
  "gpt-4.1-2025-04-14",
  "o3-2025-04-16",
  "claude-3-7-sonnet-20250219",
  "deepseek-r1",
  "gpt-4o-2024-11-20",
  "qwen3-32b",
];

const RESPONSE_PREFIX = "response_";
const ERROR_SUFFIX = "_ERROR";

/**
 * Model ids from `response_<model>` columns, in column order. Error columns
 * (`response_<model>_ERROR`) are skipped.
 */
export function discoverModels(columns: readonly string[]): string[] {
  const models: string[] = [];
  for (const column of columns) {
    if (!column.startsWith(RESPONSE_PREFIX) || column.endsWith(ERROR_SUFFIX)) {
      continue;
    }
    const model = column.slice(RESPONSE_PREFIX.length);
    if (model !== "" && !models.includes(model)) {
      models.push(model);
    }
  }
  return models;
}

export function resolveEvalModels(columns: readonly string[], requested?: readonly string[]): string[] {
  if (requested && requested.length > 0) {
    return [...requested];
  }
  const discovered = discoverModels(columns);
  return discovered.length > 0 ? discovered : [...DEFAULT_EVAL_MODELS];
}
