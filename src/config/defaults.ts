export const DEFAULT_BATCH_SIZE = 10;
export const DEFAULT_CONCURRENCY = 5;
export const DEFAULT_TEMPERATURE = 0;
export const DEFAULT_TIMEOUT_MS = 60_000;

export const DEFAULT_RETRY = {
  maxAttempts: 3,
  baseDelayMs: 2_000,
  maxDelayMs: 60_000,
} as const;

export const DEFAULT_CORRECTNESS_THRESHOLD = 90;

export const DEFAULT_PROMPT_VERSIONS: Readonly<Record<number, string>> = {
  1: "v1_relic_simple",
  2: "v1_text_simple",
  3: "v1_line_simple",
  4: "v1",
};

export const SUBSET_COLUMNS = ["human_eval_set", "close_reading_example"] as const;

export const FULL_SET = "full_set";

/** Baseline whose responses only exist for the human evaluation subset. */
export const HUMAN_BASELINE = "human";
export const HUMAN_EVAL_SUBSET = "human_eval_set";
