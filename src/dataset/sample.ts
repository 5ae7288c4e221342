import { ConfigurationError } from "../errors.js";
import { createSeededRandom, shuffled, type RandomSource } from "../utils/random.js";
import type { Table, TableRow } from "./table.js";
import { isBlank } from "./table.js";

export type BalancedSampleOptions = {
  readonly column: string;
  readonly total: number;
  readonly seed?: number;
  readonly random?: RandomSource;
};

export type CategoryAllocation = {
  readonly value: string;
  readonly available: number;
  readonly requested: number;
  readonly sampled: number;
};

export type BalancedSampleResult = {
  readonly table: Table;
  /** Rows dropped up front for having no `answer_quote_text`. */
  readonly droppedWithoutAnswer: number;
  readonly allocations: readonly CategoryAllocation[];
};

/**
 * Draws `total` rows spread evenly over the distinct values of `column`.
 * The remainder goes one row each to randomly chosen categories; categories
 * with too few rows contribute everything they have.
 */
export function balancedSample(table: Table, options: BalancedSampleOptions): BalancedSampleResult {
  if (!table.columns.includes(options.column)) {
    throw new ConfigurationError(
      `Column '${options.column}' not found. Available columns: ${table.columns.join(", ")}`,
    );
  }
  const random = options.random ?? createSeededRandom(options.seed ?? Date.now());

  const hasAnswers = table.columns.includes("answer_quote_text");
  const candidates = hasAnswers
    ? table.rows.filter((row) => !isBlank(row.answer_quote_text))
    : [...table.rows];
  const droppedWithoutAnswer = table.rows.length - candidates.length;

  const byValue = new Map<string, TableRow[]>();
  for (const row of candidates) {
    const value = row[options.column] ?? "";
    const bucket = byValue.get(value);
    if (bucket) {
      bucket.push(row);
    } else {
      byValue.set(value, [row]);
    }
  }

  const total = Math.max(0, Math.min(Math.floor(options.total), candidates.length));
  const categories = shuffled([...byValue.keys()], random);
  const base = categories.length > 0 ? Math.floor(total / categories.length) : 0;
  const remainder = categories.length > 0 ? total % categories.length : 0;

  const picked: TableRow[] = [];
  const allocations: CategoryAllocation[] = [];
  categories.forEach((value, index) => {
    const rows = byValue.get(value) ?? [];
    const requested = base + (index < remainder ? 1 : 0);
    const sampled = Math.min(requested, rows.length);
    picked.push(...shuffled(rows, random).slice(0, sampled));
    allocations.push({ value, available: rows.length, requested, sampled });
  });

  return {
    table: { columns: table.columns, rows: shuffled(picked, random) },
    droppedWithoutAnswer,
    allocations,
  };
}
