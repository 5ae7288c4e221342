import {
  DEFAULT_CORRECTNESS_THRESHOLD,
  FULL_SET,
  HUMAN_BASELINE,
  HUMAN_EVAL_SUBSET,
  SUBSET_COLUMNS,
} from "../config/defaults.js";
import type { BookCorpus } from "../dataset/books.js";
import type { Table } from "../dataset/table.js";
import { ConfigurationError } from "../errors.js";
import { checkCorrectness } from "./correctness.js";
import { checkLineNumbers } from "./lineNumber.js";
import { bookSubsetName, subsetReport, type MetricsSummary } from "./metrics.js";
import { resolveEvalModels } from "./models.js";
import { checkValidity } from "./validity.js";

/** `text` scores quoted spans (tasks 1 and 2); `line` scores line numbers (tasks 3 and 4). */
export type ScoreMode = "text" | "line";

export type ScoreTableOptions = {
  readonly mode: ScoreMode;
  readonly models?: readonly string[];
  readonly books?: BookCorpus;
  /** Validity runs only when a threshold is given. */
  readonly validityThreshold?: number;
  readonly correctnessThreshold?: number;
  readonly subsetColumns?: readonly string[];
  /** Line mode: also report this book as subset `book:<title>`. */
  readonly bookSubset?: string;
};

export type ScoreTableResult = {
  readonly table: Table;
  readonly models: readonly string[];
  readonly summary: MetricsSummary;
};

// Human answers exist only for the human evaluation subset.
function scoresSubset(model: string, subset: string): boolean {
  return model !== HUMAN_BASELINE || subset === HUMAN_EVAL_SUBSET;
}

export function scoreTable(input: Table, options: ScoreTableOptions): ScoreTableResult {
  const models = resolveEvalModels(input.columns, options.models);
  const summary: MetricsSummary = {};
  let table = input;

  if (options.mode === "line") {
    for (const model of models.filter((candidate) => scoresSubset(candidate, FULL_SET))) {
      const full = checkLineNumbers(table, { model });
      table = full.table;
      const report = subsetReport(summary, model, FULL_SET);
      report.total = full.metrics.total;
      report.lineDistance = full.metrics;

      if (options.bookSubset !== undefined) {
        const byBook = checkLineNumbers(table, { model, bookTitle: options.bookSubset });
        table = byBook.table;
        const bookReport = subsetReport(summary, model, bookSubsetName(options.bookSubset));
        bookReport.total = byBook.metrics.total;
        bookReport.lineDistance = byBook.metrics;
      }
    }
    return { table, models, summary };
  }

  const threshold = options.correctnessThreshold ?? DEFAULT_CORRECTNESS_THRESHOLD;

  if (options.validityThreshold !== undefined) {
    if (!options.books) {
      throw new ConfigurationError("Validity checking requires a book corpus.");
    }
    for (const model of models) {
      const validity = checkValidity(table, {
        model,
        threshold: options.validityThreshold,
        books: options.books,
      });
      table = validity.table;
      const report = subsetReport(summary, model, FULL_SET);
      report.total = table.rows.length;
      report.validity = validity.metrics;
    }
  }

  for (const model of models.filter((candidate) => scoresSubset(candidate, FULL_SET))) {
    const correctness = checkCorrectness(table, { model, threshold });
    table = correctness.table;
    const report = subsetReport(summary, model, FULL_SET);
    report.total = correctness.metrics.n;
    report.correctness = correctness.metrics;
  }

  const subsets = (options.subsetColumns ?? SUBSET_COLUMNS).filter((column) =>
    input.columns.includes(column),
  );
  for (const subset of subsets) {
    for (const model of models.filter((candidate) => scoresSubset(candidate, subset))) {
      const correctness = checkCorrectness(table, { model, threshold, subsetColumn: subset });
      table = correctness.table;
      const report = subsetReport(summary, model, subset);
      report.total = correctness.metrics.n;
      report.correctness = correctness.metrics;
    }
  }

  return { table, models, summary };
}
