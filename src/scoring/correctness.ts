import {
  formatBooleanCell,
  isBlank,
  isTrueCell,
  withColumns,
  type Table,
  type TableRow,
} from "../dataset/table.js";
import { correctnessColumn, errorColumn, GROUND_TRUTH_TEXT_COLUMN, responseColumn } from "./columns.js";
import { partialRatio } from "./fuzzy.js";
import { ratio, type CorrectnessMetrics } from "./metrics.js";

export type CorrectnessOptions = {
  readonly model: string;
  readonly threshold: number;
  /** Restrict scoring to rows where this boolean column is true. */
  readonly subsetColumn?: string;
};

export type CorrectnessResult = {
  readonly table: Table;
  readonly metrics: CorrectnessMetrics;
};

/**
 * Fuzzy-matches each response against `answer_quote_text`. A row is scored
 * only with ground truth, a non-empty response and an empty error cell;
 * otherwise its correctness cell is left empty. Unscored rows still count in
 * the accuracy denominator.
 */
export function checkCorrectness(table: Table, options: CorrectnessOptions): CorrectnessResult {
  const respCol = responseColumn(options.model);
  const errCol = errorColumn(options.model);
  const corrCol = correctnessColumn(options.model);
  const { subsetColumn } = options;

  let n = 0;
  let correct = 0;
  let incorrect = 0;
  const lengthRatios: number[] = [];

  const rows = table.rows.map((row): TableRow => {
    if (subsetColumn !== undefined && !isTrueCell(row[subsetColumn])) {
      return row;
    }
    n += 1;
    const groundTruth = row[GROUND_TRUTH_TEXT_COLUMN] ?? "";
    const response = row[respCol] ?? "";
    const scorable = !isBlank(groundTruth) && !isBlank(response) && isBlank(row[errCol]);
    if (!scorable) {
      return { ...row, [corrCol]: formatBooleanCell(null) };
    }
    lengthRatios.push([...response].length / [...groundTruth].length);
    const match = partialRatio(groundTruth, response) > options.threshold;
    if (match) {
      correct += 1;
    } else {
      incorrect += 1;
    }
    return { ...row, [corrCol]: formatBooleanCell(match) };
  });

  const scored = correct + incorrect;
  return {
    table: { columns: withColumns(table.columns, [errCol, corrCol]), rows },
    metrics: {
      n,
      scored,
      correct,
      incorrect,
      indeterminate: n - scored,
      accuracy: ratio(correct, n),
      averageLengthRatio:
        lengthRatios.length > 0
          ? lengthRatios.reduce((sum, value) => sum + value, 0) / lengthRatios.length
          : null,
    },
  };
}
