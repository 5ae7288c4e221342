import { extractTag } from "../align/extract.js";
import { parseLineNumber } from "../dataset/inputRows.js";
import { formatBooleanCell, withColumns, type Table, type TableRow } from "../dataset/table.js";
import {
  GROUND_TRUTH_LINE_COLUMN,
  lineExactColumn,
  linePredictionColumn,
  lineWithin20Column,
  lineWithin5Column,
  responseColumn,
} from "./columns.js";
import { ratio, type LineDistanceMetrics } from "./metrics.js";

const FIRST_INTEGER = /\d+/u;

function firstInteger(text: string): number | null {
  const match = FIRST_INTEGER.exec(text);
  return match ? Number.parseInt(match[0], 10) : null;
}

/**
 * Predicted line from a response, trying in order: the whole response as a
 * number (`"103"`, `"103.0"`), the first integer inside `<line>...</line>`,
 * then the first integer anywhere in the text. The last step is a heuristic
 * and can pick up unrelated numbers.
 */
export function extractLinePrediction(response: string | undefined): number | null {
  if (response === undefined) {
    return null;
  }
  const numeric = parseLineNumber(response);
  if (numeric !== null) {
    return numeric;
  }
  const tagged = extractTag(response, "line");
  if (tagged !== "") {
    const fromTag = firstInteger(tagged);
    if (fromTag !== null) {
      return fromTag;
    }
  }
  return firstInteger(response);
}

export type LineBuckets = {
  readonly exact: boolean;
  readonly within5: boolean;
  readonly within20: boolean;
};

export function lineBuckets(predicted: number, truth: number): LineBuckets {
  const distance = Math.abs(predicted - truth);
  return { exact: distance === 0, within5: distance <= 5, within20: distance <= 20 };
}

export type LineNumberOptions = {
  readonly model: string;
  /** Restrict to rows of this book. */
  readonly bookTitle?: string;
};

export type LineNumberResult = {
  readonly table: Table;
  readonly metrics: LineDistanceMetrics;
};

export function checkLineNumbers(table: Table, options: LineNumberOptions): LineNumberResult {
  const respCol = responseColumn(options.model);
  const predCol = linePredictionColumn(options.model);
  const exactCol = lineExactColumn(options.model);
  const within5Col = lineWithin5Column(options.model);
  const within20Col = lineWithin20Column(options.model);

  let total = 0;
  let evaluable = 0;
  let totalValid = 0;
  let exact = 0;
  let within5 = 0;
  let within20 = 0;
  let missingPrediction = 0;

  const rows = table.rows.map((row): TableRow => {
    if (options.bookTitle !== undefined && row.book_title !== options.bookTitle) {
      return row;
    }
    total += 1;
    const predicted = extractLinePrediction(row[respCol]);
    const truth = parseLineNumber(row[GROUND_TRUTH_LINE_COLUMN]);
    const updated: TableRow = { ...row, [predCol]: predicted === null ? "" : String(predicted) };

    if (truth === null) {
      updated[exactCol] = formatBooleanCell(null);
      updated[within5Col] = formatBooleanCell(null);
      updated[within20Col] = formatBooleanCell(null);
      return updated;
    }
    evaluable += 1;
    const buckets: LineBuckets =
      predicted === null
        ? { exact: false, within5: false, within20: false }
        : lineBuckets(predicted, truth);
    if (predicted === null) {
      missingPrediction += 1;
    } else {
      totalValid += 1;
    }
    exact += buckets.exact ? 1 : 0;
    within5 += buckets.within5 ? 1 : 0;
    within20 += buckets.within20 ? 1 : 0;
    updated[exactCol] = formatBooleanCell(buckets.exact);
    updated[within5Col] = formatBooleanCell(buckets.within5);
    updated[within20Col] = formatBooleanCell(buckets.within20);
    return updated;
  });

  return {
    table: {
      columns: withColumns(table.columns, [predCol, exactCol, within5Col, within20Col]),
      rows,
    },
    metrics: {
      total,
      evaluable,
      totalValid,
      exact,
      within5,
      within20,
      missingPrediction,
      exactRate: ratio(exact, evaluable),
      within5Rate: ratio(within5, evaluable),
      within20Rate: ratio(within20, evaluable),
    },
  };
}
