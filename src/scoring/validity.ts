import { findBook, type BookCorpus } from "../dataset/books.js";
import { isBlank, withColumns, type Table, type TableRow } from "../dataset/table.js";
import { errorColumn, NOT_IN_SOURCE_ERROR, responseColumn } from "./columns.js";
import { partialRatio } from "./fuzzy.js";
import { ratio, type ValidityMetrics } from "./metrics.js";

export type ValidityOptions = {
  readonly model: string;
  readonly threshold: number;
  readonly books: BookCorpus;
};

export type ValidityResult = {
  readonly table: Table;
  readonly metrics: ValidityMetrics;
};

/**
 * Checks that each non-empty response appears (approximately) in its book.
 * Responses that do not are flagged in `response_<model>_ERROR`, which later
 * excludes them from correctness scoring.
 */
export function checkValidity(table: Table, options: ValidityOptions): ValidityResult {
  const respCol = responseColumn(options.model);
  const errCol = errorColumn(options.model);
  const referenceCache = new Map<string, string | null>();

  const referenceFor = (title: string): string | null => {
    const cached = referenceCache.get(title);
    if (cached !== undefined) {
      return cached;
    }
    const book = findBook(options.books, title);
    const text = book ? book.join(" ") : null;
    referenceCache.set(title, text);
    return text;
  };

  let evaluated = 0;
  let valid = 0;
  let invalid = 0;
  let missingReference = 0;

  const rows = table.rows.map((row): TableRow => {
    const response = row[respCol];
    if (response === undefined || isBlank(response)) {
      return row;
    }
    const reference = referenceFor(row.book_title ?? "");
    if (reference === null) {
      missingReference += 1;
      return row;
    }
    evaluated += 1;
    if (partialRatio(reference, response) > options.threshold) {
      valid += 1;
      return row;
    }
    invalid += 1;
    return { ...row, [errCol]: NOT_IN_SOURCE_ERROR };
  });

  return {
    table: { columns: withColumns(table.columns, [errCol]), rows },
    metrics: {
      evaluated,
      valid,
      invalid,
      missingReference,
      validRate: ratio(valid, evaluated),
    },
  };
}
