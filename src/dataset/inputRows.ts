import type { Table, TableRow } from "./table.js";
import { isTrueCell } from "./table.js";

export type InputRow = {
  readonly index: number;
  readonly uuid: string;
  readonly bookTitle: string;
  readonly commenter: string;
  readonly fullMaskComment: string;
  readonly answerQuoteText: string;
  readonly answerQuoteIdx: number | null;
  readonly humanEvalSet: boolean;
  readonly closeReadingExample: boolean;
};

/**
 * Parses a line-number cell. Accepts integer spellings such as `"103"` and
 * `"103.0"`; anything else is `null`.
 */
export function parseLineNumber(value: string | undefined): number | null {
  const trimmed = value?.trim() ?? "";
  if (!/^-?\d+(?:\.0+)?$/u.test(trimmed)) {
    return null;
  }
  const parsed = Number.parseInt(trimmed, 10);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

export function toInputRow(row: TableRow, index: number): InputRow {
  return {
    index,
    uuid: row.uuid?.trim() || String(index),
    bookTitle: row.book_title ?? "",
    commenter: row.commenter ?? "",
    fullMaskComment: row.Full_Mask_comment ?? "",
    answerQuoteText: row.answer_quote_text ?? "",
    answerQuoteIdx: parseLineNumber(row.answer_quote_idx),
    humanEvalSet: isTrueCell(row.human_eval_set),
    closeReadingExample: isTrueCell(row.close_reading_example),
  };
}

export function toInputRows(table: Table, limit?: number): InputRow[] {
  const rows = limit === undefined ? table.rows : table.rows.slice(0, Math.max(0, limit));
  return rows.map((row, index) => toInputRow(row, index));
}
