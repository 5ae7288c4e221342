import path from "node:path";

import { randomInt, type RandomSource } from "../utils/random.js";
import type { Table, TableRow } from "./table.js";

export const COMMENTARY_OUTPUT_COLUMNS = [
  "uuid",
  "book_title",
  "commenter",
  "Full_Mask_comment",
  "answer_quote_text",
  "answer_quote_idx",
  "num_sents",
  "close_reading_example",
  "explanation_human",
  "human_eval_set",
] as const;

export type ConvertCommentaryOptions = {
  readonly commenter: string;
  /** Prefix joined to the book number with `_`, e.g. `Aeneid` → `Aeneid_4`. */
  readonly titlePrefix: string;
  readonly random?: RandomSource;
};

/** Rough sentence count: splits on runs of `.`, `?` and `!`. */
export function countSentences(text: string): number {
  if (text.trim() === "") {
    return 0;
  }
  const parts = text.split(/[.!?]+/u).filter((part) => part.trim() !== "");
  return Math.max(1, parts.length);
}

/** `Aeneid_commentary_Servius.csv` → `Servius`. */
export function commenterFromFileName(filePath: string): string {
  const stem = path.parse(filePath).name;
  return stem.split("_").at(-1) ?? stem;
}

function randomUuid(random: RandomSource): string {
  return String(randomInt(random, 100_000_000)).padStart(8, "0");
}

export function convertCommentaryRows(table: Table, options: ConvertCommentaryOptions): Table {
  const random = options.random ?? Math.random;
  const rows = table.rows.map((source): TableRow => {
    const bookNumber = source.Book || source.Aeneid_book || "";
    const answer = source.Lemma ?? "";
    return {
      uuid: randomUuid(random),
      book_title: bookNumber === "" ? "" : `${options.titlePrefix}_${bookNumber}`,
      commenter: options.commenter,
      Full_Mask_comment: source.Full_Mask ?? "",
      answer_quote_text: answer,
      answer_quote_idx: source.Line ?? "",
      num_sents: String(countSentences(answer)),
      close_reading_example: "",
      explanation_human: "",
      human_eval_set: "",
    };
  });
  return { columns: [...COMMENTARY_OUTPUT_COLUMNS], rows };
}
