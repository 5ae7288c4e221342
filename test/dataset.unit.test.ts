import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { findBook, loadBookCorpus, parseBookCorpus } from "../src/dataset/books.js";
import { commenterFromFileName, convertCommentaryRows, countSentences } from "../src/dataset/commentary.js";
import { parseLineNumber, toInputRows } from "../src/dataset/inputRows.js";
import { balancedSample } from "../src/dataset/sample.js";
import type { Table, TableRow } from "../src/dataset/table.js";
import { ConfigurationError } from "../src/errors.js";

describe("book corpus", () => {
  it("loads and validates a corpus file", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "relic-books-"));
    const filePath = path.join(dir, "books.json");
    fs.writeFileSync(filePath, JSON.stringify({ aeneid_1: ["arma virumque cano"] }), "utf8");
    const corpus = await loadBookCorpus(filePath);
    expect(findBook(corpus, "Aeneid 1")).toEqual(["arma virumque cano"]);
    expect(findBook(corpus, "Aeneid 2")).toBeUndefined();
  });

  it("falls back to the raw title as key", () => {
    expect(findBook({ "Aeneid 1": ["x"] }, "Aeneid 1")).toEqual(["x"]);
  });

  it("rejects corpora whose values are not string arrays", () => {
    expect(() => parseBookCorpus({ aeneid_1: "arma" })).toThrow();
  });
});

describe("input rows", () => {
  it("parses integer line numbers only", () => {
    expect(parseLineNumber("12")).toBe(12);
    expect(parseLineNumber("12.0")).toBe(12);
    expect(parseLineNumber("12.5")).toBeNull();
    expect(parseLineNumber("")).toBeNull();
    expect(parseLineNumber("abc")).toBeNull();
  });

  it("maps table rows and honours the limit", () => {
    const table: Table = {
      columns: ["uuid", "book_title", "answer_quote_idx", "human_eval_set"],
      rows: [
        { uuid: "", book_title: "Aeneid 1", answer_quote_idx: "4", human_eval_set: "True" },
        { uuid: "u2", book_title: "Aeneid 1", answer_quote_idx: "", human_eval_set: "" },
      ],
    };
    expect(toInputRows(table, 1)).toEqual([
      {
        index: 0,
        uuid: "0",
        bookTitle: "Aeneid 1",
        commenter: "",
        fullMaskComment: "",
        answerQuoteText: "",
        answerQuoteIdx: 4,
        humanEvalSet: true,
        closeReadingExample: false,
      },
    ]);
    expect(toInputRows(table)).toHaveLength(2);
  });
});

describe("balancedSample", () => {
  function rowsFor(book: string, count: number): TableRow[] {
    return Array.from({ length: count }, (_, index) => ({
      uuid: `${book}-${index}`,
      book_title: book,
      answer_quote_text: "quote",
    }));
  }

  const table: Table = {
    columns: ["uuid", "book_title", "answer_quote_text"],
    rows: [
      ...rowsFor("A", 5),
      ...rowsFor("B", 5),
      ...rowsFor("C", 2),
      { uuid: "empty-1", book_title: "A", answer_quote_text: "" },
      { uuid: "empty-2", book_title: "C", answer_quote_text: "  " },
    ],
  };

  function countByBook(sample: Table): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const row of sample.rows) {
      const book = row.book_title ?? "";
      counts[book] = (counts[book] ?? 0) + 1;
    }
    return counts;
  }

  it("draws an equal share per category after dropping rows without an answer", () => {
    const result = balancedSample(table, { column: "book_title", total: 6, seed: 7 });
    expect(result.droppedWithoutAnswer).toBe(2);
    expect(countByBook(result.table)).toEqual({ A: 2, B: 2, C: 2 });
    expect(result.table.rows.some((row) => row.uuid?.startsWith("empty"))).toBe(false);
  });

  it("caps the total and takes everything from short categories", () => {
    const result = balancedSample(table, { column: "book_title", total: 100, seed: 7 });
    expect(countByBook(result.table)).toEqual({ A: 4, B: 4, C: 2 });
    const c = result.allocations.find((allocation) => allocation.value === "C");
    expect(c).toEqual({ value: "C", available: 2, requested: 4, sampled: 2 });
  });

  it("is reproducible for a fixed seed", () => {
    const first = balancedSample(table, { column: "book_title", total: 5, seed: 42 });
    const second = balancedSample(table, { column: "book_title", total: 5, seed: 42 });
    expect(second.table.rows.map((row) => row.uuid)).toEqual(first.table.rows.map((row) => row.uuid));
  });

  it("rejects an unknown column", () => {
    expect(() => balancedSample(table, { column: "commenter", total: 3 })).toThrow(ConfigurationError);
  });
});

describe("commentary conversion", () => {
  it("counts sentences on . ? and !", () => {
    expect(countSentences("")).toBe(0);
    expect(countSentences("no punctuation")).toBe(1);
    expect(countSentences("One. Two? Three!")).toBe(3);
    expect(countSentences("...")).toBe(1);
  });

  it("derives the commenter from the file name", () => {
    expect(commenterFromFileName("/data/Aeneid_commentary_Servius.csv")).toBe("Servius");
  });

  it("maps raw commentary rows onto the input schema", () => {
    const converted = convertCommentaryRows(
      {
        columns: ["Lemma", "Comment", "Book", "Line", "Full_Mask"],
        rows: [
          { Lemma: "Arma virumque cano. Troiae qui primus!", Comment: "c", Book: "1", Line: "1", Full_Mask: "X <MASK>" },
          { Lemma: "", Comment: "c", Book: "", Line: "", Full_Mask: "" },
        ],
      },
      { commenter: "Servius", titlePrefix: "Aeneid", random: () => 0.5 },
    );
    expect(converted.columns).toEqual([
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
    ]);
    expect(converted.rows[0]).toEqual({
      uuid: "50000000",
      book_title: "Aeneid_1",
      commenter: "Servius",
      Full_Mask_comment: "X <MASK>",
      answer_quote_text: "Arma virumque cano. Troiae qui primus!",
      answer_quote_idx: "1",
      num_sents: "2",
      close_reading_example: "",
      explanation_human: "",
      human_eval_set: "",
    });
    expect(converted.rows[1]).toMatchObject({ book_title: "", num_sents: "0" });
  });
});
