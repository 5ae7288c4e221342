import { describe, expect, it } from "vitest";

import type { BookCorpus } from "../src/dataset/books.js";
import type { Table } from "../src/dataset/table.js";
import { NOT_IN_SOURCE_ERROR } from "../src/scoring/columns.js";
import { checkCorrectness } from "../src/scoring/correctness.js";
import { isFuzzyMatch, normalizeForMatch, partialRatio } from "../src/scoring/fuzzy.js";
import { checkLineNumbers, extractLinePrediction, lineBuckets } from "../src/scoring/lineNumber.js";
import { DEFAULT_EVAL_MODELS, discoverModels, resolveEvalModels } from "../src/scoring/models.js";
import { scoreTable } from "../src/scoring/scoreTable.js";
import { checkValidity } from "../src/scoring/validity.js";

describe("fuzzy matching", () => {
  it("normalises case, punctuation and whitespace", () => {
    expect(normalizeForMatch("  ARMA, virumque--cano!\n")).toBe("arma virumque cano");
  });

  it("scores a contained span as a full partial match", () => {
    expect(partialRatio("arma virumque cano", "ARMA VIRUMQUE CANO TROIAE")).toBe(100);
    expect(isFuzzyMatch("arma virumque cano", "ARMA VIRUMQUE CANO TROIAE", 80)).toBe(true);
    expect(partialRatio("arma virumque cano", "zzzz")).toBe(0);
  });
});

describe("checkValidity", () => {
  it("classifies a case-insensitive span of the book as in-source", () => {
    const books: BookCorpus = { b1: ["arma virumque cano"] };
    const table: Table = {
      columns: ["uuid", "book_title", "response_m"],
      rows: [{ uuid: "u1", book_title: "b1", response_m: "ARMA VIRUMQUE CANO TROIAE" }],
    };
    const result = checkValidity(table, { model: "m", threshold: 80, books });
    expect(result.metrics).toEqual({ evaluated: 1, valid: 1, invalid: 0, missingReference: 0, validRate: 1 });
    expect(result.table.rows[0]?.response_m_ERROR).toBeUndefined();
  });

  it("flags responses missing from the book and skips empty responses", () => {
    const books: BookCorpus = { aeneid_1: ["arma virumque cano", "troiae qui primus ab oris"] };
    const table: Table = {
      columns: ["uuid", "book_title", "response_m"],
      rows: [
        { uuid: "u1", book_title: "Aeneid 1", response_m: "troiae qui primus" },
        { uuid: "u2", book_title: "Aeneid 1", response_m: "zzzz qqqq" },
        { uuid: "u3", book_title: "Aeneid 1", response_m: "" },
        { uuid: "u4", book_title: "Aeneid 9", response_m: "arma" },
      ],
    };
    const result = checkValidity(table, { model: "m", threshold: 80, books });
    expect(result.metrics).toEqual({
      evaluated: 2,
      valid: 1,
      invalid: 1,
      missingReference: 1,
      validRate: 0.5,
    });
    expect(result.table.columns).toEqual(["uuid", "book_title", "response_m", "response_m_ERROR"]);
    expect(result.table.rows.map((row) => row.response_m_ERROR)).toEqual([
      undefined,
      NOT_IN_SOURCE_ERROR,
      undefined,
      undefined,
    ]);
  });
});

describe("checkCorrectness", () => {
  const table: Table = {
    columns: ["uuid", "book_title", "answer_quote_text", "response_m", "response_m_ERROR", "human_eval_set"],
    rows: [
      {
        uuid: "u1",
        book_title: "b1",
        answer_quote_text: "arma virumque cano",
        response_m: "Arma virumque cano,",
        response_m_ERROR: "",
        human_eval_set: "True",
      },
      {
        uuid: "u2",
        book_title: "b1",
        answer_quote_text: "arma virumque cano",
        response_m: "zzzz",
        response_m_ERROR: "",
        human_eval_set: "False",
      },
      {
        uuid: "u3",
        book_title: "b1",
        answer_quote_text: "arma",
        response_m: "",
        response_m_ERROR: "",
        human_eval_set: "True",
      },
      {
        uuid: "u4",
        book_title: "b1",
        answer_quote_text: "troiae qui primus",
        response_m: "troiae qui primus",
        response_m_ERROR: NOT_IN_SOURCE_ERROR,
        human_eval_set: "",
      },
    ],
  };

  it("counts unscored rows in the denominator", () => {
    const result = checkCorrectness(table, { model: "m", threshold: 90 });
    expect(result.metrics).toMatchObject({
      n: 4,
      scored: 2,
      correct: 1,
      incorrect: 1,
      indeterminate: 2,
      accuracy: 0.25,
    });
    expect(result.metrics.averageLengthRatio).toBeCloseTo(23 / 36, 10);
    expect(result.table.rows.map((row) => row.correctness_m_FUZZY_MATCH)).toEqual(["True", "False", "", ""]);
  });

  it("scores only subset rows and leaves the others untouched", () => {
    const result = checkCorrectness(table, { model: "m", threshold: 90, subsetColumn: "human_eval_set" });
    expect(result.metrics).toMatchObject({ n: 2, scored: 1, correct: 1, accuracy: 0.5, averageLengthRatio: 19 / 18 });
    expect(result.table.rows[1]).toEqual(table.rows[1]);
    expect(result.table.rows[3]).toEqual(table.rows[3]);
    expect(result.table.rows[2]?.correctness_m_FUZZY_MATCH).toBe("");
  });

  it("measures the length ratio in code points", () => {
    const result = checkCorrectness(
      {
        columns: ["uuid", "book_title", "answer_quote_text", "response_m"],
        rows: [{ uuid: "u1", book_title: "b1", answer_quote_text: "arma virumque cano", response_m: "arma virumque cano 🚀🚀" }],
      },
      { model: "m", threshold: 90 },
    );
    expect(result.table.rows[0]?.correctness_m_FUZZY_MATCH).toBe("True");
    expect(result.metrics.averageLengthRatio).toBe(21 / 18);
  });

  it("reports null accuracy for an empty subset", () => {
    const result = checkCorrectness(table, { model: "m", threshold: 90, subsetColumn: "close_reading_example" });
    expect(result.metrics).toMatchObject({ n: 0, accuracy: null, averageLengthRatio: null });
  });
});

describe("line-number scoring", () => {
  it("extracts a predicted line in priority order", () => {
    expect(extractLinePrediction("103")).toBe(103);
    expect(extractLinePrediction(" 103.0 ")).toBe(103);
    expect(extractLinePrediction("<line>line 42</line> or maybe 7")).toBe(42);
    expect(extractLinePrediction("<line>none</line> see 12")).toBe(12);
    expect(extractLinePrediction("the answer is on line 103")).toBe(103);
    expect(extractLinePrediction("no idea")).toBeNull();
    expect(extractLinePrediction(undefined)).toBeNull();
  });

  it("buckets a three-line miss as within 5 and within 20", () => {
    const table: Table = {
      columns: ["uuid", "book_title", "answer_quote_idx", "response_m"],
      rows: [{ uuid: "u1", book_title: "b1", answer_quote_idx: "100", response_m: "the answer is on line 103" }],
    };
    const [row] = checkLineNumbers(table, { model: "m" }).table.rows;
    expect(row).toMatchObject({
      line_pred_m: "103",
      line_exact_m: "False",
      line_within5_m: "True",
      line_within20_m: "True",
    });
  });

  it("reports rates over rows with ground truth", () => {
    const table: Table = {
      columns: ["uuid", "book_title", "answer_quote_idx", "response_m"],
      rows: [
        { uuid: "u1", book_title: "b1", answer_quote_idx: "100", response_m: "103" },
        { uuid: "u2", book_title: "b1", answer_quote_idx: "", response_m: "5" },
        { uuid: "u3", book_title: "b2", answer_quote_idx: "50", response_m: "no idea" },
        { uuid: "u4", book_title: "b2", answer_quote_idx: "10.0", response_m: "<line>10</line>" },
      ],
    };
    const result = checkLineNumbers(table, { model: "m" });
    expect(result.metrics).toEqual({
      total: 4,
      evaluable: 3,
      totalValid: 2,
      exact: 1,
      within5: 2,
      within20: 2,
      missingPrediction: 1,
      exactRate: 1 / 3,
      within5Rate: 2 / 3,
      within20Rate: 2 / 3,
    });
    expect(result.table.rows[1]).toMatchObject({
      line_pred_m: "5",
      line_exact_m: "",
      line_within5_m: "",
      line_within20_m: "",
    });
    expect(result.table.rows[2]).toMatchObject({
      line_pred_m: "",
      line_exact_m: "False",
      line_within5_m: "False",
      line_within20_m: "False",
    });

    const byBook = checkLineNumbers(table, { model: "m", bookTitle: "b2" });
    expect(byBook.metrics).toMatchObject({ total: 2, evaluable: 2, exact: 1 });
    expect(byBook.table.rows[0]).toEqual(table.rows[0]);
  });

  it("never marks a row exact without within5, or within5 without within20", () => {
    for (let predicted = 70; predicted <= 130; predicted += 1) {
      const buckets = lineBuckets(predicted, 100);
      expect(!buckets.exact || buckets.within5).toBe(true);
      expect(!buckets.within5 || buckets.within20).toBe(true);
    }
  });
});

describe("model discovery", () => {
  it("reads models from response columns and skips error columns", () => {
    expect(
      discoverModels(["uuid", "response_a", "response_a_ERROR", "response_b", "correctness_a_FUZZY_MATCH"]),
    ).toEqual(["a", "b"]);
  });

  it("falls back to the default list only without response columns", () => {
    expect(resolveEvalModels(["uuid"])).toEqual([...DEFAULT_EVAL_MODELS]);
    expect(resolveEvalModels(["response_a"], ["x"])).toEqual(["x"]);
  });
});

describe("scoreTable", () => {
  it("scores the human baseline only on the human evaluation subset", () => {
    const table: Table = {
      columns: ["uuid", "book_title", "answer_quote_text", "human_eval_set", "response_human", "response_m"],
      rows: [
        {
          uuid: "u1",
          book_title: "b1",
          answer_quote_text: "arma virumque cano",
          human_eval_set: "True",
          response_human: "arma virumque cano",
          response_m: "zzzz",
        },
        {
          uuid: "u2",
          book_title: "b1",
          answer_quote_text: "troiae qui primus",
          human_eval_set: "False",
          response_human: "",
          response_m: "troiae qui primus",
        },
      ],
    };
    const { summary, models } = scoreTable(table, { mode: "text" });
    expect(models).toEqual(["human", "m"]);
    expect(Object.keys(summary.human ?? {})).toEqual(["human_eval_set"]);
    expect(summary.human?.human_eval_set?.correctness).toMatchObject({ n: 1, correct: 1 });
    expect(summary.m?.full_set?.correctness).toMatchObject({ n: 2, correct: 1, accuracy: 0.5 });
    expect(summary.m?.human_eval_set?.correctness).toMatchObject({ n: 1, correct: 0, accuracy: 0 });
  });

  it("adds a book subset in line mode", () => {
    const table: Table = {
      columns: ["uuid", "book_title", "answer_quote_idx", "response_m"],
      rows: [
        { uuid: "u1", book_title: "Aeneid 1", answer_quote_idx: "10", response_m: "10" },
        { uuid: "u2", book_title: "Aeneid 2", answer_quote_idx: "10", response_m: "40" },
      ],
    };
    const { summary } = scoreTable(table, { mode: "line", bookSubset: "Aeneid 1" });
    expect(summary.m?.full_set?.lineDistance).toMatchObject({ evaluable: 2, exact: 1 });
    expect(summary.m?.["book:Aeneid 1"]).toMatchObject({ total: 1, lineDistance: { exact: 1, exactRate: 1 } });
  });

  it("requires a corpus for validity checks", () => {
    expect(() =>
      scoreTable({ columns: ["response_m"], rows: [] }, { mode: "text", validityThreshold: 80 }),
    ).toThrow("Validity checking requires a book corpus.");
  });
});
