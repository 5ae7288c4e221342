import { describe, expect, it } from "vitest";

import { checkValidity, partialRatio, type Table } from "../src/index.js";

describe("package entry point", () => {
  it("loads and scores text through fuzzball", () => {
    expect(partialRatio("Arma virumque cano", "arma virumque cano troiae qui primus")).toBe(100);
  });

  it("finds an exact quotation inside a long reference text", () => {
    const lines = Array.from({ length: 2000 }, (_, index) => `line ${index} of the reference text`);
    lines[1234] = "troiae qui primus ab oris italiam fato profugus";
    const table: Table = {
      columns: ["uuid", "book_title", "response_m"],
      rows: [{ uuid: "u1", book_title: "Aeneid 1", response_m: "Troiae qui primus ab oris" }],
    };
    const result = checkValidity(table, { model: "m", threshold: 80, books: { aeneid_1: lines } });
    expect(result.metrics.valid).toBe(1);
    expect(result.table.rows[0]).toEqual(table.rows[0]);
  });
});
