import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { findBook, loadBookCorpus } from "../src/dataset/books.js";
import { convertMarkdownCorpus, headingText, splitMarkdownCorpus } from "../src/dataset/markdownCorpus.js";

const aeneid = [
  "Preface line",
  "",
  "# LIBER I",
  "Arma virumque cano,",
  "  Troiae qui primus ab oris",
  "",
  "## LIBER II",
  "Conticuere omnes",
  "",
].join("\n");

describe("splitMarkdownCorpus", () => {
  it("keys sections by stem and heading and drops text before the first heading", () => {
    expect(splitMarkdownCorpus(aeneid, { stem: "aeneid" })).toEqual({
      "aeneid_LIBER I": ["Arma virumque cano,", "Troiae qui primus ab oris"],
      "aeneid_LIBER II": ["Conticuere omnes"],
    });
  });

  it("keeps blank lines on request", () => {
    expect(splitMarkdownCorpus(aeneid, { stem: "aeneid", keepBlank: true })["aeneid_LIBER I"]).toEqual([
      "Arma virumque cano,",
      "Troiae qui primus ab oris",
      "",
    ]);
  });

  it("treats keyword-prefixed lines as headings", () => {
    expect(splitMarkdownCorpus("LIBER I\nline a\n  LIBER II\nline b", { stem: "poem" })).toEqual({
      "poem_LIBER I": ["line a"],
      "poem_LIBER II": ["line b"],
    });
    expect(splitMarkdownCorpus("BOOK 1\nx\n", { stem: "poem", headingKeywords: ["BOOK"] })).toEqual({
      "poem_BOOK 1": ["x"],
    });
  });

  it("puts a file without headings under <stem>_default", () => {
    expect(splitMarkdownCorpus("a\r\n\r\nb\r\n", { stem: "poem" })).toEqual({ poem_default: ["a", "b"] });
  });

  it("strips every leading # from heading text", () => {
    expect(headingText("  ### Book  4 ")).toBe("Book  4");
  });
});

describe("convertMarkdownCorpus", () => {
  it("writes a corpus that loadBookCorpus can read back", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "relic-md-"));
    const inputPath = path.join(dir, "aeneid.md");
    const outputPath = path.join(dir, "out", "books.json");
    fs.writeFileSync(inputPath, "LIBER I\narma\nBOOK 2\ncano\n", "utf8");

    const result = await convertMarkdownCorpus(inputPath, outputPath, { extraHeadingKeywords: ["BOOK"] });

    expect(result).toEqual({ sections: 2, totalLines: 2, keys: ["aeneid_LIBER I", "aeneid_BOOK 2"] });
    const corpus = await loadBookCorpus(outputPath);
    expect(findBook(corpus, "aeneid_BOOK 2")).toEqual(["cano"]);
  });
});
