import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { parseArgs } from "node:util";

import { parseCsvList, parseNonNegativeNumber, requireOption } from "../src/cli/args.js";
import { DEFAULT_CORRECTNESS_THRESHOLD } from "../src/config/defaults.js";
import { loadBookCorpus, type BookCorpus } from "../src/dataset/books.js";
import { readCsvTable, writeCsvTable } from "../src/dataset/table.js";
import { ConfigurationError } from "../src/errors.js";
import { formatPercent, type MetricsReport, type MetricsSummary } from "../src/scoring/metrics.js";
import { scoreTable, type ScoreMode } from "../src/scoring/scoreTable.js";

function printUsage(): void {
  console.log(`
Score model responses in an aligned CSV.

Usage:
  npx tsx scripts/evaluate.ts --input <csv> --output <csv> [options]

Options:
  --input, -i <path>             Aligned CSV with response_<model> columns
  --output, -o <path>            Annotated CSV to write
  --mode <text|line>             text: quote matching (tasks 1, 2); line: line numbers (tasks 3, 4). Default: text
  --books, -b <path>             Book corpus JSON (required with --validity-threshold)
  --models <list>                Comma-separated models (default: discovered from response_* columns)
  --validity-threshold <x>       Check responses against the book text; skipped when omitted
  --correctness-threshold <x>    Fuzzy match threshold against ground truth (default: ${DEFAULT_CORRECTNESS_THRESHOLD})
  --subsets <list>               Boolean subset columns (default: human_eval_set,close_reading_example)
  --book <title>                 Line mode: also report this book as a subset
  --metrics-out <path>           Also write the metrics summary JSON to this file
  --help                         Show this help
`);
}

function parseMode(raw: string): ScoreMode {
  if (raw === "text" || raw === "line") {
    return raw;
  }
  throw new ConfigurationError(`Invalid --mode: ${raw} (expected text or line)`);
}

function describeReport(model: string, subset: string, report: MetricsReport): string[] {
  const lines: string[] = [];
  const label = `Model: ${model} [${subset}]`;
  if (report.validity) {
    const v = report.validity;
    lines.push(
      `${label} Matches: ${v.valid}/${v.evaluated} (${formatPercent(v.validRate)}), Not in primary source: ${v.invalid}` +
        (v.missingReference > 0 ? `, Missing reference: ${v.missingReference}` : ""),
    );
  }
  if (report.correctness) {
    const c = report.correctness;
    lines.push(
      c.n === 0
        ? `${label} No rows.`
        : `${label} Accuracy: ${c.correct}/${c.n} (${formatPercent(c.accuracy)}), Average length ratio: ${
            c.averageLengthRatio === null ? "N/A" : c.averageLengthRatio.toFixed(1)
          }`,
    );
  }
  if (report.lineDistance) {
    const l = report.lineDistance;
    lines.push(
      `${label} Exact: ${l.exact}/${l.evaluable} (${formatPercent(l.exactRate)}), ` +
        `±5: ${l.within5}/${l.evaluable} (${formatPercent(l.within5Rate)}), ` +
        `±20: ${l.within20}/${l.evaluable} (${formatPercent(l.within20Rate)}), ` +
        `valid predictions: ${l.totalValid}, missing: ${l.missingPrediction}`,
    );
  }
  return lines;
}

function printSummary(summary: MetricsSummary): void {
  for (const [model, subsets] of Object.entries(summary)) {
    for (const [subset, report] of Object.entries(subsets)) {
      for (const line of describeReport(model, subset, report)) {
        console.log(line);
      }
    }
    console.log("");
  }
}

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      input: { type: "string", short: "i" },
      output: { type: "string", short: "o" },
      mode: { type: "string", default: "text" },
      books: { type: "string", short: "b" },
      models: { type: "string" },
      "validity-threshold": { type: "string" },
      "correctness-threshold": { type: "string", default: String(DEFAULT_CORRECTNESS_THRESHOLD) },
      subsets: { type: "string" },
      book: { type: "string" },
      "metrics-out": { type: "string" },
      help: { type: "boolean", default: false },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printUsage();
    return;
  }

  const inputPath = requireOption(values.input, "--input");
  const outputPath = requireOption(values.output, "--output");
  const mode = parseMode(values.mode ?? "text");
  const validityThreshold =
    values["validity-threshold"] === undefined
      ? undefined
      : parseNonNegativeNumber(values["validity-threshold"], "--validity-threshold");
  const correctnessThreshold = parseNonNegativeNumber(
    values["correctness-threshold"] ?? String(DEFAULT_CORRECTNESS_THRESHOLD),
    "--correctness-threshold",
  );

  let books: BookCorpus | undefined;
  if (values.books) {
    books = await loadBookCorpus(values.books);
  } else if (validityThreshold !== undefined) {
    throw new ConfigurationError("--validity-threshold requires --books.");
  }

  const table = await readCsvTable(inputPath);
  const result = scoreTable(table, {
    mode,
    correctnessThreshold,
    ...(validityThreshold !== undefined ? { validityThreshold } : {}),
    ...(books ? { books } : {}),
    ...(values.models ? { models: parseCsvList(values.models) } : {}),
    ...(values.subsets ? { subsetColumns: parseCsvList(values.subsets) } : {}),
    ...(values.book ? { bookSubset: values.book } : {}),
  });

  printSummary(result.summary);
  await writeCsvTable(outputPath, result.table);
  console.log(`Annotated results written to ${outputPath}`);

  const summaryJson = JSON.stringify(result.summary);
  if (values["metrics-out"]) {
    await mkdir(path.dirname(values["metrics-out"]), { recursive: true });
    await writeFile(values["metrics-out"], `${JSON.stringify(result.summary, null, 2)}\n`, "utf8");
  }
  console.log(`EVAL_METRICS_JSON:${summaryJson}`);
}

void main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(message);
  process.exitCode = 1;
});
