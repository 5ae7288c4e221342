import { parseArgs } from "node:util";

import { alignLogToFile, type ExtractionRule } from "../src/align/aligner.js";
import { requireOption } from "../src/cli/args.js";
import { ConfigurationError } from "../src/errors.js";

function printUsage(): void {
  console.log(`
Merge a JSONL inference log into a CSV, extracting tagged spans from each response.

Usage:
  npx tsx scripts/align-log.ts --input <csv> --log <jsonl> --output <csv> [column options]

Options:
  --input, -i <path>        Input CSV with uuid and book_title columns
  --log, -l <path>          JSONL log written by run-inference
  --output, -o <path>       Destination CSV; merged by (uuid, book_title) when it exists
  --window-col <name>       Column for the <window> span
  --text-col <name>         Column for the <text> span
  --line-col <name>         Column for the <line> span
  --extract <tag=column>    Extra rule; may be repeated
  --model, -m <id>          Only use records of this model
  --require-merge           Fail instead of overwriting a destination without join columns
  --help                    Show this help
`);
}

function parseExtractRule(raw: string): ExtractionRule {
  const [tag, column, ...rest] = raw.split("=").map((part) => part.trim());
  if (!tag || !column || rest.length > 0) {
    throw new ConfigurationError(`Invalid --extract value: ${raw} (expected tag=column)`);
  }
  return { tag, column };
}

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      input: { type: "string", short: "i" },
      log: { type: "string", short: "l" },
      output: { type: "string", short: "o" },
      "window-col": { type: "string" },
      "text-col": { type: "string" },
      "line-col": { type: "string" },
      extract: { type: "string", multiple: true },
      model: { type: "string", short: "m" },
      "require-merge": { type: "boolean", default: false },
      help: { type: "boolean", default: false },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printUsage();
    return;
  }

  const rules: ExtractionRule[] = [];
  if (values["window-col"]) {
    rules.push({ tag: "window", column: values["window-col"] });
  }
  if (values["text-col"]) {
    rules.push({ tag: "text", column: values["text-col"] });
  }
  if (values["line-col"]) {
    rules.push({ tag: "line", column: values["line-col"] });
  }
  rules.push(...(values.extract ?? []).map(parseExtractRule));
  if (rules.length === 0) {
    throw new ConfigurationError("Provide at least one output column, e.g. --window-col window_pred.");
  }

  const outputPath = requireOption(values.output, "--output");
  const result = await alignLogToFile({
    inputPath: requireOption(values.input, "--input"),
    logPath: requireOption(values.log, "--log"),
    outputPath,
    rules,
    ...(values.model ? { model: values.model } : {}),
    requireMerge: values["require-merge"] ?? false,
  });

  for (const warning of result.warnings) {
    console.warn(`Warning: ${warning}`);
  }
  if (result.written) {
    console.log(
      `${result.merged ? "Merged" : "Wrote"} ${result.matchedRows} row(s) from ${result.logKeys} log key(s) into ${outputPath}`,
    );
  }
}

void main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(message);
  process.exitCode = 1;
});
