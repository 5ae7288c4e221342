import path from "node:path";
import { parseArgs } from "node:util";

import { parsePositiveInt, requireOption } from "../src/cli/args.js";
import { balancedSample } from "../src/dataset/sample.js";
import { readCsvTable, writeCsvTable } from "../src/dataset/table.js";

function printUsage(): void {
  console.log(`
Draw a sample balanced across the values of one column.

Usage:
  npx tsx scripts/sample.ts <input.csv> --num <n> --column <name> [options]

Options:
  --num, -n <n>           Total rows to draw
  --column, -c <name>     Column to balance over, e.g. book_title
  --output, -o <path>     Output CSV (default: <input>_sampled.csv)
  --seed <n>              Random seed for a reproducible sample
  --show-stats            Print the per-category allocation
  --help                  Show this help
`);
}

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    options: {
      num: { type: "string", short: "n" },
      column: { type: "string", short: "c" },
      output: { type: "string", short: "o" },
      seed: { type: "string" },
      "show-stats": { type: "boolean", default: false },
      help: { type: "boolean", default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printUsage();
    return;
  }

  const inputPath = requireOption(positionals[0], "<input.csv>");
  const total = parsePositiveInt(requireOption(values.num, "--num"), "--num");
  const column = requireOption(values.column, "--column");
  const seed = values.seed === undefined ? undefined : Number.parseInt(values.seed, 10);

  const table = await readCsvTable(inputPath);
  console.log(`Read ${table.rows.length} row(s), ${table.columns.length} column(s) from ${inputPath}`);

  const result = balancedSample(table, {
    column,
    total,
    ...(seed !== undefined && Number.isFinite(seed) ? { seed } : {}),
  });
  if (result.droppedWithoutAnswer > 0) {
    console.log(`Dropped ${result.droppedWithoutAnswer} row(s) with empty answer_quote_text.`);
  }
  for (const allocation of result.allocations) {
    if (allocation.sampled < allocation.requested) {
      console.warn(
        `Warning: '${allocation.value}' has only ${allocation.available} row(s), fewer than ${allocation.requested}.`,
      );
    }
  }

  const parsed = path.parse(inputPath);
  const outputPath = values.output ?? path.join(parsed.dir, `${parsed.name}_sampled${parsed.ext}`);
  await writeCsvTable(outputPath, result.table);
  console.log(`Saved ${result.table.rows.length} row(s) to ${outputPath}`);

  if (values["show-stats"]) {
    const sorted = [...result.allocations].sort((a, b) => a.value.localeCompare(b.value));
    for (const allocation of sorted) {
      console.log(`  ${allocation.value}: ${allocation.sampled}`);
    }
  }
}

void main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(message);
  process.exitCode = 1;
});
