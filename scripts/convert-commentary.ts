import { parseArgs } from "node:util";

import { requireOption } from "../src/cli/args.js";
import { commenterFromFileName, convertCommentaryRows } from "../src/dataset/commentary.js";
import { readCsvTable, writeCsvTable } from "../src/dataset/table.js";

function printUsage(): void {
  console.log(`
Convert a raw commentary CSV (Lemma, Comment, Book, Line, Full_Mask) to the benchmark input schema.

Usage:
  npx tsx scripts/convert-commentary.ts --input <csv> --output <csv> [options]

Options:
  --input <path>          Raw commentary CSV, e.g. Aeneid_commentary_Servius.csv
  --output <path>         Output CSV (overwritten)
  --commenter <name>      Commenter name (default: last _-separated part of the input file name)
  --title-prefix <text>   Book title prefix (default: Aeneid)
  --help                  Show this help
`);
}

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      input: { type: "string" },
      output: { type: "string" },
      commenter: { type: "string" },
      "title-prefix": { type: "string", default: "Aeneid" },
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
  const converted = convertCommentaryRows(await readCsvTable(inputPath), {
    commenter: values.commenter ?? commenterFromFileName(inputPath),
    titlePrefix: values["title-prefix"] ?? "Aeneid",
  });
  await writeCsvTable(outputPath, converted);
  console.log(`Wrote ${converted.rows.length} row(s) to ${outputPath}`);
}

void main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(message);
  process.exitCode = 1;
});
