import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { parseArgs } from "node:util";

import { requireOption } from "../src/cli/args.js";
import { DEFAULT_PROMPT_VERSIONS } from "../src/config/defaults.js";
import { loadBookCorpus } from "../src/dataset/books.js";
import { toInputRow } from "../src/dataset/inputRows.js";
import { readCsvTable } from "../src/dataset/table.js";
import { buildPrompt } from "../src/prompts/buildPrompt.js";
import { listPromptVersions, PROMPT_TASKS } from "../src/prompts/registry.js";
import { toError } from "../src/utils/timeout.js";

const PREVIEW_CHARS = 2000;

function printUsage(): void {
  console.log(`
Render the default prompt of every task for the first input row.

Usage:
  npx tsx scripts/preview-prompts.ts --input <csv> --books <json> [--out-dir <dir>]

Options:
  --input, -i <path>     Input CSV
  --books, -b <path>     Book corpus JSON
  --out-dir <dir>        Where to write task<N>_prompt_example.txt (default: output/prompts)
  --help                 Show this help
`);
}

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      input: { type: "string", short: "i" },
      books: { type: "string", short: "b" },
      "out-dir": { type: "string", default: "output/prompts" },
      help: { type: "boolean", default: false },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printUsage();
    return;
  }

  const table = await readCsvTable(requireOption(values.input, "--input"));
  const books = await loadBookCorpus(requireOption(values.books, "--books"));
  const first = table.rows[0];
  if (!first) {
    throw new Error("Input CSV has no rows.");
  }
  const row = toInputRow(first, 0);
  console.log(`Using row 0: uuid=${row.uuid} book=${row.bookTitle} commenter=${row.commenter}`);

  for (const task of PROMPT_TASKS) {
    console.log(`task${task}: ${listPromptVersions(task).join(", ")}`);
  }

  const outDir = values["out-dir"] ?? "output/prompts";
  await mkdir(outDir, { recursive: true });
  for (const task of PROMPT_TASKS) {
    const version = DEFAULT_PROMPT_VERSIONS[task] ?? "v1";
    const outFile = path.join(outDir, `task${task}_prompt_example.txt`);
    const header = `# Task ${task} - Prompt Version: ${version}\n`;
    console.log(`\n=== TASK ${task} (${version}) ===`);
    try {
      const prompt = buildPrompt(row, task, version, books);
      await writeFile(outFile, `${header}# Status: success\n\n${prompt}`, "utf8");
      console.log(prompt.length > PREVIEW_CHARS ? `${prompt.slice(0, PREVIEW_CHARS)}\n... [truncated, see ${outFile}]` : prompt);
    } catch (error) {
      const message = toError(error).message;
      await writeFile(outFile, `${header}# Status: ERROR\n# Error: ${message}\n`, "utf8");
      console.error(`Task ${task} error: ${message}`);
    }
  }
}

void main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(message);
  process.exitCode = 1;
});
