import { writeFile } from "node:fs/promises";
import { parseArgs } from "node:util";

import { requireOption } from "../src/cli/args.js";
import { readLogLines } from "../src/log/resumableLog.js";
import { computeLogStats } from "../src/log/stats.js";

function printUsage(): void {
  console.log(`
Token usage and cost statistics for a JSONL inference log.

Usage:
  npx tsx scripts/log-stats.ts --log <jsonl> [--output <json>]

Options:
  --log, -l <path>      JSONL log written by run-inference
  --output, -o <path>   Write the stats JSON here instead of stdout
  --help                Show this help
`);
}

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      log: { type: "string", short: "l" },
      output: { type: "string", short: "o" },
      help: { type: "boolean", default: false },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printUsage();
    return;
  }

  const stats = computeLogStats(await readLogLines(requireOption(values.log, "--log")));
  const json = JSON.stringify(stats, null, 2);
  if (values.output) {
    await writeFile(values.output, json, "utf8");
    console.error(`Stats written to ${values.output}`);
  } else {
    console.log(json);
  }
}

void main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(message);
  process.exitCode = 1;
});
