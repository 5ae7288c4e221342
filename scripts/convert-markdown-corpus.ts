import { parseArgs } from "node:util";

import { requireOption } from "../src/cli/args.js";
import { convertMarkdownCorpus, DEFAULT_HEADING_KEYWORDS } from "../src/dataset/markdownCorpus.js";

function printUsage(): void {
  console.log(`
Split a Markdown or plain-text book at its headings into a book corpus JSON
(section key -> lines).

Usage:
  npx tsx scripts/convert-markdown-corpus.ts --input <md> --output <json> [options]

Options:
  --input <path>            Source .md or .txt file
  --output <path>           Output JSON (overwritten)
  --keep-blank              Keep blank lines (dropped by default)
  --heading-keyword <text>  Extra line prefix treated as a heading; repeatable
                            (always recognised: #, ${DEFAULT_HEADING_KEYWORDS.join(", ")})
  --help                    Show this help
`);
}

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      input: { type: "string" },
      output: { type: "string" },
      "keep-blank": { type: "boolean", default: false },
      "heading-keyword": { type: "string", multiple: true },
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
  const keepBlank = values["keep-blank"] ?? false;
  const result = await convertMarkdownCorpus(inputPath, outputPath, {
    keepBlank,
    extraHeadingKeywords: values["heading-keyword"] ?? [],
  });
  console.log(
    `Wrote ${outputPath}: ${result.sections} section(s), ${result.totalLines} line(s), keep blank: ${keepBlank}`,
  );
  console.log(`Keys: ${result.keys.slice(0, 3).join(", ")}`);
}

void main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(message);
  process.exitCode = 1;
});
