import { parseArgs } from "node:util";

import {
  DEFAULT_BATCH_SIZE,
  DEFAULT_CONCURRENCY,
  DEFAULT_PROMPT_VERSIONS,
  DEFAULT_RETRY,
  DEFAULT_TEMPERATURE,
} from "../src/config/defaults.js";
import { loadBookCorpus, type BookCorpus } from "../src/dataset/books.js";
import { toInputRows } from "../src/dataset/inputRows.js";
import { readCsvTable } from "../src/dataset/table.js";
import { ConfigurationError } from "../src/errors.js";
import {
  parseNonNegativeNumber,
  parsePositiveInt,
  requireOption,
} from "../src/cli/args.js";
import { runInference, selectPendingRows, type InferenceEvent } from "../src/executor/requestExecutor.js";
import { readLogRecordsIfExists, ResumableLog } from "../src/log/resumableLog.js";
import { getOpenRouterClient, resolveOpenRouterConfig } from "../src/openrouter/client.js";
import { createCompletionSubmitter } from "../src/openrouter/completion.js";
import { createPromptBuilder } from "../src/prompts/buildPrompt.js";
import { assertPromptVersion, parsePromptTask } from "../src/prompts/registry.js";

function printUsage(): void {
  console.log(`
Run model inference over an input CSV and append raw results to a JSONL log.

Usage:
  npx tsx scripts/run-inference.ts --input <csv> --log <jsonl> --model <id> --task <1-4> [options]

Options:
  --input, -i <path>          Input CSV (uuid, book_title, Full_Mask_comment, ...)
  --log, -l <path>            JSONL log to append to (created if missing)
  --books, -b <path>          Book corpus JSON (required for tasks 1 and 3)
  --model, -m <id>            OpenRouter model id, e.g. openai/gpt-4o
  --task, -t <n>              1 book text, 2 no context, 3 line numbers, 4 line numbers without context
  --prompt-version <v>        Prompt version (default per task: ${Object.entries(DEFAULT_PROMPT_VERSIONS)
    .map(([task, version]) => `${task}=${version}`)
    .join(", ")})
  --concurrency, -c <n>       Max in-flight requests (default: ${DEFAULT_CONCURRENCY})
  --batch-size <n>            Rows per flushed batch (default: ${DEFAULT_BATCH_SIZE})
  --limit <n>                 Only process the first n rows
  --temperature <x>           Sampling temperature (default: ${DEFAULT_TEMPERATURE})
  --max-tokens <n>            Max completion tokens (default: provider default)
  --timeout <seconds>         Per-attempt timeout (default: 60)
  --max-attempts <n>          Attempts per request (default: ${DEFAULT_RETRY.maxAttempts})
  --retry-base-ms <n>         First retry delay (default: ${DEFAULT_RETRY.baseDelayMs})
  --retry-max-ms <n>          Retry delay cap (default: ${DEFAULT_RETRY.maxDelayMs})
  --resume                    Skip rows whose latest record for this model succeeded
  --help                      Show this help
`);
}

function logEvent(event: InferenceEvent): void {
  switch (event.type) {
    case "run-start":
      console.log(
        `Running ${event.totalRows} row(s) on ${event.model} (batch size ${event.batchSize}, concurrency ${event.concurrency}).`,
      );
      break;
    case "retry":
      console.warn(
        `Retrying ${event.uuid}/${event.bookTitle} after attempt ${event.attempt} in ${event.delayMs}ms: ${event.error}`,
      );
      break;
    case "batch-complete":
      console.log(
        `[${event.batchIndex}/${event.batchCount}] ${event.processed}/${event.totalRows} rows (ok ${event.ok}, errors ${event.errors})`,
      );
      break;
    case "run-complete":
      console.log(
        `${event.interrupted ? "Interrupted" : "Done"}: ${event.processed} logged, ${event.ok} ok, ${event.errors} errors.`,
      );
      break;
  }
}

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      input: { type: "string", short: "i" },
      log: { type: "string", short: "l" },
      books: { type: "string", short: "b" },
      model: { type: "string", short: "m" },
      task: { type: "string", short: "t" },
      "prompt-version": { type: "string" },
      concurrency: { type: "string", short: "c", default: String(DEFAULT_CONCURRENCY) },
      "batch-size": { type: "string", default: String(DEFAULT_BATCH_SIZE) },
      limit: { type: "string" },
      temperature: { type: "string", default: String(DEFAULT_TEMPERATURE) },
      "max-tokens": { type: "string" },
      timeout: { type: "string", default: "60" },
      "max-attempts": { type: "string", default: String(DEFAULT_RETRY.maxAttempts) },
      "retry-base-ms": { type: "string", default: String(DEFAULT_RETRY.baseDelayMs) },
      "retry-max-ms": { type: "string", default: String(DEFAULT_RETRY.maxDelayMs) },
      resume: { type: "boolean", default: false },
      help: { type: "boolean", default: false },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printUsage();
    return;
  }

  const inputPath = requireOption(values.input, "--input");
  const logPath = requireOption(values.log, "--log");
  const model = requireOption(values.model, "--model");
  const task = parsePromptTask(requireOption(values.task, "--task"));
  const promptVersion = values["prompt-version"]?.trim() || DEFAULT_PROMPT_VERSIONS[task] || "v1";
  assertPromptVersion(task, promptVersion);

  const concurrency = parsePositiveInt(values.concurrency ?? String(DEFAULT_CONCURRENCY), "--concurrency");
  const batchSize = parsePositiveInt(values["batch-size"] ?? String(DEFAULT_BATCH_SIZE), "--batch-size");
  const limit = values.limit === undefined ? undefined : parsePositiveInt(values.limit, "--limit");
  const temperature = parseNonNegativeNumber(values.temperature ?? String(DEFAULT_TEMPERATURE), "--temperature");
  const maxTokens = values["max-tokens"] === undefined ? undefined : parsePositiveInt(values["max-tokens"], "--max-tokens");
  const timeoutMs = parseNonNegativeNumber(values.timeout ?? "60", "--timeout") * 1000;
  const retry = {
    maxAttempts: parsePositiveInt(values["max-attempts"] ?? String(DEFAULT_RETRY.maxAttempts), "--max-attempts"),
    baseDelayMs: parseNonNegativeNumber(values["retry-base-ms"] ?? String(DEFAULT_RETRY.baseDelayMs), "--retry-base-ms"),
    maxDelayMs: parseNonNegativeNumber(values["retry-max-ms"] ?? String(DEFAULT_RETRY.maxDelayMs), "--retry-max-ms"),
  };

  const client = getOpenRouterClient(resolveOpenRouterConfig());

  console.log(`Loading input data from ${inputPath}...`);
  const table = await readCsvTable(inputPath);

  let books: BookCorpus | undefined;
  if (task === 1 || task === 3) {
    if (!values.books) {
      throw new ConfigurationError(`Task ${task} requires --books to be specified.`);
    }
    console.log(`Loading books data from ${values.books}...`);
    books = await loadBookCorpus(values.books);
  }

  let rows = toInputRows(table, limit);
  if (values.resume) {
    const before = rows.length;
    rows = selectPendingRows(rows, await readLogRecordsIfExists(logPath), model);
    console.log(`Resume: skipping ${before - rows.length} row(s) already completed for ${model}.`);
  }

  const controller = new AbortController();
  const onSigint = () => {
    console.warn("Interrupted; abandoning the current batch.");
    controller.abort(new Error("Interrupted by user"));
  };
  process.once("SIGINT", onSigint);

  const log = await ResumableLog.open(logPath);
  try {
    await runInference({
      rows,
      model,
      task,
      promptVersion,
      temperature,
      buildPrompt: createPromptBuilder(task, promptVersion, books),
      submit: createCompletionSubmitter({
        model,
        temperature,
        client,
        ...(maxTokens !== undefined ? { maxTokens } : {}),
      }),
      sink: log,
      concurrency,
      batchSize,
      timeoutMs,
      retry,
      signal: controller.signal,
      onEvent: logEvent,
    });
  } finally {
    process.off("SIGINT", onSigint);
    await log.close();
  }
  console.log(`Raw logs appended to ${logPath}`);
}

void main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(message);
  process.exitCode = 1;
});
