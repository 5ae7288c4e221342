import { DEFAULT_BATCH_SIZE, DEFAULT_CONCURRENCY, DEFAULT_RETRY, DEFAULT_TIMEOUT_MS } from "../config/defaults.js";
import type { InputRow } from "../dataset/inputRows.js";
import { PromptConstructionError } from "../errors.js";
import { buildLatestView, recordKey, type RecordKey } from "../log/resumableLog.js";
import type { ResultRecord } from "../log/resultRecord.js";
import type { SubmitCompletion } from "../openrouter/completion.js";
import type { PromptBuilder } from "../prompts/buildPrompt.js";
import type { PromptTask } from "../prompts/registry.js";
import { createCallScheduler, createExponentialBackoff } from "../utils/scheduler.js";
import { toError } from "../utils/timeout.js";

export type RetrySettings = {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
};

/** Destination for finished batches; {@link ResumableLog} in production. */
export type RecordSink = {
  appendBatch(records: readonly ResultRecord[]): Promise<void>;
};

export type InferenceEvent =
  | {
      readonly type: "run-start";
      readonly model: string;
      readonly totalRows: number;
      readonly batchSize: number;
      readonly concurrency: number;
    }
  | {
      readonly type: "retry";
      readonly uuid: string;
      readonly bookTitle: string;
      readonly attempt: number;
      readonly delayMs: number;
      readonly error: string;
    }
  | {
      readonly type: "batch-complete";
      readonly batchIndex: number;
      readonly batchCount: number;
      readonly processed: number;
      readonly totalRows: number;
      readonly ok: number;
      readonly errors: number;
    }
  | {
      readonly type: "run-complete";
      readonly processed: number;
      readonly ok: number;
      readonly errors: number;
      readonly interrupted: boolean;
    };

export type RunInferenceOptions = {
  readonly rows: readonly InputRow[];
  readonly model: string;
  readonly task: PromptTask;
  readonly promptVersion: string;
  readonly temperature: number;
  readonly buildPrompt: PromptBuilder;
  readonly submit: SubmitCompletion;
  readonly sink: RecordSink;
  readonly concurrency?: number;
  readonly batchSize?: number;
  readonly retry?: RetrySettings;
  /** Wall-clock budget per attempt. */
  readonly timeoutMs?: number;
  readonly signal?: AbortSignal;
  readonly onEvent?: (event: InferenceEvent) => void;
  readonly now?: () => Date;
};

export type RunInferenceResult = {
  readonly processed: number;
  readonly ok: number;
  readonly errors: number;
  readonly batches: number;
  /** True when the abort signal fired; the batch in flight was not logged. */
  readonly interrupted: boolean;
};

class RunAbortedError extends Error {
  constructor() {
    super("Inference run aborted");
    this.name = "RunAbortedError";
  }
}

/**
 * Drops rows whose latest record for `model` succeeded, so a rerun only
 * retries rows that errored or never ran.
 */
export function selectPendingRows(
  rows: readonly InputRow[],
  records: readonly (RecordKey & { readonly status: string })[],
  model: string,
): InputRow[] {
  const view = buildLatestView(records, { model });
  return rows.filter((row) => {
    const latest = view.get(recordKey({ uuid: row.uuid, book_title: row.bookTitle, model }));
    return latest?.status !== "ok";
  });
}

/**
 * Runs every row through `submit`, batch by batch. Each batch is fully
 * settled, appended and flushed before the next one starts. Every row in a
 * completed batch yields exactly one record.
 */
export async function runInference(options: RunInferenceOptions): Promise<RunInferenceResult> {
  const batchSize = Math.max(1, Math.floor(options.batchSize ?? DEFAULT_BATCH_SIZE));
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? DEFAULT_CONCURRENCY));
  const retry = options.retry ?? DEFAULT_RETRY;
  const now = options.now ?? (() => new Date());
  const { signal, onEvent } = options;

  const scheduler = createCallScheduler({
    maxParallelRequests: concurrency,
    attemptTimeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    retry: createExponentialBackoff(retry),
  });

  const baseRecord = (row: InputRow) => ({
    uuid: row.uuid,
    book_title: row.bookTitle,
    model: options.model,
    row_index: row.index,
    commenter: row.commenter,
    task: options.task,
    prompt_version: options.promptVersion,
    temperature: options.temperature,
  });

  async function runSingle(row: InputRow): Promise<ResultRecord> {
    let prompt: string;
    try {
      prompt = options.buildPrompt(row);
    } catch (error) {
      if (!(error instanceof PromptConstructionError)) {
        throw error;
      }
      return {
        ...baseRecord(row),
        status: "error",
        response_raw: null,
        usage: null,
        error: error.message,
        timestamp_start: null,
        timestamp_end: null,
        duration_ms: 0,
        attempts: 0,
        api_model: null,
        completion_id: null,
        created: null,
      };
    }

    const started = now();
    let attempts = 0;
    try {
      const result = await scheduler.run((attemptSignal) => options.submit(prompt, { signal: attemptSignal }), {
        signal,
        onSettled: (metrics) => {
          attempts = metrics.attempts;
        },
        onRetry: (event) => {
          onEvent?.({
            type: "retry",
            uuid: row.uuid,
            bookTitle: row.bookTitle,
            attempt: event.attempt,
            delayMs: event.delayMs,
            error: event.error.message,
          });
        },
      });
      const ended = now();
      return {
        ...baseRecord(row),
        status: "ok",
        response_raw: result.text,
        usage: result.usage,
        error: null,
        timestamp_start: started.toISOString(),
        timestamp_end: ended.toISOString(),
        duration_ms: Math.max(0, ended.getTime() - started.getTime()),
        attempts,
        api_model: result.apiModel,
        completion_id: result.id,
        created: result.created,
      };
    } catch (error) {
      if (signal?.aborted) {
        throw new RunAbortedError();
      }
      const ended = now();
      return {
        ...baseRecord(row),
        status: "error",
        response_raw: null,
        usage: null,
        error: toError(error).message,
        timestamp_start: started.toISOString(),
        timestamp_end: ended.toISOString(),
        duration_ms: Math.max(0, ended.getTime() - started.getTime()),
        attempts,
        api_model: null,
        completion_id: null,
        created: null,
      };
    }
  }

  const totalRows = options.rows.length;
  const batchCount = Math.ceil(totalRows / batchSize);
  let processed = 0;
  let ok = 0;
  let errors = 0;
  let batches = 0;
  let interrupted = false;

  onEvent?.({ type: "run-start", model: options.model, totalRows, batchSize, concurrency });

  for (let start = 0; start < totalRows; start += batchSize) {
    if (signal?.aborted) {
      interrupted = true;
      break;
    }
    const batch = options.rows.slice(start, start + batchSize);
    const records: ResultRecord[] = [];
    const outcomes = await Promise.allSettled(
      batch.map(async (row) => {
        records.push(await runSingle(row));
      }),
    );
    if (signal?.aborted) {
      interrupted = true;
      break;
    }
    for (const outcome of outcomes) {
      if (outcome.status === "rejected") {
        throw toError(outcome.reason);
      }
    }

    await options.sink.appendBatch(records);
    batches += 1;
    processed += records.length;
    const batchOk = records.filter((record) => record.status === "ok").length;
    ok += batchOk;
    errors += records.length - batchOk;
    onEvent?.({
      type: "batch-complete",
      batchIndex: batches,
      batchCount,
      processed,
      totalRows,
      ok: batchOk,
      errors: records.length - batchOk,
    });
  }

  onEvent?.({ type: "run-complete", processed, ok, errors, interrupted });
  return { processed, ok, errors, batches, interrupted };
}
