import { z } from "zod";

import type { PromptTask } from "../prompts/registry.js";

export type ResultStatus = "ok" | "error";

export type UsagePayload = Readonly<Record<string, unknown>>;

/**
 * One line of the JSONL log. Field names are the on-disk format and stay
 * snake_case.
 */
export type ResultRecord = {
  readonly uuid: string;
  readonly book_title: string;
  readonly model: string;
  readonly status: ResultStatus;
  readonly response_raw: string | null;
  readonly usage: UsagePayload | null;
  readonly error: string | null;
  readonly timestamp_start: string | null;
  readonly timestamp_end: string | null;
  readonly duration_ms: number;
  readonly row_index: number;
  readonly commenter: string;
  readonly task: PromptTask;
  readonly prompt_version: string;
  readonly temperature: number;
  readonly attempts: number;
  readonly api_model: string | null;
  readonly completion_id: string | null;
  readonly created: number | null;
};

const idSchema = z
  .union([z.string(), z.number()])
  .transform((value) => String(value))
  .pipe(z.string().min(1));

const usageSchema = z.record(z.string(), z.unknown());

/**
 * Tolerant schema for reading log lines back. Only the join key is required;
 * numeric ids are stringified and a missing model reads as `unknown`.
 */
export const loggedRecordSchema = z.looseObject({
  uuid: idSchema,
  book_title: idSchema,
  model: z
    .union([z.string(), z.number()])
    .nullish()
    .transform((value) => (value === null || value === undefined ? "unknown" : String(value))),
  status: z.string().catch("unknown"),
  response_raw: z.string().nullable().catch(null),
  usage: usageSchema.nullable().catch(null),
  error: z.string().nullable().catch(null),
});

export type LoggedRecord = z.infer<typeof loggedRecordSchema>;

/**
 * Schema used by token/cost statistics, which count every parseable line,
 * including lines without a join key.
 */
export const statsRecordSchema = z.looseObject({
  model: loggedRecordSchema.shape.model,
  status: z.string().catch("unknown"),
  usage: usageSchema.nullable().catch(null),
});
