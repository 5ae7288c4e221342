import { mkdir, open, readFile, type FileHandle } from "node:fs/promises";
import path from "node:path";

import {
  loggedRecordSchema,
  type LoggedRecord,
  type ResultRecord,
} from "./resultRecord.js";

/**
 * Append-only JSONL writer. Each batch is written and `datasync`ed before
 * {@link appendBatch} resolves, so a crash loses at most the batch in flight.
 * The file is never truncated or rewritten.
 */
export class ResumableLog {
  private closed = false;

  private constructor(
    readonly filePath: string,
    private readonly handle: FileHandle,
  ) {}

  static async open(filePath: string): Promise<ResumableLog> {
    await mkdir(path.dirname(filePath), { recursive: true });
    const handle = await open(filePath, "a+");
    try {
      await terminatePartialLine(handle);
    } catch (error) {
      await handle.close();
      throw error;
    }
    return new ResumableLog(filePath, handle);
  }

  async appendBatch(records: readonly ResultRecord[]): Promise<void> {
    if (this.closed) {
      throw new Error(`Log ${this.filePath} is closed.`);
    }
    if (records.length === 0) {
      return;
    }
    const text = records.map((record) => `${JSON.stringify(record)}\n`).join("");
    await this.handle.appendFile(text, "utf8");
    await this.handle.datasync();
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.handle.close();
  }
}

// A crash mid-write can leave a line without its newline; the next record
// must start on a fresh line.
async function terminatePartialLine(handle: FileHandle): Promise<void> {
  const { size } = await handle.stat();
  if (size === 0) {
    return;
  }
  const last = Buffer.alloc(1);
  await handle.read(last, 0, 1, size - 1);
  if (last[0] !== 0x0a) {
    await handle.appendFile("\n", "utf8");
    await handle.datasync();
  }
}

function parseJsonLine(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return undefined;
  }
}

/** Parses every non-empty line as JSON, dropping lines that are not objects. */
export function parseLogLines(text: string): Record<string, unknown>[] {
  const out: Record<string, unknown>[] = [];
  for (const line of text.split(/\r?\n/u)) {
    const trimmed = line.trim();
    if (!trimmed) {
      continue;
    }
    const value = parseJsonLine(trimmed);
    if (typeof value === "object" && value !== null && !Array.isArray(value)) {
      out.push(Object.fromEntries(Object.entries(value)));
    }
  }
  return out;
}

export function parseLogRecords(text: string): LoggedRecord[] {
  const out: LoggedRecord[] = [];
  for (const value of parseLogLines(text)) {
    const parsed = loggedRecordSchema.safeParse(value);
    if (parsed.success) {
      out.push(parsed.data);
    }
  }
  return out;
}

export async function readLogLines(filePath: string): Promise<Record<string, unknown>[]> {
  return parseLogLines(await readFile(filePath, "utf8"));
}

export async function readLogRecords(filePath: string): Promise<LoggedRecord[]> {
  return parseLogRecords(await readFile(filePath, "utf8"));
}

/** Like {@link readLogRecords}, but a missing file reads as an empty log. */
export async function readLogRecordsIfExists(filePath: string): Promise<LoggedRecord[]> {
  try {
    return await readLogRecords(filePath);
  } catch (error) {
    if ((error as NodeJS.ErrnoException)?.code === "ENOENT") {
      return [];
    }
    throw error;
  }
}

export type RecordKey = {
  readonly uuid: string;
  readonly book_title: string;
  readonly model: string;
};

export function recordKey({ uuid, book_title, model }: RecordKey): string {
  return JSON.stringify([uuid, book_title, model]);
}

export function rowKey(uuid: string, bookTitle: string): string {
  return JSON.stringify([uuid, bookTitle]);
}

/**
 * Last-write-wins view keyed by `(uuid, book_title, model)`. Records are
 * scanned in append order, so a later record replaces an earlier one.
 */
export function buildLatestView<T extends RecordKey>(
  records: readonly T[],
  { model }: { model?: string } = {},
): Map<string, T> {
  const view = new Map<string, T>();
  for (const record of records) {
    if (model !== undefined && record.model !== model) {
      continue;
    }
    view.set(recordKey(record), record);
  }
  return view;
}

/**
 * Latest record per `(uuid, book_title)` across models: the one appended last.
 */
export function latestByRow<T extends RecordKey>(
  records: readonly T[],
  { model }: { model?: string } = {},
): Map<string, T> {
  const byRow = new Map<string, T>();
  for (const record of records) {
    if (model !== undefined && record.model !== model) {
      continue;
    }
    byRow.set(rowKey(record.uuid, record.book_title), record);
  }
  return byRow;
}
