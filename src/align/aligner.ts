import { readFile } from "node:fs/promises";

import { hasColumns, parseCsvTable, readCsvTable, withColumns, writeCsvTable } from "../dataset/table.js";
import type { Table, TableRow } from "../dataset/table.js";
import { AlignmentError, ConfigurationError } from "../errors.js";
import { buildLatestView, latestByRow, readLogRecords, rowKey } from "../log/resumableLog.js";
import type { LoggedRecord } from "../log/resultRecord.js";
import { extractTag } from "./extract.js";

export const JOIN_COLUMNS = ["uuid", "book_title"] as const;

/** Writes the body of `<tag>` from each response into `column`. */
export type ExtractionRule = {
  readonly tag: string;
  readonly column: string;
};

export type AlignLogOptions = {
  readonly table: Table;
  readonly records: readonly LoggedRecord[];
  readonly rules: readonly ExtractionRule[];
  /** Only use records of this model. */
  readonly model?: string;
};

export type AlignLogResult = {
  /** Input rows that have a log record, with the rule columns filled in. */
  readonly table: Table;
  readonly matchedRows: number;
  /** Distinct `(uuid, book_title, model)` keys considered. */
  readonly logKeys: number;
};

function keyOf(row: TableRow): string {
  return rowKey(row.uuid ?? "", row.book_title ?? "");
}

function assertJoinColumns(table: Table, source: string): void {
  if (!hasColumns(table, JOIN_COLUMNS)) {
    throw new AlignmentError(`${source} must contain uuid and book_title columns for alignment.`, source);
  }
}

export function alignLog(options: AlignLogOptions): AlignLogResult {
  assertJoinColumns(options.table, "Input table");
  if (options.rules.length === 0) {
    throw new ConfigurationError("At least one extraction rule (tag → column) is required.");
  }

  const filter = options.model === undefined ? {} : { model: options.model };
  const logKeys = buildLatestView(options.records, filter).size;
  const latest = latestByRow(options.records, filter);

  const rows: TableRow[] = [];
  for (const row of options.table.rows) {
    const record = latest.get(keyOf(row));
    if (!record) {
      continue;
    }
    const aligned: TableRow = { ...row };
    for (const rule of options.rules) {
      aligned[rule.column] = extractTag(record.response_raw, rule.tag);
    }
    rows.push(aligned);
  }

  return {
    table: {
      columns: withColumns(
        options.table.columns,
        options.rules.map((rule) => rule.column),
      ),
      rows,
    },
    matchedRows: rows.length,
    logKeys,
  };
}

/**
 * Merges `fresh` into `existing` by `(uuid, book_title)`. Columns present in
 * `fresh` overwrite; every other column of `existing` is carried through.
 * Rows missing from `fresh` keep their values and rows only in `fresh` are
 * appended.
 */
export function mergeAlignedTable(existing: Table, fresh: Table): Table {
  assertJoinColumns(existing, "Destination table");
  assertJoinColumns(fresh, "Aligned table");

  const columns = withColumns(existing.columns, fresh.columns);
  const freshByKey = new Map<string, TableRow>();
  for (const row of fresh.rows) {
    freshByKey.set(keyOf(row), row);
  }

  const used = new Set<string>();
  const rows: TableRow[] = existing.rows.map((row) => {
    const key = keyOf(row);
    const update = freshByKey.get(key);
    if (!update) {
      return row;
    }
    used.add(key);
    const merged: TableRow = { ...row };
    for (const column of fresh.columns) {
      merged[column] = update[column] ?? "";
    }
    return merged;
  });

  for (const [key, row] of freshByKey) {
    if (!used.has(key)) {
      rows.push(row);
    }
  }
  return { columns, rows };
}

async function readOptionalTable(filePath: string): Promise<Table | null> {
  try {
    return parseCsvTable(await readFile(filePath, "utf8"));
  } catch (error) {
    if ((error as NodeJS.ErrnoException)?.code === "ENOENT") {
      return null;
    }
    throw error;
  }
}

export type AlignLogToFileOptions = {
  readonly inputPath: string;
  readonly logPath: string;
  readonly outputPath: string;
  readonly rules: readonly ExtractionRule[];
  readonly model?: string;
  /** Fail instead of overwriting a destination that lacks join columns. */
  readonly requireMerge?: boolean;
};

export type AlignLogToFileResult = {
  readonly matchedRows: number;
  readonly logKeys: number;
  readonly written: boolean;
  readonly merged: boolean;
  readonly warnings: readonly string[];
};

/**
 * Read-modify-write of `outputPath`. Nothing is written when no input row has
 * a log record. Callers must not run two alignments on the same destination
 * concurrently.
 */
export async function alignLogToFile(options: AlignLogToFileOptions): Promise<AlignLogToFileResult> {
  const input = await readCsvTable(options.inputPath);
  if (!hasColumns(input, JOIN_COLUMNS)) {
    throw new AlignmentError(
      `Input CSV ${options.inputPath} must contain uuid and book_title columns.`,
      options.inputPath,
    );
  }
  const records = await readLogRecords(options.logPath);
  const aligned = alignLog({
    table: input,
    records,
    rules: options.rules,
    ...(options.model !== undefined ? { model: options.model } : {}),
  });

  const warnings: string[] = [];
  if (aligned.matchedRows === 0) {
    warnings.push(
      aligned.logKeys === 0
        ? `No usable log records${options.model ? ` for model ${options.model}` : ""}; nothing written.`
        : "No input rows match a log record; nothing written.",
    );
    return { matchedRows: 0, logKeys: aligned.logKeys, written: false, merged: false, warnings };
  }

  const existing = await readOptionalTable(options.outputPath);
  let output = aligned.table;
  let merged = false;
  if (existing) {
    if (hasColumns(existing, JOIN_COLUMNS)) {
      output = mergeAlignedTable(existing, aligned.table);
      merged = true;
    } else if (options.requireMerge) {
      throw new AlignmentError(
        `Destination ${options.outputPath} lacks uuid/book_title columns; refusing to overwrite.`,
        options.outputPath,
      );
    } else {
      warnings.push(`Destination ${options.outputPath} lacks uuid/book_title columns; overwriting it.`);
    }
  }

  await writeCsvTable(options.outputPath, output);
  return { matchedRows: aligned.matchedRows, logKeys: aligned.logKeys, written: true, merged, warnings };
}
