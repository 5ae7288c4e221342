import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";

import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";

export type TableRow = Record<string, string>;

/**
 * In-memory CSV snapshot. Every cell is a string; `""` stands for a missing
 * value. `columns` keeps the header order used when the table is written back.
 */
export type Table = {
  readonly columns: readonly string[];
  readonly rows: readonly TableRow[];
};

const csvRecordsSchema = z.array(z.array(z.string()));

export function parseCsvTable(text: string): Table {
  const records = csvRecordsSchema.parse(
    parse(text, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
    }),
  );
  const [header, ...body] = records;
  if (!header) {
    return { columns: [], rows: [] };
  }
  const rows = body.map((values) => {
    const row: TableRow = {};
    header.forEach((column, index) => {
      row[column] = values[index] ?? "";
    });
    return row;
  });
  return { columns: header, rows };
}

export function formatCsvTable(table: Table): string {
  const body = table.rows.map((row) => table.columns.map((column) => row[column] ?? ""));
  return stringify([table.columns, ...body]);
}

export async function readCsvTable(filePath: string): Promise<Table> {
  return parseCsvTable(await readFile(filePath, "utf8"));
}

export async function writeCsvTable(filePath: string, table: Table): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, formatCsvTable(table), "utf8");
}

export function hasColumns(table: Table, columns: readonly string[]): boolean {
  return columns.every((column) => table.columns.includes(column));
}

/**
 * Returns the column list with `extra` appended in order, skipping names that
 * are already present.
 */
export function withColumns(columns: readonly string[], extra: readonly string[]): string[] {
  const out = [...columns];
  for (const column of extra) {
    if (!out.includes(column)) {
      out.push(column);
    }
  }
  return out;
}

export function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim() === "";
}

/** Boolean flag cells count as true only when they spell `true` (any case). */
export function isTrueCell(value: string | undefined): boolean {
  return value !== undefined && value.trim().toLowerCase() === "true";
}

export function formatBooleanCell(value: boolean | null): string {
  if (value === null) {
    return "";
  }
  return value ? "True" : "False";
}
