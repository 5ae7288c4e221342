import fs from "node:fs";
import path from "node:path";

import { ConfigurationError } from "../errors.js";

let envLoaded = false;

/**
 * Loads `.env.local` from `process.cwd()` once.
 *
 * - Does not override already-set `process.env` values.
 * - Missing file is silently ignored.
 */
export function loadLocalEnv(): void {
  if (envLoaded) {
    return;
  }
  loadEnvFromFile(path.join(process.cwd(), ".env.local"), { override: false });
  envLoaded = true;
}

export type EnvSource = Readonly<Record<string, string | undefined>>;

/** Parses `KEY=value` lines; a missing file reads as empty. */
export function readEnvFile(filePath: string): Record<string, string> {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException)?.code === "ENOENT") {
      return {};
    }
    throw error;
  }

  const entries: Record<string, string> = {};
  for (const line of content.split(/\r?\n/u)) {
    const entry = parseEnvLine(line);
    if (entry) {
      entries[entry[0]] = entry[1];
    }
  }
  return entries;
}

export function loadEnvFromFile(
  filePath: string,
  { override = false }: { override?: boolean } = {},
): void {
  for (const [key, value] of Object.entries(readEnvFile(filePath))) {
    if (override || process.env[key] === undefined) {
      process.env[key] = value;
    }
  }
}

function parseEnvLine(line: string): [string, string] | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith("#")) {
    return null;
  }

  const match = trimmed.match(/^(?:export\s+)?([A-Za-z_][A-Za-z0-9_\-.]*)\s*=\s*(.*)$/u);
  if (!match) {
    return null;
  }
  const key = match[1];
  if (!key) {
    return null;
  }
  let value = match[2] ?? "";

  const quote = value[0];
  if ((quote === '"' || quote === "'") && value.length >= 2 && value.endsWith(quote)) {
    value = value.slice(1, -1);
  } else {
    const commentIndex = value.indexOf(" #");
    if (commentIndex >= 0) {
      value = value.slice(0, commentIndex);
    }
    value = value.trim();
  }

  return [key, value];
}

/**
 * Reads a required variable after loading `.env.local`. Throws a
 * {@link ConfigurationError} naming the variable when it is unset or blank.
 */
export function requireEnv(name: string, hint?: string, env: EnvSource = process.env): string {
  loadLocalEnv();
  const value = env[name]?.trim();
  if (!value) {
    throw new ConfigurationError(
      `${name} must be set (environment or .env.local).${hint ? ` ${hint}` : ""}`,
    );
  }
  return value;
}

export function readPositiveNumberEnv(name: string, env: EnvSource = process.env): number | undefined {
  loadLocalEnv();
  const raw = env[name]?.trim();
  if (!raw) {
    return undefined;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}
