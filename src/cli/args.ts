import { ConfigurationError } from "../errors.js";

export function parsePositiveInt(raw: string, optionName: string): number {
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed < 1 || String(parsed) !== raw.trim()) {
    throw new ConfigurationError(`Invalid ${optionName}: ${raw}`);
  }
  return parsed;
}

export function parseNonNegativeNumber(raw: string, optionName: string): number {
  const parsed = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(parsed) || parsed < 0) {
    throw new ConfigurationError(`Invalid ${optionName}: ${raw}`);
  }
  return parsed;
}

export function parseCsvList(raw: string): readonly string[] {
  const deduped = [
    ...new Set(
      raw
        .split(",")
        .map((entry) => entry.trim())
        .filter(Boolean),
    ),
  ];
  if (deduped.length === 0) {
    throw new ConfigurationError("Expected a non-empty comma-separated list.");
  }
  return deduped;
}

export function requireOption(value: string | undefined, optionName: string): string {
  const trimmed = value?.trim();
  if (!trimmed) {
    throw new ConfigurationError(`Missing required option ${optionName}.`);
  }
  return trimmed;
}
