import * as fuzz from "fuzzball";

/**
 * Shared normalisation for every textual comparison: lower-case, anything
 * that is not a letter or digit becomes a space, whitespace runs collapse.
 */
export function normalizeForMatch(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, " ")
    .trim();
}

/**
 * Best-substring similarity (0-100) of the shorter normalised string against
 * the longer one.
 */
export function partialRatio(a: string, b: string): number {
  return fuzz.partial_ratio(normalizeForMatch(a), normalizeForMatch(b), { full_process: false });
}

/** Strictly above the threshold counts as a match. */
export function isFuzzyMatch(a: string, b: string, threshold: number): boolean {
  return partialRatio(a, b) > threshold;
}
