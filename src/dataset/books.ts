import { readFile } from "node:fs/promises";

import { z } from "zod";

/** Normalised book key → ordered sentences (or lines) of that book. */
export type BookCorpus = Readonly<Record<string, readonly string[]>>;

const bookCorpusSchema = z.record(z.string(), z.array(z.string()));

/**
 * Corpus keys are book titles lower-cased with spaces replaced by underscores,
 * so `"Aeneid 1"` and `"aeneid_1"` address the same entry.
 */
export function normalizeBookKey(title: string): string {
  return title.replace(/ /gu, "_").toLowerCase();
}

export function parseBookCorpus(value: unknown): BookCorpus {
  return bookCorpusSchema.parse(value);
}

export async function loadBookCorpus(filePath: string): Promise<BookCorpus> {
  const text = await readFile(filePath, "utf8");
  return parseBookCorpus(JSON.parse(text));
}

/**
 * Looks a book up by its normalised key, falling back to the raw title for
 * corpora keyed by display title.
 */
export function findBook(corpus: BookCorpus, title: string): readonly string[] | undefined {
  return corpus[normalizeBookKey(title)] ?? corpus[title];
}
