import { findBook, normalizeBookKey, type BookCorpus } from "../dataset/books.js";
import type { InputRow } from "../dataset/inputRows.js";
import { PromptConstructionError } from "../errors.js";
import { getPromptTemplate, type PromptTask } from "./registry.js";

/**
 * Substitutes `{name}` placeholders in one pass. Placeholder-like text inside
 * substituted values is left alone.
 */
export function renderTemplate(template: string, values: Readonly<Record<string, string>>): string {
  return template.replace(/\{([A-Za-z_][A-Za-z0-9_]*)\}/gu, (_match, name: string) => {
    const value = values[name];
    if (value === undefined) {
      throw new PromptConstructionError(`Prompt template references unknown field '${name}'.`, name);
    }
    return value;
  });
}

/** Prefixes each line with its 1-based traditional line number. */
export function numberLines(lines: readonly string[]): string {
  return lines.map((line, index) => `${index + 1} ${line}`).join("\n");
}

function requireBook(row: InputRow, books: BookCorpus | undefined): readonly string[] {
  const book = books ? findBook(books, row.bookTitle) : undefined;
  if (!book) {
    throw new PromptConstructionError(
      `Book content for '${row.bookTitle}' not found in provided JSON.`,
      "book_title",
    );
  }
  return book;
}

export type PromptBuilder = (row: InputRow) => string;

/**
 * Builds the prompt for one row. Throws {@link PromptConstructionError} when
 * the row lacks `Full_Mask_comment` or, for tasks that carry the book text,
 * when the book is absent from the corpus.
 */
export function buildPrompt(
  row: InputRow,
  task: PromptTask,
  version: string,
  books?: BookCorpus,
): string {
  if (row.fullMaskComment.trim() === "") {
    throw new PromptConstructionError(
      "Missing required field 'Full_Mask_comment' in input row.",
      "Full_Mask_comment",
    );
  }
  const template = getPromptTemplate(task, version);
  const bookTitle = row.bookTitle === "" ? "Unknown Book" : row.bookTitle;

  let bookSentences = "";
  let numbered = "";
  if (task === 1) {
    bookSentences = requireBook(row, books).join(" ");
  } else if (task === 3) {
    numbered = numberLines(requireBook(row, books));
    bookSentences = numbered;
  }

  const values: Record<string, string> = {
    book_title: bookTitle,
    book_title_snake_case: normalizeBookKey(bookTitle),
    book_sentences: bookSentences,
    lit_analysis_excerpt: row.fullMaskComment,
  };
  if (task === 3) {
    values.book_sentences_with_line_numbers = numbered;
  }
  return renderTemplate(template, values);
}

export function createPromptBuilder(task: PromptTask, version: string, books?: BookCorpus): PromptBuilder {
  return (row) => buildPrompt(row, task, version, books);
}
