import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";

export const DEFAULT_HEADING_KEYWORDS = ["LIBER"] as const;

export type MarkdownCorpusOptions = {
  /** Key prefix, normally the source file name without its extension. */
  readonly stem: string;
  readonly keepBlank?: boolean;
  /** Line prefixes treated as headings besides `#`. */
  readonly headingKeywords?: readonly string[];
};

export type MarkdownCorpus = Record<string, string[]>;

export function isHeadingLine(line: string, keywords: readonly string[]): boolean {
  const stripped = line.trimStart();
  return stripped.startsWith("#") || keywords.some((keyword) => stripped.startsWith(keyword));
}

export function headingText(line: string): string {
  return line.trimStart().replace(/^#+/u, "").trim();
}

function cleanLines(lines: readonly string[], keepBlank: boolean): string[] {
  return lines.map((line) => line.trim()).filter((line) => keepBlank || line !== "");
}

function splitLines(text: string): string[] {
  const lines = text.split(/\r\n|\r|\n/u);
  if (lines.at(-1) === "") {
    lines.pop();
  }
  return lines;
}

/**
 * Splits a book into sections at heading lines. Each section is keyed
 * `<stem>_<heading>` and holds the trimmed lines below the heading. Text
 * before the first heading is dropped; a file without headings becomes a
 * single `<stem>_default` section.
 */
export function splitMarkdownCorpus(text: string, options: MarkdownCorpusOptions): MarkdownCorpus {
  const keepBlank = options.keepBlank ?? false;
  const keywords = options.headingKeywords ?? DEFAULT_HEADING_KEYWORDS;
  const sections: MarkdownCorpus = {};
  let currentKey: string | null = null;
  let buffer: string[] = [];

  const flush = () => {
    if (currentKey !== null) {
      sections[currentKey] = cleanLines(buffer, keepBlank);
    }
  };

  for (const line of splitLines(text)) {
    if (isHeadingLine(line, keywords)) {
      flush();
      currentKey = `${options.stem}_${headingText(line)}`;
      buffer = [];
    } else {
      buffer.push(line);
    }
  }
  flush();

  if (Object.keys(sections).length === 0) {
    sections[`${options.stem}_default`] = cleanLines(buffer, keepBlank);
  }
  return sections;
}

export type ConvertMarkdownCorpusOptions = {
  readonly keepBlank?: boolean;
  /** Added to {@link DEFAULT_HEADING_KEYWORDS}. */
  readonly extraHeadingKeywords?: readonly string[];
};

export type ConvertMarkdownCorpusResult = {
  readonly sections: number;
  readonly totalLines: number;
  readonly keys: readonly string[];
};

export async function convertMarkdownCorpus(
  inputPath: string,
  outputPath: string,
  options: ConvertMarkdownCorpusOptions = {},
): Promise<ConvertMarkdownCorpusResult> {
  const text = await readFile(inputPath, "utf8");
  const corpus = splitMarkdownCorpus(text, {
    stem: path.parse(inputPath).name,
    keepBlank: options.keepBlank ?? false,
    headingKeywords: [...DEFAULT_HEADING_KEYWORDS, ...(options.extraHeadingKeywords ?? [])],
  });
  await mkdir(path.dirname(outputPath), { recursive: true });
  await writeFile(outputPath, `${JSON.stringify(corpus, null, 2)}\n`, "utf8");

  const keys = Object.keys(corpus);
  return {
    sections: keys.length,
    totalLines: Object.values(corpus).reduce((sum, lines) => sum + lines.length, 0),
    keys,
  };
}
