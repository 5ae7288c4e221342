function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/gu, "\\$&");
}

/**
 * Returns the trimmed body of the first `<tag>...</tag>` pair (shortest match,
 * spanning newlines), or `""` when the text is missing or has no such pair.
 */
export function extractTag(text: string | null | undefined, tag: string): string {
  if (typeof text !== "string") {
    return "";
  }
  const name = escapeRegExp(tag);
  const match = new RegExp(`<${name}>([\\s\\S]*?)</${name}>`, "u").exec(text);
  return match?.[1]?.trim() ?? "";
}

export const extractWindow = (text: string | null | undefined): string => extractTag(text, "window");
export const extractText = (text: string | null | undefined): string => extractTag(text, "text");
export const extractLine = (text: string | null | undefined): string => extractTag(text, "line");
