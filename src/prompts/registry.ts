import fs from "node:fs";
import { fileURLToPath } from "node:url";

import { ConfigurationError } from "../errors.js";

export type PromptTask = 1 | 2 | 3 | 4;

export const PROMPT_TASKS: readonly PromptTask[] = [1, 2, 3, 4];

export type PromptDefinition = {
  readonly description: string;
};

/**
 * Versioned templates per task. The template text lives in
 * `templates/task<N>/<version>.md`.
 *
 * - task1: full book text in context, quote selection.
 * - task2: no book text, quote selection from parametric knowledge.
 * - task3: full book text with traditional line numbers, line prediction.
 * - task4: no book text, line prediction.
 */
export const PROMPT_REGISTRY: Readonly<Record<PromptTask, Readonly<Record<string, PromptDefinition>>>> = {
  1: {
    v1_relic_simple: { description: "Window selection with explicit book text and simple output." },
    v1_relic_explanation: { description: "Window selection with brief rationale." },
    v1_text_simple: { description: "Exact text selection with explicit book text." },
    v1_text_simple_edited: { description: "Window selection constrained to 1-10 words." },
  },
  2: {
    v1_text_simple: { description: "Text selection without book context." },
  },
  3: {
    v1_line_simple: { description: "Line number prediction with traditional line numbers." },
  },
  4: {
    v1: { description: "Line number prediction without book context." },
  },
};

const TEMPLATES_DIR = fileURLToPath(new URL("./templates/", import.meta.url));

const templateCache = new Map<string, string>();

export function isPromptTask(value: number): value is PromptTask {
  return PROMPT_TASKS.some((task) => task === value);
}

export function parsePromptTask(raw: string): PromptTask {
  const value = Number(raw);
  if (!isPromptTask(value)) {
    throw new ConfigurationError(`Invalid task type: ${raw}. Expected one of ${PROMPT_TASKS.join(", ")}.`);
  }
  return value;
}

export function listPromptVersions(task: PromptTask): string[] {
  return Object.keys(PROMPT_REGISTRY[task]);
}

export function assertPromptVersion(task: PromptTask, version: string): void {
  if (!Object.hasOwn(PROMPT_REGISTRY[task], version)) {
    throw new ConfigurationError(
      `Invalid version '${version}' for task${task}. Available: ${listPromptVersions(task).join(", ")}`,
    );
  }
}

export function getPromptTemplate(task: PromptTask, version: string): string {
  assertPromptVersion(task, version);
  const key = `task${task}/${version}`;
  const cached = templateCache.get(key);
  if (cached !== undefined) {
    return cached;
  }
  const text = fs.readFileSync(`${TEMPLATES_DIR}${key}.md`, "utf8").replace(/\r?\n$/u, "");
  templateCache.set(key, text);
  return text;
}
