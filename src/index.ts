export { parseCsvList, parseNonNegativeNumber, parsePositiveInt, requireOption } from "./cli/args.js";

export {
  DEFAULT_BATCH_SIZE,
  DEFAULT_CONCURRENCY,
  DEFAULT_CORRECTNESS_THRESHOLD,
  DEFAULT_PROMPT_VERSIONS,
  DEFAULT_RETRY,
  DEFAULT_TEMPERATURE,
  DEFAULT_TIMEOUT_MS,
  FULL_SET,
  SUBSET_COLUMNS,
} from "./config/defaults.js";

export { AlignmentError, ConfigurationError, PromptConstructionError } from "./errors.js";

export {
  formatBooleanCell,
  formatCsvTable,
  hasColumns,
  isBlank,
  isTrueCell,
  parseCsvTable,
  readCsvTable,
  withColumns,
  writeCsvTable,
} from "./dataset/table.js";
export type { Table, TableRow } from "./dataset/table.js";
export { findBook, loadBookCorpus, normalizeBookKey, parseBookCorpus } from "./dataset/books.js";
export type { BookCorpus } from "./dataset/books.js";
export { parseLineNumber, toInputRow, toInputRows } from "./dataset/inputRows.js";
export type { InputRow } from "./dataset/inputRows.js";
export { balancedSample } from "./dataset/sample.js";
export {
  convertMarkdownCorpus,
  DEFAULT_HEADING_KEYWORDS,
  headingText,
  isHeadingLine,
  splitMarkdownCorpus,
} from "./dataset/markdownCorpus.js";
export type {
  ConvertMarkdownCorpusOptions,
  ConvertMarkdownCorpusResult,
  MarkdownCorpus,
  MarkdownCorpusOptions,
} from "./dataset/markdownCorpus.js";
export type { BalancedSampleOptions, BalancedSampleResult, CategoryAllocation } from "./dataset/sample.js";
export {
  COMMENTARY_OUTPUT_COLUMNS,
  commenterFromFileName,
  convertCommentaryRows,
  countSentences,
} from "./dataset/commentary.js";

export {
  assertPromptVersion,
  getPromptTemplate,
  isPromptTask,
  listPromptVersions,
  parsePromptTask,
  PROMPT_REGISTRY,
  PROMPT_TASKS,
} from "./prompts/registry.js";
export type { PromptDefinition, PromptTask } from "./prompts/registry.js";
export { buildPrompt, createPromptBuilder, numberLines, renderTemplate } from "./prompts/buildPrompt.js";
export type { PromptBuilder } from "./prompts/buildPrompt.js";

export { createOpenRouterFetch, getOpenRouterClient, resolveOpenRouterConfig } from "./openrouter/client.js";
export type { OpenRouterClientConfig } from "./openrouter/client.js";
export { createCompletionSubmitter } from "./openrouter/completion.js";
export type { CompletionResult, CompletionSubmitterOptions, SubmitCompletion } from "./openrouter/completion.js";

export { runInference, selectPendingRows } from "./executor/requestExecutor.js";
export type {
  InferenceEvent,
  RecordSink,
  RetrySettings,
  RunInferenceOptions,
  RunInferenceResult,
} from "./executor/requestExecutor.js";

export {
  buildLatestView,
  latestByRow,
  parseLogLines,
  parseLogRecords,
  readLogLines,
  readLogRecords,
  readLogRecordsIfExists,
  recordKey,
  ResumableLog,
  rowKey,
} from "./log/resumableLog.js";
export type { RecordKey } from "./log/resumableLog.js";
export { loggedRecordSchema } from "./log/resultRecord.js";
export type { LoggedRecord, ResultRecord, ResultStatus, UsagePayload } from "./log/resultRecord.js";
export { computeLogStats, roundCost, usageTotals } from "./log/stats.js";
export type { LogStats, ModelLogStats, UsageTotals } from "./log/stats.js";

export { extractLine, extractTag, extractText, extractWindow } from "./align/extract.js";
export { alignLog, alignLogToFile, JOIN_COLUMNS, mergeAlignedTable } from "./align/aligner.js";
export type {
  AlignLogOptions,
  AlignLogResult,
  AlignLogToFileOptions,
  AlignLogToFileResult,
  ExtractionRule,
} from "./align/aligner.js";

export { isFuzzyMatch, normalizeForMatch, partialRatio } from "./scoring/fuzzy.js";
export {
  correctnessColumn,
  errorColumn,
  lineExactColumn,
  linePredictionColumn,
  lineWithin20Column,
  lineWithin5Column,
  responseColumn,
} from "./scoring/columns.js";
export { checkValidity } from "./scoring/validity.js";
export { checkCorrectness } from "./scoring/correctness.js";
export { checkLineNumbers, extractLinePrediction, lineBuckets } from "./scoring/lineNumber.js";
export { DEFAULT_EVAL_MODELS, discoverModels, resolveEvalModels } from "./scoring/models.js";
export { scoreTable } from "./scoring/scoreTable.js";
export type { ScoreMode, ScoreTableOptions, ScoreTableResult } from "./scoring/scoreTable.js";
export { bookSubsetName, formatPercent } from "./scoring/metrics.js";
export type {
  CorrectnessMetrics,
  LineDistanceMetrics,
  MetricsReport,
  MetricsSummary,
  ValidityMetrics,
} from "./scoring/metrics.js";

export { createCallScheduler, createExponentialBackoff } from "./utils/scheduler.js";
export type { CallScheduler, CallSchedulerOptions, CallSchedulerRetryPolicy } from "./utils/scheduler.js";
export { TimeoutError, toError, withTimeout } from "./utils/timeout.js";
export { loadEnvFromFile, loadLocalEnv, readEnvFile, requireEnv } from "./utils/env.js";
export type { EnvSource } from "./utils/env.js";
export { createSeededRandom, shuffled } from "./utils/random.js";
