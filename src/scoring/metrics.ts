export type ValidityMetrics = {
  /** Rows with a non-empty response and a reference text. */
  readonly evaluated: number;
  readonly valid: number;
  readonly invalid: number;
  /** Non-empty responses whose book is absent from the corpus. */
  readonly missingReference: number;
  readonly validRate: number | null;
};

export type CorrectnessMetrics = {
  /** Denominator: every row in the subset, scored or not. */
  readonly n: number;
  readonly scored: number;
  readonly correct: number;
  readonly incorrect: number;
  readonly indeterminate: number;
  readonly accuracy: number | null;
  readonly averageLengthRatio: number | null;
};

export type LineDistanceMetrics = {
  readonly total: number;
  /** Rows with a ground-truth line number; the denominator of every rate. */
  readonly evaluable: number;
  /** Rows with both a ground-truth line and a predicted line. */
  readonly totalValid: number;
  readonly exact: number;
  readonly within5: number;
  readonly within20: number;
  readonly missingPrediction: number;
  readonly exactRate: number | null;
  readonly within5Rate: number | null;
  readonly within20Rate: number | null;
};

export type MetricsReport = {
  total: number;
  validity?: ValidityMetrics;
  correctness?: CorrectnessMetrics;
  lineDistance?: LineDistanceMetrics;
};

/** model → subset → report. */
export type MetricsSummary = Record<string, Record<string, MetricsReport>>;

export function ratio(numerator: number, denominator: number): number | null {
  return denominator > 0 ? numerator / denominator : null;
}

export function formatPercent(value: number | null): string {
  return value === null ? "N/A" : `${(value * 100).toFixed(1)}%`;
}

export function subsetReport(summary: MetricsSummary, model: string, subset: string): MetricsReport {
  const byModel = (summary[model] ??= {});
  return (byModel[subset] ??= { total: 0 });
}

export function bookSubsetName(bookTitle: string): string {
  return `book:${bookTitle}`;
}
