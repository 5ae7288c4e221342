export const responseColumn = (model: string): string => `response_${model}`;
export const errorColumn = (model: string): string => `response_${model}_ERROR`;
export const correctnessColumn = (model: string): string => `correctness_${model}_FUZZY_MATCH`;

export const linePredictionColumn = (model: string): string => `line_pred_${model}`;
export const lineExactColumn = (model: string): string => `line_exact_${model}`;
export const lineWithin5Column = (model: string): string => `line_within5_${model}`;
export const lineWithin20Column = (model: string): string => `line_within20_${model}`;

export const GROUND_TRUTH_TEXT_COLUMN = "answer_quote_text";
export const GROUND_TRUTH_LINE_COLUMN = "answer_quote_idx";

export const NOT_IN_SOURCE_ERROR = "Model generated window not found in primary source";
