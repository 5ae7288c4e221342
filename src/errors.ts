/**
 * Missing or invalid run-level configuration (API key, prompt version, input
 * paths). Raised before any remote call is issued.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * A prompt could not be rendered for one row. Recorded as a row-level error;
 * the row never reaches the remote API.
 */
export class PromptConstructionError extends Error {
  constructor(
    message: string,
    readonly field?: string,
  ) {
    super(message);
    this.name = "PromptConstructionError";
  }
}

export class AlignmentError extends Error {
  constructor(
    message: string,
    readonly path?: string,
  ) {
    super(message);
    this.name = "AlignmentError";
  }
}
