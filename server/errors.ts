import type { AnalyzerFailure, AnalyzerName } from "./types/sentiment";

export class SentimentAnalysisError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Reserved for input validation. Over-long text is truncated, not rejected,
 * so nothing in the analyzers throws this today.
 */
export class InputError extends SentimentAnalysisError {}

export class ConfigurationError extends SentimentAnalysisError {}

/**
 * A native label the normalizer's table does not know. Usually means the
 * underlying model's label set changed.
 */
export class UnknownLabelError extends ConfigurationError {
  readonly nativeLabel: string;
  readonly table: string;

  constructor(nativeLabel: string, table: string) {
    super(`Unknown label "${nativeLabel}" for label table "${table}"`);
    this.nativeLabel = nativeLabel;
    this.table = table;
  }
}

export class ScorerUnavailableError extends SentimentAnalysisError {
  readonly analyzer: AnalyzerName;
  readonly reason: AnalyzerFailure["reason"];

  constructor(
    analyzer: AnalyzerName,
    message: string,
    reason: AnalyzerFailure["reason"] = "unavailable",
    options?: ErrorOptions
  ) {
    super(message, options);
    this.analyzer = analyzer;
    this.reason = reason;
  }

  toFailure(): AnalyzerFailure {
    return {
      analyzer: this.analyzer,
      reason: this.reason,
      message: this.message,
    };
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return String(error);
}
