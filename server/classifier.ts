import { ScorerUnavailableError, SentimentAnalysisError, describeError } from "./errors";
import type { LabelNormalizer } from "./labels";
import { runWithTimeout, type ScoreOptions } from "./timeout";
import {
  SENTIMENT_LABELS,
  type ClassifierResult,
  type SentimentLabel,
} from "./types/sentiment";

export const CLASSIFIER_MAX_INPUT_LENGTH = 512;

export interface NativePrediction {
  label: string | number;
  score: number;
}

export interface TextClassificationBackend {
  classify(text: string, signal: AbortSignal): Promise<NativePrediction[]>;
}

export interface ClassifierScorerOptions {
  backend: TextClassificationBackend;
  normalizer: LabelNormalizer;
  maxInputLength?: number;
}

/**
 * Bounds text to `maxLength` code points. Anything past the limit is
 * dropped without error.
 */
export function truncateInput(
  text: string,
  maxLength: number
): { text: string; truncated: boolean } {
  const codePoints = Array.from(text);
  if (codePoints.length <= maxLength) {
    return { text, truncated: false };
  }
  return { text: codePoints.slice(0, maxLength).join(""), truncated: true };
}

/**
 * Highest probability among `candidates`. Ties go to the label that comes
 * first in taxonomy order (Positive, Neutral, Negative).
 */
export function selectLabel(
  distribution: Readonly<Record<SentimentLabel, number>>,
  candidates: ReadonlySet<SentimentLabel>
): SentimentLabel {
  let best: SentimentLabel | undefined;
  for (const label of SENTIMENT_LABELS) {
    if (!candidates.has(label)) continue;
    if (best === undefined || distribution[label] > distribution[best]) {
      best = label;
    }
  }
  if (best === undefined) {
    throw new ScorerUnavailableError("classifier", "Classifier produced no candidate labels");
  }
  return best;
}

export function toClassifierResult(
  predictions: readonly NativePrediction[],
  normalizer: LabelNormalizer,
  truncated = false
): ClassifierResult {
  if (predictions.length === 0) {
    throw new ScorerUnavailableError("classifier", "Classifier returned no predictions");
  }

  const totals: Record<SentimentLabel, number> = {
    Positive: 0,
    Neutral: 0,
    Negative: 0,
  };
  const present = new Set<SentimentLabel>();
  for (const prediction of predictions) {
    const label = normalizer.normalize(prediction.label);
    if (!Number.isFinite(prediction.score) || prediction.score < 0) {
      throw new ScorerUnavailableError(
        "classifier",
        `Classifier returned an invalid score for "${prediction.label}": ${prediction.score}`
      );
    }
    totals[label] += prediction.score;
    present.add(label);
  }

  const total = totals.Positive + totals.Neutral + totals.Negative;
  if (total <= 0) {
    throw new ScorerUnavailableError("classifier", "Classifier scores sum to zero");
  }

  const shape = present.has("Neutral") ? "ternary" : "binary";
  const distribution = Object.freeze({
    Positive: totals.Positive / total,
    Neutral: totals.Neutral / total, // 0 for binary models
    Negative: totals.Negative / total,
  });
  const label = selectLabel(distribution, present);

  return Object.freeze({
    label,
    distribution,
    confidence: distribution[label],
    shape,
    truncated,
  });
}

/**
 * Pretrained text classifier behind a {@link TextClassificationBackend}.
 * Input is bounded to the model's context budget before it is sent.
 */
export class ClassifierScorer {
  private readonly backend: TextClassificationBackend;
  private readonly normalizer: LabelNormalizer;
  private readonly maxInputLength: number;

  constructor(options: ClassifierScorerOptions) {
    this.backend = options.backend;
    this.normalizer = options.normalizer;
    this.maxInputLength = options.maxInputLength ?? CLASSIFIER_MAX_INPUT_LENGTH;
  }

  async score(text: string, options: ScoreOptions = {}): Promise<ClassifierResult> {
    if (text.trim().length === 0) {
      return Object.freeze({
        label: "Neutral",
        distribution: Object.freeze({ Positive: 0, Neutral: 1, Negative: 0 }),
        confidence: 1,
        shape: this.normalizer.shape,
        truncated: false,
      });
    }

    const bounded = truncateInput(text, this.maxInputLength);
    const predictions = await runWithTimeout(
      "classifier",
      options.timeoutMs,
      async (signal) => {
        try {
          return await this.backend.classify(bounded.text, signal);
        } catch (error) {
          if (error instanceof SentimentAnalysisError) throw error;
          throw new ScorerUnavailableError(
            "classifier",
            `Classifier backend failed: ${describeError(error)}`,
            "unavailable",
            { cause: error }
          );
        }
      }
    );

    return toClassifierResult(predictions, this.normalizer, bounded.truncated);
  }
}
