import VADER from "vader-sentiment";
import { ScorerUnavailableError, SentimentAnalysisError, describeError } from "./errors";
import { createLexiconNormalizer, type LabelNormalizer } from "./labels";
import { runWithTimeout, type ScoreOptions } from "./timeout";
import type { LexiconResult, SentimentScores } from "./types/sentiment";

export const POSITIVE_COMPOUND_THRESHOLD = 0.05;
export const NEGATIVE_COMPOUND_THRESHOLD = -0.05;

export interface PolarityEngine {
  polarityScores(text: string): SentimentScores;
}

export const vaderEngine: PolarityEngine = {
  polarityScores: (text) =>
    VADER.SentimentIntensityAnalyzer.polarity_scores(text),
};

export function getSentimentLabel(
  compound: number
): "positive" | "negative" | "neutral" {
  if (compound >= POSITIVE_COMPOUND_THRESHOLD) return "positive";
  if (compound <= NEGATIVE_COMPOUND_THRESHOLD) return "negative";
  return "neutral";
}

/**
 * Rule-based scorer over the VADER lexicon. Scores the whole text, with no
 * length limit.
 */
export class LexiconScorer {
  constructor(
    private readonly engine: PolarityEngine = vaderEngine,
    private readonly normalizer: LabelNormalizer = createLexiconNormalizer()
  ) {}

  async score(text: string, options: ScoreOptions = {}): Promise<LexiconResult> {
    return runWithTimeout("lexicon", options.timeoutMs, async () =>
      this.scoreText(text)
    );
  }

  private scoreText(text: string): LexiconResult {
    // Blank input never reaches the engine
    if (text.trim().length === 0) {
      return this.toResult({ compound: 0, pos: 0, neu: 1, neg: 0 });
    }

    let scores: SentimentScores;
    try {
      scores = this.engine.polarityScores(text);
    } catch (error) {
      if (error instanceof SentimentAnalysisError) throw error;
      throw new ScorerUnavailableError(
        "lexicon",
        `Lexicon engine failed: ${describeError(error)}`,
        "unavailable",
        { cause: error }
      );
    }

    const { compound } = scores;
    if (!Number.isFinite(compound) || compound < -1 || compound > 1) {
      throw new ScorerUnavailableError(
        "lexicon",
        `Lexicon engine returned an invalid compound score: ${compound}`
      );
    }
    return this.toResult(scores);
  }

  private toResult(scores: SentimentScores): LexiconResult {
    return Object.freeze({
      compound: scores.compound,
      distribution: Object.freeze({
        positive: scores.pos,
        neutral: scores.neu,
        negative: scores.neg,
      }),
      label: this.normalizer.normalize(getSentimentLabel(scores.compound)),
    });
  }
}
