import { vi } from "vitest";
import type { NativePrediction, TextClassificationBackend } from "../classifier";
import type { PolarityEngine } from "../sentiment";
import type {
  ClassifierResult,
  LexiconResult,
  SentimentLabel,
  SentimentScores,
} from "../types/sentiment";

/** Polarity engine that always answers with the same scores. */
export function createFakeEngine(scores: Partial<SentimentScores> = {}) {
  const polarityScores = vi.fn(
    (_text: string): SentimentScores => ({
      compound: 0,
      pos: 0,
      neu: 1,
      neg: 0,
      ...scores,
    })
  );
  return { polarityScores } satisfies PolarityEngine;
}

/** Classification backend that resolves to fixed predictions. */
export function createFakeBackend(predictions: NativePrediction[]) {
  const classify = vi.fn(
    async (_text: string, _signal: AbortSignal) => predictions
  );
  return { classify } satisfies TextClassificationBackend;
}

/** Backend that only settles once its request is aborted. */
export function createHangingBackend() {
  const signals: AbortSignal[] = [];
  const classify = vi.fn(
    (_text: string, signal: AbortSignal) =>
      new Promise<NativePrediction[]>((_, reject) => {
        signals.push(signal);
        signal.addEventListener("abort", () =>
          reject(new Error("request aborted"))
        );
      })
  );
  return { classify, signals } satisfies TextClassificationBackend & {
    signals: AbortSignal[];
  };
}

export function lexiconResult(
  compound: number,
  label: SentimentLabel
): LexiconResult {
  return {
    compound,
    distribution: { positive: 0, neutral: 1, negative: 0 },
    label,
  };
}

/** Binary-shaped classifier result with `confidence` on `label`. */
export function classifierResult(
  label: Exclude<SentimentLabel, "Neutral">,
  confidence: number
): ClassifierResult {
  const other = 1 - confidence;
  return {
    label,
    distribution: {
      Positive: label === "Positive" ? confidence : other,
      Neutral: 0,
      Negative: label === "Negative" ? confidence : other,
    },
    confidence,
    shape: "binary",
    truncated: false,
  };
}
