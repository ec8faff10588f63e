// Taxonomy order doubles as the tie-break order for classifier labels.
export const SENTIMENT_LABELS = ["Positive", "Neutral", "Negative"] as const;
export type SentimentLabel = (typeof SENTIMENT_LABELS)[number];

export const COMPARISON_VERDICTS = [
  "Agree",
  "WeakDisagreeNeutral",
  "Disagree",
] as const;
export type ComparisonVerdict = (typeof COMPARISON_VERDICTS)[number];

export type AnalyzerName = "lexicon" | "classifier";

export interface SentimentScores {
  compound: number;
  pos: number;
  neu: number;
  neg: number;
}

export interface LexiconDistribution {
  readonly positive: number;
  readonly neutral: number;
  readonly negative: number;
}

export interface LexiconResult {
  readonly compound: number; // -1..1
  readonly distribution: LexiconDistribution; // independent intensities
  readonly label: SentimentLabel;
}

export type LabelDistribution = Readonly<Record<SentimentLabel, number>>;

export type ClassifierShape = "binary" | "ternary";

export interface ClassifierResult {
  readonly label: SentimentLabel;
  readonly distribution: LabelDistribution; // sums to 1
  readonly confidence: number; // distribution[label]
  readonly shape: ClassifierShape;
  readonly truncated: boolean;
}

export interface Comparison {
  readonly verdict: ComparisonVerdict;
  readonly rationale: string;
}

export interface AnalyzerFailure {
  readonly analyzer: AnalyzerName;
  readonly reason: "timeout" | "unavailable";
  readonly message: string;
}

export type ScorerOutcome<T> =
  | { readonly status: "fulfilled"; readonly result: T }
  | { readonly status: "failed"; readonly failure: AnalyzerFailure };

export interface CompleteAnalysisReport {
  readonly status: "complete";
  readonly lexicon: LexiconResult;
  readonly classifier: ClassifierResult;
  readonly verdict: ComparisonVerdict;
  readonly rationale: string;
}

export interface IncompleteAnalysisReport {
  readonly status: "incomplete";
  readonly lexicon: LexiconResult | null;
  readonly classifier: ClassifierResult | null;
  readonly failures: readonly AnalyzerFailure[];
  readonly rationale: string;
}

export type AnalysisReport = CompleteAnalysisReport | IncompleteAnalysisReport;

export function isSentimentLabel(value: unknown): value is SentimentLabel {
  return (
    typeof value === "string" &&
    (SENTIMENT_LABELS as readonly string[]).includes(value)
  );
}
