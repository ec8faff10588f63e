import type {
  AnalysisReport,
  ClassifierResult,
  LexiconResult,
  SentimentLabel,
} from "./types/sentiment";

const EMOJI: Record<SentimentLabel, string> = {
  Positive: "😊",
  Negative: "😞",
  Neutral: "😐",
};

export function sentimentEmoji(label: SentimentLabel): string {
  return EMOJI[label];
}

const fixed = (value: number) => value.toFixed(3);
const percent = (value: number) => `${(value * 100).toFixed(1)}%`;

function formatLexicon(result: LexiconResult): string[] {
  return [
    `📊 Lexicon (VADER): ${sentimentEmoji(result.label)} ${result.label}`,
    `   Compound: ${fixed(result.compound)}`,
    `   Positive: ${fixed(result.distribution.positive)}, Neutral: ${fixed(
      result.distribution.neutral
    )}, Negative: ${fixed(result.distribution.negative)}`,
  ];
}

function formatClassifier(result: ClassifierResult): string[] {
  const lines = [
    `🤗 Classifier (${result.shape}): ${sentimentEmoji(result.label)} ${
      result.label
    }`,
    `   Confidence: ${percent(result.confidence)}`,
    `   Positive: ${fixed(result.distribution.Positive)}, Neutral: ${fixed(
      result.distribution.Neutral
    )}, Negative: ${fixed(result.distribution.Negative)}`,
  ];
  if (result.truncated) {
    lines.push("   Input was truncated to the classifier's context budget");
  }
  return lines;
}

/**
 * Renders a report as terminal lines: one block per analyzer, then the
 * comparison.
 */
export function formatReport(report: AnalysisReport): string[] {
  const lines: string[] = [];
  if (report.lexicon) lines.push(...formatLexicon(report.lexicon));
  if (report.classifier) lines.push(...formatClassifier(report.classifier));

  if (report.status === "complete") {
    const icon =
      report.verdict === "Agree"
        ? "✅"
        : report.verdict === "WeakDisagreeNeutral"
          ? "ℹ️"
          : "⚠️";
    lines.push(`${icon} ${report.verdict}: ${report.rationale}`);
  } else {
    for (const failure of report.failures) {
      lines.push(`❌ ${failure.analyzer} analyzer (${failure.reason}): ${failure.message}`);
    }
    lines.push(`⚠️ ${report.rationale}`);
  }
  return lines;
}
