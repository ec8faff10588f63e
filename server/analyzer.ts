import { ClassifierScorer } from "./classifier";
import type { Config } from "./config";
import { ScorerUnavailableError } from "./errors";
import { HuggingFaceInferenceBackend } from "./inference";
import { createClassifierNormalizer } from "./labels";
import {
  DEFAULT_POLICY,
  createReconciliationPolicy,
  reconcile,
  type ReconciliationPolicy,
} from "./reconciler";
import { LexiconScorer } from "./sentiment";
import type { AnalysisReport, ScorerOutcome } from "./types/sentiment";

export interface AnalyzeOptions {
  timeoutMs?: number;
}

export interface SentimentAnalyzerOptions {
  lexicon: LexiconScorer;
  classifier: ClassifierScorer;
  policy?: ReconciliationPolicy;
  timeoutMs?: number;
}

async function settle<T>(pending: Promise<T>): Promise<ScorerOutcome<T>> {
  try {
    return { status: "fulfilled", result: await pending };
  } catch (error) {
    // Only unavailability is recoverable; label table mismatches propagate
    if (error instanceof ScorerUnavailableError) {
      console.warn(`⚠️ ${error.analyzer} analyzer failed: ${error.message}`);
      return { status: "failed", failure: error.toFailure() };
    }
    throw error;
  }
}

export class SentimentAnalyzer {
  readonly policy: ReconciliationPolicy;
  private readonly lexicon: LexiconScorer;
  private readonly classifier: ClassifierScorer;
  private readonly timeoutMs: number | undefined;

  constructor(options: SentimentAnalyzerOptions) {
    this.lexicon = options.lexicon;
    this.classifier = options.classifier;
    this.policy = options.policy ?? DEFAULT_POLICY;
    this.timeoutMs = options.timeoutMs;
  }

  /**
   * Runs both scorers side by side and reconciles them. A scorer that times
   * out or cannot be reached yields an incomplete report instead of an
   * error.
   */
  async analyze(text: string, options: AnalyzeOptions = {}): Promise<AnalysisReport> {
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    console.log(`🔍 Analyzing text (${text.length} chars)`);

    const [lexicon, classifier] = await Promise.all([
      settle(this.lexicon.score(text, { timeoutMs })),
      settle(this.classifier.score(text, { timeoutMs })),
    ]);
    const report = reconcile(lexicon, classifier, this.policy);

    console.log(
      report.status === "complete"
        ? `✅ Analysis complete: ${report.verdict}`
        : `⚠️ Analysis incomplete: ${report.failures.length} analyzer(s) failed`
    );
    return report;
  }
}

/**
 * Builds the analyzer and the resources it holds (lexicon engine, inference
 * client, label tables) once, at process start.
 */
export function createSentimentAnalyzer(config: Config): SentimentAnalyzer {
  const backend = new HuggingFaceInferenceBackend({
    model: config.classifierModel,
    baseURL: config.inferenceUrl,
    token: config.huggingFaceToken,
  });

  return new SentimentAnalyzer({
    lexicon: new LexiconScorer(),
    classifier: new ClassifierScorer({
      backend,
      normalizer: createClassifierNormalizer(
        config.classifierLabelSet,
        config.classifierLabelMap
      ),
      maxInputLength: config.maxInputLength,
    }),
    policy: createReconciliationPolicy(config.weakDisagreementThreshold),
    timeoutMs: config.scorerTimeoutMs,
  });
}
