import { ConfigurationError } from "./errors";
import type {
  AnalysisReport,
  AnalyzerFailure,
  ClassifierResult,
  Comparison,
  LexiconResult,
  ScorerOutcome,
} from "./types/sentiment";

export const WEAK_DISAGREEMENT_THRESHOLD = 0.75;

export interface ReconciliationPolicy {
  readonly weakDisagreementThreshold: number;
}

export function createReconciliationPolicy(
  weakDisagreementThreshold: number = WEAK_DISAGREEMENT_THRESHOLD
): ReconciliationPolicy {
  if (
    !Number.isFinite(weakDisagreementThreshold) ||
    weakDisagreementThreshold < 0 ||
    weakDisagreementThreshold > 1
  ) {
    throw new ConfigurationError(
      `Weak disagreement threshold must be within [0, 1], got ${weakDisagreementThreshold}`
    );
  }
  return Object.freeze({ weakDisagreementThreshold });
}

export const DEFAULT_POLICY = createReconciliationPolicy();

const format = (value: number) => value.toFixed(3);

/**
 * Compares the two analyzers' labels.
 *
 * A Neutral lexicon read against a classifier below the weak-signal
 * threshold counts as compatible. Binary classifiers cannot say Neutral at
 * all, so plain equality would flag every borderline text. The rule is
 * one-sided: a Neutral classifier never softens a non-neutral lexicon read.
 */
export function compare(
  lexicon: LexiconResult,
  classifier: ClassifierResult,
  policy: ReconciliationPolicy = DEFAULT_POLICY
): Comparison {
  if (lexicon.label === classifier.label) {
    return {
      verdict: "Agree",
      rationale: `Both analyzers agree: ${lexicon.label}.`,
    };
  }

  if (
    lexicon.label === "Neutral" &&
    classifier.confidence < policy.weakDisagreementThreshold
  ) {
    return {
      verdict: "WeakDisagreeNeutral",
      rationale: `Lexicon read Neutral while the classifier shows weak ${
        classifier.label
      } sentiment (confidence ${format(classifier.confidence)} < ${
        policy.weakDisagreementThreshold
      }).`,
    };
  }

  return {
    verdict: "Disagree",
    rationale: `Lexicon read ${lexicon.label} (compound ${format(
      lexicon.compound
    )}) but the classifier says ${classifier.label} (confidence ${format(
      classifier.confidence
    )}).`,
  };
}

export function reconcile(
  lexicon: ScorerOutcome<LexiconResult>,
  classifier: ScorerOutcome<ClassifierResult>,
  policy: ReconciliationPolicy = DEFAULT_POLICY
): AnalysisReport {
  if (lexicon.status === "fulfilled" && classifier.status === "fulfilled") {
    const { verdict, rationale } = compare(
      lexicon.result,
      classifier.result,
      policy
    );
    return {
      status: "complete",
      lexicon: lexicon.result,
      classifier: classifier.result,
      verdict,
      rationale,
    };
  }

  const failures: AnalyzerFailure[] = [];
  if (lexicon.status === "failed") failures.push(lexicon.failure);
  if (classifier.status === "failed") failures.push(classifier.failure);

  return {
    status: "incomplete",
    lexicon: lexicon.status === "fulfilled" ? lexicon.result : null,
    classifier: classifier.status === "fulfilled" ? classifier.result : null,
    failures,
    rationale: `Comparison incomplete: ${failures
      .map((failure) => `${failure.analyzer} analyzer failed: ${failure.message}`)
      .join("; ")}`,
  };
}
