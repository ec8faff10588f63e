import { ConfigurationError, UnknownLabelError } from "./errors";
import {
  SENTIMENT_LABELS,
  isSentimentLabel,
  type ClassifierShape,
  type SentimentLabel,
} from "./types/sentiment";

export type LabelTable = Readonly<Record<string, SentimentLabel>>;

export const LEXICON_LABEL_TABLE = {
  positive: "Positive",
  neutral: "Neutral",
  negative: "Negative",
} as const satisfies LabelTable;

// cardiffnlp/twitter-roberta-base-sentiment and its successors
export const TERNARY_LABEL_TABLE = {
  LABEL_0: "Negative",
  LABEL_1: "Neutral",
  LABEL_2: "Positive",
  negative: "Negative",
  neutral: "Neutral",
  positive: "Positive",
  "0": "Negative",
  "1": "Neutral",
  "2": "Positive",
} as const satisfies LabelTable;

// SST-2 style models (distilbert-base-uncased-finetuned-sst-2-english)
export const BINARY_LABEL_TABLE = {
  NEGATIVE: "Negative",
  POSITIVE: "Positive",
  LABEL_0: "Negative",
  LABEL_1: "Positive",
  "0": "Negative",
  "1": "Positive",
} as const satisfies LabelTable;

export const CLASSIFIER_LABEL_SETS = {
  ternary: TERNARY_LABEL_TABLE,
  binary: BINARY_LABEL_TABLE,
} as const;

export type ClassifierLabelSet = keyof typeof CLASSIFIER_LABEL_SETS;

/**
 * Maps analyzer-native label tokens onto the shared taxonomy.
 *
 * The table is validated once, here. Lookups are exact and never fall back
 * to a default: an unrecognized token throws {@link UnknownLabelError}.
 * Class indices are looked up under their decimal string.
 */
export class LabelNormalizer {
  readonly name: string;
  readonly targets: ReadonlySet<SentimentLabel>;
  private readonly table: ReadonlyMap<string, SentimentLabel>;

  constructor(name: string, table: Readonly<Record<string, string>>) {
    const entries = Object.entries(table);
    if (entries.length === 0) {
      throw new ConfigurationError(`Label table "${name}" is empty`);
    }

    const mapping = new Map<string, SentimentLabel>();
    for (const [nativeLabel, target] of entries) {
      if (nativeLabel.trim().length === 0) {
        throw new ConfigurationError(
          `Label table "${name}" contains an empty native label`
        );
      }
      if (!isSentimentLabel(target)) {
        throw new ConfigurationError(
          `Label table "${name}" maps "${nativeLabel}" to "${target}", expected one of ${SENTIMENT_LABELS.join(", ")}`
        );
      }
      mapping.set(nativeLabel, target);
    }

    const targets = new Set(mapping.values());
    if (!targets.has("Positive") || !targets.has("Negative")) {
      throw new ConfigurationError(
        `Label table "${name}" must map onto both Positive and Negative`
      );
    }

    this.name = name;
    this.table = mapping;
    this.targets = targets;
  }

  get shape(): ClassifierShape {
    return this.targets.has("Neutral") ? "ternary" : "binary";
  }

  normalize(nativeLabel: string | number): SentimentLabel {
    const key = typeof nativeLabel === "number" ? indexKey(nativeLabel) : nativeLabel;
    const label = key === undefined ? undefined : this.table.get(key);
    if (label === undefined) {
      throw new UnknownLabelError(String(nativeLabel), this.name);
    }
    return label;
  }
}

function indexKey(index: number): string | undefined {
  return Number.isInteger(index) && index >= 0 ? String(index) : undefined;
}

export function createLexiconNormalizer(): LabelNormalizer {
  return new LabelNormalizer("lexicon", LEXICON_LABEL_TABLE);
}

export function createClassifierNormalizer(
  labelSet: ClassifierLabelSet,
  overrides?: Readonly<Record<string, string>>
): LabelNormalizer {
  if (overrides) {
    return new LabelNormalizer(`${labelSet} (custom)`, overrides);
  }
  return new LabelNormalizer(labelSet, CLASSIFIER_LABEL_SETS[labelSet]);
}
