import dotenv from "dotenv";
import { z } from "zod";
import { CLASSIFIER_MAX_INPUT_LENGTH } from "./classifier";
import { ConfigurationError, describeError } from "./errors";
import { DEFAULT_INFERENCE_URL } from "./inference";
import { WEAK_DISAGREEMENT_THRESHOLD } from "./reconciler";
import { SENTIMENT_LABELS } from "./types/sentiment";

export const DEFAULT_CLASSIFIER_MODELS = {
  ternary: "cardiffnlp/twitter-roberta-base-sentiment",
  binary: "distilbert-base-uncased-finetuned-sst-2-english",
} as const;

const configSchema = z.object({
  // Server
  port: z.number().int().positive().default(3001),
  env: z.enum(["development", "production", "test"]).default("development"),

  // Classifier
  classifierLabelSet: z.enum(["ternary", "binary"]).default("ternary"),
  classifierLabelMap: z.record(z.string(), z.enum(SENTIMENT_LABELS)).optional(),
  classifierModel: z.string().min(1).optional(),
  inferenceUrl: z.string().url().default(DEFAULT_INFERENCE_URL),
  huggingFaceToken: z.string().min(1).optional(),
  maxInputLength: z.number().int().positive().default(CLASSIFIER_MAX_INPUT_LENGTH),

  // Reconciliation
  weakDisagreementThreshold: z
    .number()
    .min(0)
    .max(1)
    .default(WEAK_DISAGREEMENT_THRESHOLD),
  scorerTimeoutMs: z.number().int().positive().default(15000),
});

type ParsedConfig = z.infer<typeof configSchema>;
type Config = Omit<ParsedConfig, "classifierModel"> & { classifierModel: string };

const toNumber = (value: string | undefined) =>
  value === undefined || value === "" ? undefined : Number(value);

const toOptional = (value: string | undefined) =>
  value === undefined || value === "" ? undefined : value;

function parseLabelMap(value: string | undefined): unknown {
  if (value === undefined || value === "") return undefined;
  try {
    return JSON.parse(value);
  } catch (error) {
    throw new ConfigurationError(
      `CLASSIFIER_LABEL_MAP is not valid JSON: ${describeError(error)}`,
      { cause: error }
    );
  }
}

export function parseConfig(env: NodeJS.ProcessEnv): Config {
  const raw = {
    port: toNumber(env.PORT),
    env: toOptional(env.NODE_ENV),
    classifierLabelSet: toOptional(env.CLASSIFIER_LABEL_SET),
    classifierLabelMap: parseLabelMap(env.CLASSIFIER_LABEL_MAP),
    classifierModel: toOptional(env.CLASSIFIER_MODEL),
    inferenceUrl: toOptional(env.HF_INFERENCE_URL),
    huggingFaceToken: toOptional(env.HF_TOKEN),
    maxInputLength: toNumber(env.CLASSIFIER_MAX_INPUT_LENGTH),
    weakDisagreementThreshold: toNumber(env.WEAK_DISAGREEMENT_THRESHOLD),
    scorerTimeoutMs: toNumber(env.SCORER_TIMEOUT_MS),
  };

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const problems = Object.entries(result.error.flatten().fieldErrors).map(
      ([key, errors]) => `${key}: ${(errors ?? []).join(", ")}`
    );
    throw new ConfigurationError(
      `Config validation failed:\n  ${problems.join("\n  ")}`
    );
  }

  return {
    ...result.data,
    classifierModel:
      result.data.classifierModel ??
      DEFAULT_CLASSIFIER_MODELS[result.data.classifierLabelSet],
  };
}

/**
 * Reads `.env` and the process environment. Exits the process when the
 * configuration is invalid.
 */
export function loadConfig(): Config {
  dotenv.config();
  try {
    return parseConfig(process.env);
  } catch (error) {
    console.error(`❌ ${describeError(error)}`);
    process.exit(1);
  }
}

export type { Config };
