import { describe, it, expect } from "vitest";
import { parseConfig } from "../config";
import { ConfigurationError } from "../errors";

describe("parseConfig", () => {
  it("fills in defaults", () => {
    expect(parseConfig({})).toEqual({
      port: 3001,
      env: "development",
      classifierLabelSet: "ternary",
      classifierModel: "cardiffnlp/twitter-roberta-base-sentiment",
      inferenceUrl: "https://api-inference.huggingface.co",
      maxInputLength: 512,
      weakDisagreementThreshold: 0.75,
      scorerTimeoutMs: 15000,
    });
  });

  it("picks the default model for the binary label set", () => {
    const config = parseConfig({ CLASSIFIER_LABEL_SET: "binary" });
    expect(config.classifierModel).toBe(
      "distilbert-base-uncased-finetuned-sst-2-english"
    );
  });

  it("reads values from the environment", () => {
    const config = parseConfig({
      PORT: "8080",
      NODE_ENV: "production",
      CLASSIFIER_MODEL: "my-org/sentiment-model",
      HF_TOKEN: "test-token",
      HF_INFERENCE_URL: "http://localhost:9000",
      CLASSIFIER_MAX_INPUT_LENGTH: "256",
      WEAK_DISAGREEMENT_THRESHOLD: "0.6",
      SCORER_TIMEOUT_MS: "2000",
    });

    expect(config).toMatchObject({
      port: 8080,
      env: "production",
      classifierModel: "my-org/sentiment-model",
      huggingFaceToken: "test-token",
      inferenceUrl: "http://localhost:9000",
      maxInputLength: 256,
      weakDisagreementThreshold: 0.6,
      scorerTimeoutMs: 2000,
    });
  });

  it("treats empty variables as unset", () => {
    expect(parseConfig({ HF_TOKEN: "", PORT: "" })).toMatchObject({
      port: 3001,
      huggingFaceToken: undefined,
    });
  });

  it("parses a custom label map", () => {
    const config = parseConfig({
      CLASSIFIER_LABEL_MAP: '{"bad":"Negative","good":"Positive"}',
    });
    expect(config.classifierLabelMap).toEqual({ bad: "Negative", good: "Positive" });
  });

  it("rejects a label map that is not JSON", () => {
    expect(() => parseConfig({ CLASSIFIER_LABEL_MAP: "{bad" })).toThrow(
      /^CLASSIFIER_LABEL_MAP is not valid JSON/
    );
  });

  it("rejects label map targets outside the taxonomy", () => {
    expect(() =>
      parseConfig({ CLASSIFIER_LABEL_MAP: '{"LABEL_0":"Bad"}' })
    ).toThrow(/classifierLabelMap/);
  });

  it.each([
    { env: { WEAK_DISAGREEMENT_THRESHOLD: "1.5" }, field: /weakDisagreementThreshold/ },
    { env: { PORT: "abc" }, field: /port/ },
    { env: { CLASSIFIER_LABEL_SET: "quaternary" }, field: /classifierLabelSet/ },
    { env: { SCORER_TIMEOUT_MS: "-5" }, field: /scorerTimeoutMs/ },
  ])("rejects invalid values %#", ({ env, field }) => {
    expect(() => parseConfig(env)).toThrow(ConfigurationError);
    expect(() => parseConfig(env)).toThrow(field);
  });
});
