import { describe, it, expect } from "vitest";
import {
  AxiosError,
  type AxiosAdapter,
  type InternalAxiosRequestConfig,
} from "axios";
import {
  HuggingFaceInferenceBackend,
  createInferenceClient,
  parsePredictions,
} from "../inference";

const MODEL = "cardiffnlp/twitter-roberta-base-sentiment";

/** Inference client whose transport is answered in process. */
function createBackend(adapter: AxiosAdapter) {
  const client = createInferenceClient({
    baseURL: "https://inference.test",
    token: "test-token",
  });
  client.defaults.adapter = adapter;
  return new HuggingFaceInferenceBackend({ model: MODEL }, client);
}

function respondWith(data: unknown): {
  adapter: AxiosAdapter;
  requests: InternalAxiosRequestConfig[];
} {
  const requests: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    requests.push(config);
    return { data, status: 200, statusText: "OK", headers: {}, config };
  };
  return { adapter, requests };
}

function failWith(status: number | undefined, code = "ERR_BAD_RESPONSE"): AxiosAdapter {
  return async (config) => {
    const response =
      status === undefined
        ? undefined
        : { data: {}, status, statusText: "Error", headers: {}, config };
    throw new AxiosError(
      status === undefined ? "connect ECONNREFUSED" : `Request failed with status code ${status}`,
      code,
      config,
      null,
      response
    );
  };
}

describe("parsePredictions", () => {
  it("unwraps the per-input list", () => {
    expect(
      parsePredictions([
        [
          { label: "LABEL_2", score: 0.9 },
          { label: "LABEL_1", score: 0.1 },
        ],
      ])
    ).toEqual([
      { label: "LABEL_2", score: 0.9 },
      { label: "LABEL_1", score: 0.1 },
    ]);
  });

  it("accepts a flat list", () => {
    expect(parsePredictions([{ label: "POSITIVE", score: 0.99 }])).toEqual([
      { label: "POSITIVE", score: 0.99 },
    ]);
  });

  it("rejects anything else", () => {
    expect(() => parsePredictions({ error: "Model is loading" })).toThrow(
      /^Unexpected inference response/
    );
    expect(() => parsePredictions([{ label: "POSITIVE" }])).toThrow(
      /^Unexpected inference response/
    );
  });
});

describe("HuggingFaceInferenceBackend", () => {
  it("posts the text to the model endpoint", async () => {
    const { adapter, requests } = respondWith([[{ label: "LABEL_2", score: 1 }]]);
    const backend = createBackend(adapter);

    const predictions = await backend.classify("great", new AbortController().signal);

    expect(predictions).toEqual([{ label: "LABEL_2", score: 1 }]);
    expect(requests).toHaveLength(1);
    expect(requests[0].baseURL).toBe("https://inference.test");
    expect(requests[0].url).toBe(`/models/${MODEL}`);
    expect(requests[0].method).toBe("post");
    expect(requests[0].headers.Authorization).toBe("Bearer test-token");
    expect(JSON.parse(String(requests[0].data))).toEqual({
      inputs: "great",
      options: { wait_for_model: true },
    });
  });

  it("sends no authorization header without a token", async () => {
    const { adapter, requests } = respondWith([{ label: "POSITIVE", score: 1 }]);
    const client = createInferenceClient({ baseURL: "https://inference.test" });
    client.defaults.adapter = adapter;
    const backend = new HuggingFaceInferenceBackend({ model: MODEL }, client);

    await backend.classify("great", new AbortController().signal);

    expect(requests[0].headers.Authorization).toBeUndefined();
  });

  it.each([
    { status: 401, message: "Hugging Face rejected the API token (HTTP 401)" },
    { status: 404, message: "Model not found on the inference API (HTTP 404)" },
    { status: 429, message: "Too many requests to the inference API (HTTP 429)" },
    { status: 503, message: "Model is still loading on the inference API (HTTP 503)" },
    { status: 502, message: "Inference API server error (HTTP 502)" },
  ])("describes HTTP $status responses", async ({ status, message }) => {
    const backend = createBackend(failWith(status));
    await expect(
      backend.classify("great", new AbortController().signal)
    ).rejects.toThrow(message);
  });

  it("describes requests that got no response", async () => {
    const backend = createBackend(failWith(undefined, "ECONNREFUSED"));
    await expect(
      backend.classify("great", new AbortController().signal)
    ).rejects.toThrow("No response from the inference API: connect ECONNREFUSED");
  });
});
