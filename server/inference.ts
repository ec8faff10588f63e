import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import type { NativePrediction, TextClassificationBackend } from "./classifier";

export const DEFAULT_INFERENCE_URL = "https://api-inference.huggingface.co";

const predictionSchema = z.object({
  label: z.union([z.string(), z.number()]),
  score: z.number(),
});

// The API answers with one list per input; older deployments return it flat.
const flatResponseSchema = z.array(predictionSchema);
const nestedResponseSchema = z.array(flatResponseSchema).length(1);

export interface HuggingFaceInferenceOptions {
  model: string;
  baseURL?: string;
  token?: string;
}

export function parsePredictions(data: unknown): NativePrediction[] {
  const nested = nestedResponseSchema.safeParse(data);
  if (nested.success) {
    return nested.data[0];
  }
  const flat = flatResponseSchema.safeParse(data);
  if (!flat.success) {
    throw new Error(
      `Unexpected inference response: ${flat.error.issues
        .map((issue) => issue.message)
        .join(", ")}`
    );
  }
  return flat.data;
}

function describeStatus(status: number | undefined): string | undefined {
  if (status === 401 || status === 403) {
    return "Hugging Face rejected the API token";
  } else if (status === 404) {
    return "Model not found on the inference API";
  } else if (status === 429) {
    return "Too many requests to the inference API";
  } else if (status === 503) {
    return "Model is still loading on the inference API";
  } else if (status !== undefined && status >= 500) {
    return "Inference API server error";
  }
  return undefined;
}

export function createInferenceClient(
  options: Omit<HuggingFaceInferenceOptions, "model">
): AxiosInstance {
  const client = axios.create({
    baseURL: options.baseURL ?? DEFAULT_INFERENCE_URL,
    headers: {
      "Content-Type": "application/json",
      ...(options.token ? { Authorization: `Bearer ${options.token}` } : {}),
    },
  });

  // Map transport failures onto readable messages
  client.interceptors.response.use(
    (response) => response,
    (error: unknown) => {
      if (!axios.isAxiosError(error) || axios.isCancel(error)) {
        return Promise.reject(error);
      }
      const described = describeStatus(error.response?.status);
      if (described) {
        return Promise.reject(
          new Error(`${described} (HTTP ${error.response?.status})`, {
            cause: error,
          })
        );
      }
      if (!error.response) {
        return Promise.reject(
          new Error(`No response from the inference API: ${error.message}`, {
            cause: error,
          })
        );
      }
      return Promise.reject(error);
    }
  );

  return client;
}

/**
 * Text classification through the Hugging Face Inference API. The HTTP
 * client is built once at startup and shared by every request.
 */
export class HuggingFaceInferenceBackend implements TextClassificationBackend {
  readonly model: string;
  private readonly client: AxiosInstance;

  constructor(options: HuggingFaceInferenceOptions, client?: AxiosInstance) {
    this.model = options.model;
    this.client = client ?? createInferenceClient(options);
  }

  async classify(text: string, signal: AbortSignal): Promise<NativePrediction[]> {
    const response = await this.client.post<unknown>(
      `/models/${this.model}`,
      { inputs: text, options: { wait_for_model: true } },
      { signal }
    );
    return parsePredictions(response.data);
  }
}
