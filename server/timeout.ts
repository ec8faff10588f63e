import { ConfigurationError, ScorerUnavailableError } from "./errors";
import type { AnalyzerName } from "./types/sentiment";

export interface ScoreOptions {
  timeoutMs?: number;
}

/**
 * Runs one scorer invocation under an optional deadline. When the deadline
 * passes first the task's signal is aborted and the call rejects with a
 * timeout ScorerUnavailableError; whatever the task produces later is
 * discarded.
 */
export async function runWithTimeout<T>(
  analyzer: AnalyzerName,
  timeoutMs: number | undefined,
  task: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  if (timeoutMs === undefined) {
    return task(controller.signal);
  }
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new ConfigurationError(
      `Timeout for the ${analyzer} analyzer must be a positive number of milliseconds, got ${timeoutMs}`
    );
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(
        new ScorerUnavailableError(
          analyzer,
          `${analyzer} analyzer timed out after ${timeoutMs} ms`,
          "timeout"
        )
      );
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
