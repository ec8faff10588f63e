import { Hono } from "hono";
import { cors } from "hono/cors";
import { logger } from "hono/logger";
import { z } from "zod";
import type { SentimentAnalyzer } from "./analyzer";
import type { Config } from "./config";
import { UnknownLabelError, describeError } from "./errors";
import { COMPARISON_VERDICTS, SENTIMENT_LABELS } from "./types/sentiment";

export const MAX_REQUEST_TIMEOUT_MS = 60000;

const analyzeRequestSchema = z.object({
  text: z.string(),
  timeoutMs: z.number().int().positive().max(MAX_REQUEST_TIMEOUT_MS).optional(),
});

export const ENDPOINTS = [
  "GET /health - Health check",
  "GET /api/test - Test endpoint",
  "GET /api/taxonomy - Labels, verdicts and reconciliation settings",
  "POST /api/analyze - Analyze text with both analyzers",
];

export type AppSettings = Pick<
  Config,
  "env" | "classifierLabelSet" | "maxInputLength"
>;

export function createApp(analyzer: SentimentAnalyzer, settings: AppSettings) {
  const app = new Hono();

  app.use("*", logger());

  // Configure CORS based on environment
  app.use(
    "*",
    cors({
      origin:
        settings.env === "production"
          ? "*"
          : [
              "http://localhost:3000",
              "http://localhost:5173",
              "http://localhost:3001",
            ],
      credentials: true,
    })
  );

  app.get("/health", (c) => {
    return c.json({
      status: "OK",
      timestamp: new Date().toISOString(),
      message: "Sentiment comparison API is running",
    });
  });

  app.get("/api/test", (c) => {
    return c.json({
      success: true,
      message: "API is working!",
      endpoints: ENDPOINTS,
    });
  });

  app.get("/api/taxonomy", (c) => {
    return c.json({
      success: true,
      data: {
        labels: SENTIMENT_LABELS,
        verdicts: COMPARISON_VERDICTS,
        labelSet: settings.classifierLabelSet,
        weakDisagreementThreshold: analyzer.policy.weakDisagreementThreshold,
        maxInputLength: settings.maxInputLength,
      },
    });
  });

  app.post("/api/analyze", async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch (error) {
      return c.json(
        { success: false, error: `Request body must be JSON: ${describeError(error)}` },
        400
      );
    }

    const parsed = analyzeRequestSchema.safeParse(body);
    if (!parsed.success) {
      return c.json(
        {
          success: false,
          error: parsed.error.issues
            .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
            .join(", "),
        },
        400
      );
    }

    try {
      const report = await analyzer.analyze(parsed.data.text, {
        timeoutMs: parsed.data.timeoutMs,
      });
      return c.json({ success: true, data: report });
    } catch (error) {
      console.error("Error in analyze endpoint:", error);
      return c.json(
        {
          success: false,
          error:
            error instanceof UnknownLabelError
              ? `Classifier label configuration mismatch: ${error.message}`
              : "Failed to process analysis request",
        },
        500
      );
    }
  });

  return app;
}
