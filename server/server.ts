import { serve } from "@hono/node-server";
import { createSentimentAnalyzer } from "./analyzer";
import { createApp, ENDPOINTS } from "./app";
import { loadConfig } from "./config";

const config = loadConfig();
const analyzer = createSentimentAnalyzer(config);
const app = createApp(analyzer, config);

console.log(`🚀 Sentiment comparison API starting on port ${config.port}`);
console.log(
  `🤗 Classifier: ${config.classifierModel} (${config.classifierLabelSet} labels)`
);
console.log(
  `⚖️ Weak disagreement threshold: ${config.weakDisagreementThreshold}, scorer timeout: ${config.scorerTimeoutMs} ms`
);
console.log(`🎯 Available endpoints:`);
for (const endpoint of ENDPOINTS) {
  console.log(`   ${endpoint}`);
}
console.log(
  config.env === "production"
    ? `🔗 CORS enabled for: all origins (production mode)`
    : `🔗 CORS enabled for: http://localhost:3000, http://localhost:5173`
);

serve({ fetch: app.fetch, port: config.port }, (info) => {
  console.log(`✅ Server running on http://localhost:${info.port}`);
});
