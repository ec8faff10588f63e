import { createSentimentAnalyzer } from "./server/analyzer";
import { loadConfig } from "./server/config";
import { describeError } from "./server/errors";
import { formatReport } from "./server/format";

const EXAMPLES = [
  "I absolutely love this product! It's amazing and exceeded all my expectations!",
  "This is the worst experience I've ever had. Completely disappointing.",
  "The weather is okay today. Nothing special.",
  "I'm so excited about this new opportunity! Can't wait to get started!",
  "I feel terrible about the situation. Everything went wrong.",
];

const useExamples = process.argv.includes("--examples");
const text = process.argv
  .slice(2)
  .filter((arg) => arg !== "--examples")
  .join(" ");

if (!useExamples && text.trim().length === 0) {
  console.error('❌ Usage: tsx index.ts "<text to analyze>"');
  console.error("       tsx index.ts --examples");
  console.error("\nEnvironment:");
  console.error("  CLASSIFIER_LABEL_SET         ternary | binary (default: ternary)");
  console.error("  CLASSIFIER_MODEL             Hugging Face model id");
  console.error("  HF_TOKEN                     Hugging Face API token");
  console.error("  WEAK_DISAGREEMENT_THRESHOLD  0..1 (default: 0.75)");
  console.error("  SCORER_TIMEOUT_MS            per-analyzer timeout (default: 15000)");
  process.exit(1);
}

async function run() {
  const config = loadConfig();
  const analyzer = createSentimentAnalyzer(config);
  const inputs = useExamples ? EXAMPLES : [text];

  console.log(`🎭 Sentiment Analyzer`);
  console.log(
    `📊 Settings: Classifier: ${config.classifierModel}, Labels: ${config.classifierLabelSet}, Threshold: ${config.weakDisagreementThreshold}`
  );

  for (const input of inputs) {
    console.log(`\n📝 "${input}"`);
    const report = await analyzer.analyze(input);
    for (const line of formatReport(report)) {
      console.log(line);
    }
  }
}

run().catch((error: unknown) => {
  console.error(`❌ Analysis failed: ${describeError(error)}`);
  process.exit(1);
});
