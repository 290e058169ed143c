import "dotenv/config";
import {
  ConfigError,
  loadMonitorSettings,
  openAiSettingsFrom,
  outputPathFrom,
  requireSearchCredentials,
} from "../lib/config";
import { createChatModel } from "../lib/scan/model";
import { runMonitor } from "../lib/scan/orchestrator";

async function main(): Promise<void> {
  const env = process.env;
  const settings = loadMonitorSettings(env);
  const search = requireSearchCredentials(env);
  const openai = openAiSettingsFrom(env);
  if (!openai) {
    console.log("[monitor] OPENAI_API_KEY not set; the summary will be rule-based");
  }

  const result = await runMonitor({
    ...settings,
    search,
    outputPath: outputPathFrom(env),
    model: openai ? createChatModel(openai) : undefined,
  });

  const failed = result.errors.feed.length + result.errors.search.length;
  if (failed > 0) {
    console.warn(`[monitor] ${failed} source(s) skipped; see warnings above`);
  }
  console.log(`\n${result.summary}`);
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    console.error(`[monitor] Configuration error: ${err.message}`);
  } else {
    console.error("[monitor] Failed:", err);
  }
  process.exitCode = 1;
});
