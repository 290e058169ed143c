import "dotenv/config";
import {
  ConfigError,
  loadMonitorSettings,
  maxStepsFrom,
  requireOpenAiSettings,
  searchCredentialsFrom,
} from "../lib/config";
import { AGENT_INSTRUCTIONS, buildMission } from "../lib/scan/agent-context";
import { DEFAULT_MAX_STEPS, runAgent } from "../lib/scan/agent";
import { createChatModel } from "../lib/scan/model";
import { buildToolRegistry } from "../lib/scan/tools";

async function main(): Promise<void> {
  const env = process.env;
  const settings = loadMonitorSettings(env);
  const openai = requireOpenAiSettings(env);
  const maxSteps = maxStepsFrom(env, DEFAULT_MAX_STEPS);
  const search = searchCredentialsFrom(env);
  if (!search) {
    console.warn("[agent] GOOGLE_API_KEY / GOOGLE_CSE_ID not set; google_search is disabled");
  }

  const tools = buildToolRegistry({ feeds: settings.feeds, search });
  const prompt =
    process.argv.slice(2).join(" ").trim() ||
    buildMission(settings.keywordSet, {
      feedCount: settings.feeds.length,
      searchQueries: settings.searchQueries,
      searchEnabled: search != null,
    });

  console.log(`[agent] Running with ${Object.keys(tools).join(", ")} (max ${maxSteps} steps)`);
  const result = await runAgent(prompt, {
    model: createChatModel(openai),
    tools,
    instructions: AGENT_INSTRUCTIONS,
    maxSteps,
  });
  console.log(`[agent] ${result.steps} steps, ${result.toolCalls.length} tool calls`);

  if (result.error) {
    console.error(`[agent] ${result.error}`);
    process.exitCode = 1;
    return;
  }
  if (result.stoppedByCap) {
    console.error(`[agent] No final answer within ${maxSteps} steps`);
    process.exitCode = 1;
    return;
  }
  console.log(`\n${result.text}`);
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    console.error(`[agent] Configuration error: ${err.message}`);
  } else {
    console.error("[agent] Failed:", err);
  }
  process.exitCode = 1;
});
