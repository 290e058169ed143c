import type { KeywordSet } from "../types";
import { GOOGLE_SEARCH_TOOL, READ_FEEDS_TOOL } from "./tools";

export const AGENT_INSTRUCTIONS = `You are a content monitoring assistant. You collect recent articles with the tools available to you and report only the ones that match the monitoring goal.

Rules:
- Call a tool when you need data; do not invent articles or links.
- Remove duplicates (same URL or same headline).
- When you are done, answer with a numbered list: title, URL, publication date when known, source, and a one-line summary.
- End with exactly one line: "Total relevant articles found: <N>".`;

/**
 * Build the default prompt for an agent run: what to look for, which feeds are
 * configured, and which queries are worth searching.
 */
export function buildMission(
  keywordSet: KeywordSet,
  options?: { feedCount?: number; searchQueries?: string[]; searchEnabled?: boolean }
): string {
  const keywords = keywordSet.keywords.slice(0, 40).join(", ");
  const exclude = keywordSet.exclude.length > 0 ? `\nIgnore articles about: ${keywordSet.exclude.join(", ")}.` : "";
  const regions =
    keywordSet.regions.length > 0
      ? `\nOnly keep articles that mention one of these regions: ${keywordSet.regions.join(", ")}.`
      : "";

  const steps = [`Use ${READ_FEEDS_TOOL} to read the configured feeds${options?.feedCount != null ? ` (${options.feedCount})` : ""}.`];
  if (options?.searchEnabled !== false) {
    const queries = options?.searchQueries?.length ? ` Suggested queries: ${options.searchQueries.join(", ")}.` : "";
    steps.push(`Use ${GOOGLE_SEARCH_TOOL} for recent news on the topic.${queries}`);
  }

  return `Find recent articles that mention any of these keywords: ${keywords}.${exclude}${regions}

${steps.map((s, i) => `${i + 1}. ${s}`).join("\n")}
${steps.length + 1}. Report the matching articles.`;
}
