import type { LanguageModel } from "ai";
import type { KeywordMatch, KeywordSet, ReportRow } from "../types";
import type { SearchCredentials } from "./types";
import { runAllSources, type SourceId, type SourceRunner } from "./sources";
import { dedupeByUrl } from "./dedup";
import { filterItems } from "./keyword-filter";
import { toReportRows, writeReport } from "./report";
import { summarizeReport } from "./summary";

export interface MonitorRunConfig {
  feeds: string[];
  searchQueries: string[];
  keywordSet: KeywordSet;
  search: SearchCredentials;
  outputPath: string;
  /** When set, the CSV is summarized by this model; otherwise a rule-based summary is built. */
  model?: LanguageModel;
  timeoutMs?: number;
}

export interface MonitorRunResult {
  feedItems: number;
  searchItems: number;
  uniqueItems: number;
  matches: KeywordMatch[];
  rows: ReportRow[];
  csvPath: string;
  summary: string;
  /** Per-source warnings; the run still succeeded. */
  errors: Record<SourceId, string[]>;
}

/**
 * One monitoring run: read feeds, run searches, dedupe by URL, keep keyword
 * matches, write the CSV, then summarize it. Only a report write failure (or a
 * bug) throws; source failures are logged and collected in `errors`.
 */
export async function runMonitor(
  config: MonitorRunConfig,
  runners?: Partial<Record<SourceId, SourceRunner>>
): Promise<MonitorRunResult> {
  const inputs = {
    feeds: config.feeds,
    searchQueries: config.searchQueries,
    search: config.search,
    timeoutMs: config.timeoutMs,
  };

  console.log(`[monitor] Step 1/3: reading ${config.feeds.length} feeds and running ${config.searchQueries.length} searches`);
  const results = await runAllSources(inputs, { runners });
  const feedItems = results.feed.items.length;
  const searchItems = results.search.items.length;
  console.log(`[monitor] ${feedItems} articles from feeds, ${searchItems} results from search`);

  console.log("[monitor] Step 2/3: filtering by keyword");
  const unique = dedupeByUrl([...results.feed.items, ...results.search.items]);
  const matches = filterItems(unique, config.keywordSet);
  const rows = toReportRows(matches);
  console.log(
    `[monitor] ${unique.length} unique items (${feedItems + searchItems - unique.length} duplicates removed), ${rows.length} keyword matches`
  );

  console.log("[monitor] Step 3/3: writing report");
  const csv = await writeReport(config.outputPath, rows);
  console.log(`[monitor] ${rows.length} rows written to ${config.outputPath}`);

  const summary = await summarizeReport(csv, config.keywordSet, config.model);

  return {
    feedItems,
    searchItems,
    uniqueItems: unique.length,
    matches,
    rows,
    csvPath: config.outputPath,
    summary,
    errors: { feed: results.feed.errors, search: results.search.errors },
  };
}
