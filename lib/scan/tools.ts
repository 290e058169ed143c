/**
 * Tools the agent may call. Each tool is a name, a zod parameter schema and an
 * execute function (Vercel AI SDK `tool()`); buildToolRegistry assembles them.
 * Tool failures are returned to the model as data instead of being thrown.
 */

import { tool, type ToolExecutionOptions, type ToolSet } from "ai";
import { z } from "zod";
import type { MonitorItem } from "../types";
import type { SearchCredentials } from "./types";
import { errorMessage } from "./http";
import { runFeeds } from "./sources/feeds";
import { searchGoogle } from "./sources/search";

export const READ_FEEDS_TOOL = "read_feeds";
export const GOOGLE_SEARCH_TOOL = "google_search";

const DATE_RESTRICT = /^[dwmy]\d+$/;

export interface ToolContext {
  /** Feeds read when the model does not name any. */
  feeds: string[];
  /** Without credentials the search tool is left out of the registry. */
  search?: SearchCredentials;
  timeoutMs?: number;
}

function toArticle(item: MonitorItem) {
  return {
    title: item.title,
    link: item.url,
    summary: item.excerpt,
    source: item.origin,
    date: item.publishedAt != null ? new Date(item.publishedAt).toISOString().split("T")[0] : "",
  };
}

export function readFeedsTool(context: ToolContext) {
  return tool({
    description:
      "Read and parse one or more RSS/Atom feeds. If no feed URLs are provided, the configured feed list is used. Returns articles with title, link, summary, source and publication date, plus the feeds that could not be read.",
    parameters: z.object({
      feed_urls: z
        .array(z.string())
        .optional()
        .describe("Optional RSS/Atom feed URLs to read. When omitted the configured list is used."),
    }),
    execute: async ({ feed_urls }) => {
      const urls = feed_urls?.length ? feed_urls : context.feeds;
      const result = await runFeeds(urls, { timeoutMs: context.timeoutMs });
      return { articles: result.items.map(toArticle), errors: result.errors };
    },
  });
}

export function googleSearchTool(credentials: SearchCredentials, timeoutMs?: number) {
  return tool({
    description:
      "Search Google for recent news using the Custom Search API. Returns results with title, link and snippet.",
    parameters: z.object({
      query: z.string().describe("The search query."),
      num_results: z.number().optional().describe("Number of results (1-10). Default 5."),
      date_restrict: z
        .string()
        .optional()
        .describe("Time window in Google dateRestrict format: d[N] days, w[N] weeks, m[N] months, y[N] years. Default w1."),
    }),
    execute: async ({ query, num_results, date_restrict }) => {
      if (!query.trim()) return { error: "query must not be empty" };
      if (date_restrict != null && !DATE_RESTRICT.test(date_restrict)) {
        return { error: `Invalid date_restrict "${date_restrict}": use d[N], w[N], m[N] or y[N], e.g. "w1"` };
      }
      try {
        const hits = await searchGoogle(query, credentials, {
          numResults: num_results,
          dateRestrict: date_restrict,
          timeoutMs,
        });
        return {
          results: hits.map((hit) => ({ title: hit.title, link: hit.url, snippet: hit.excerpt })),
        };
      } catch (err) {
        return { error: errorMessage(err) };
      }
    },
  });
}

/**
 * Run every tool's execute through one queue, so calls the model requests in
 * the same step still execute one after another, in request order.
 */
export function serializeTools(tools: ToolSet): ToolSet {
  let queue: Promise<unknown> = Promise.resolve();
  const serialized: ToolSet = {};
  for (const [name, original] of Object.entries(tools)) {
    const execute = original.execute;
    if (!execute) {
      serialized[name] = original;
      continue;
    }
    serialized[name] = {
      ...original,
      execute: (args: unknown, options: ToolExecutionOptions) => {
        const run = queue.then(() => execute(args, options));
        // The caller observes the rejection through run; the queue only orders.
        queue = run.then(
          () => undefined,
          () => undefined
        );
        return run;
      },
    };
  }
  return serialized;
}

export function buildToolRegistry(context: ToolContext): ToolSet {
  const tools: ToolSet = {
    [READ_FEEDS_TOOL]: readFeedsTool(context),
  };
  if (context.search) {
    tools[GOOGLE_SEARCH_TOOL] = googleSearchTool(context.search, context.timeoutMs);
  }
  return serializeTools(tools);
}
