import type { SearchCredentials, SourceResult } from "../types";
import { ALL_SOURCE_IDS, type SourceId } from "../../sources/registry";
import { runFeeds } from "./feeds";
import { runSearch } from "./search";

export type { SourceId } from "../../sources/registry";

export interface SourceInputs {
  feeds: string[];
  searchQueries: string[];
  search: SearchCredentials;
  timeoutMs?: number;
}

export type SourceRunner = (inputs: SourceInputs) => Promise<SourceResult>;

export const RUNNERS: Record<SourceId, SourceRunner> = {
  feed: (inputs) => runFeeds(inputs.feeds, { timeoutMs: inputs.timeoutMs }),
  search: (inputs) => runSearch(inputs.searchQueries, inputs.search, { timeoutMs: inputs.timeoutMs }),
};

/**
 * Runs the given sources (all by default) one at a time, in registry order.
 * Runners can be overridden, which is how tests keep the network out.
 */
export async function runAllSources(
  inputs: SourceInputs,
  options?: {
    sources?: SourceId[];
    runners?: Partial<Record<SourceId, SourceRunner>>;
  }
): Promise<Record<SourceId, SourceResult>> {
  const selected = options?.sources?.length ? options.sources : ALL_SOURCE_IDS;
  const results: Record<SourceId, SourceResult> = {
    feed: { items: [], errors: [] },
    search: { items: [], errors: [] },
  };

  for (const id of ALL_SOURCE_IDS) {
    if (!selected.includes(id)) continue;
    const runner = options?.runners?.[id] ?? RUNNERS[id];
    results[id] = await runner(inputs);
  }
  return results;
}
