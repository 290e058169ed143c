import type { SourceId } from "./sources/registry";

export type SourceType = SourceId;

/** One article or search hit, normalized. Never mutated after a source returns it. */
export type MonitorItem = {
  source: SourceType;
  title: string;
  url: string;
  /** Epoch ms, when the source gives a parseable date. */
  publishedAt?: number;
  excerpt: string;
  /** Feed URL for feed items, source label for search hits. */
  origin: string;
};

export type KeywordSet = {
  keywords: string[];
  /** Any match here drops the item. */
  exclude: string[];
  /** When non-empty, an item must mention at least one region term. */
  regions: string[];
};

export type KeywordMatch = {
  item: MonitorItem;
  keyword: string;
};

export type ReportRow = {
  source: SourceType;
  title: string;
  url: string;
  matched_keyword: string;
};
