import type { MonitorItem } from "../types";

export interface SourceResult {
  items: MonitorItem[];
  /** One entry per skipped feed or failed query. Never fatal. */
  errors: string[];
}

export interface SearchCredentials {
  apiKey: string;
  engineId: string;
}

export interface SearchOptions {
  /** 1–10. Default 5. */
  numResults?: number;
  /** Google dateRestrict, e.g. "d3", "w1", "m6". Default "w1". */
  dateRestrict?: string;
  timeoutMs?: number;
}

export interface FeedOptions {
  timeoutMs?: number;
}
