import { z } from "zod";
import type { MonitorItem } from "../../types";
import type { SearchCredentials, SearchOptions, SourceResult } from "../types";
import { getSourceLabel } from "../../sources/registry";
import { errorMessage, fetchWithTimeout } from "../http";

const CUSTOM_SEARCH_URL = "https://www.googleapis.com/customsearch/v1";
const DEFAULT_NUM_RESULTS = 5;
const DEFAULT_DATE_RESTRICT = "w1";

const CustomSearchResponseSchema = z.object({
  items: z
    .array(
      z.object({
        title: z.string().optional(),
        link: z.string().optional(),
        snippet: z.string().optional(),
      })
    )
    .optional(),
  error: z
    .object({
      code: z.number().optional(),
      message: z.string().optional(),
    })
    .optional(),
});

type CustomSearchResponse = z.infer<typeof CustomSearchResponseSchema>;

/** The API only serves 1–10 results per page. */
function clampNumResults(n: number | undefined): number {
  if (n == null || !Number.isFinite(n)) return DEFAULT_NUM_RESULTS;
  return Math.min(10, Math.max(1, Math.round(n)));
}

export function buildSearchUrl(
  query: string,
  credentials: SearchCredentials,
  options?: SearchOptions
): string {
  const params = new URLSearchParams({
    key: credentials.apiKey,
    cx: credentials.engineId,
    q: query,
    num: String(clampNumResults(options?.numResults)),
    dateRestrict: options?.dateRestrict?.trim() || DEFAULT_DATE_RESTRICT,
  });
  return `${CUSTOM_SEARCH_URL}?${params.toString()}`;
}

/**
 * One page of Google Custom Search results for a query.
 * Throws on HTTP or API errors; a response without items is zero results.
 */
export async function searchGoogle(
  query: string,
  credentials: SearchCredentials,
  options?: SearchOptions
): Promise<MonitorItem[]> {
  const res = await fetchWithTimeout(buildSearchUrl(query, credentials, options), undefined, {
    timeoutMs: options?.timeoutMs,
  });
  let body: unknown;
  try {
    body = await res.json();
  } catch {
    body = null;
  }
  const parsed = CustomSearchResponseSchema.safeParse(body);
  const data: CustomSearchResponse = parsed.success ? parsed.data : {};

  if (!res.ok || data.error) {
    const detail = data.error?.message ? ` ${data.error.message}` : "";
    throw new Error(`Google Search: ${res.status}${detail}`);
  }
  if (!parsed.success) {
    throw new Error("Google Search: unexpected response shape");
  }

  const origin = getSourceLabel("search");
  const items: MonitorItem[] = [];
  for (const hit of data.items ?? []) {
    const url = (hit.link ?? "").trim();
    if (!url) continue;
    items.push({
      source: "search",
      title: (hit.title ?? "").trim(),
      url,
      excerpt: (hit.snippet ?? "").replace(/\s+/g, " ").trim(),
      origin,
    });
  }
  return items;
}

/** Runs one query after another; a failed query is logged and skipped. */
export async function runSearch(
  queries: string[],
  credentials: SearchCredentials,
  options?: SearchOptions
): Promise<SourceResult> {
  const items: MonitorItem[] = [];
  const errors: string[] = [];

  for (const query of queries) {
    try {
      const hits = await searchGoogle(query, credentials, options);
      items.push(...hits);
    } catch (err) {
      const message = errorMessage(err);
      console.warn(`[search] Error for "${query}": ${message}`);
      errors.push(`${query}: ${message}`);
    }
  }

  return { items, errors };
}
