import Parser from "rss-parser";
import type { MonitorItem } from "../../types";
import type { FeedOptions, SourceResult } from "../types";
import { errorMessage, fetchWithTimeout, htmlToPlainText, isHttpUrl } from "../http";

const FEED_ACCEPT = "application/rss+xml, application/atom+xml, application/xml, text/xml, */*;q=0.8";
const EXCERPT_MAX_CHARS = 1000;

type NoCustomFields = Record<never, never>;

const parser = new Parser<NoCustomFields, NoCustomFields>();

export interface FeedReadOptions extends FeedOptions {
  /** Called once for every feed that is skipped. */
  onError?: (feedUrl: string, message: string) => void;
}

function publishedAtFor(entry: Parser.Item): number | undefined {
  const raw = entry.isoDate ?? entry.pubDate;
  if (!raw) return undefined;
  const ms = new Date(raw).getTime();
  return Number.isNaN(ms) ? undefined : ms;
}

function excerptFor(entry: Parser.Item): string {
  const text = entry.contentSnippet ?? entry.summary ?? entry.content ?? "";
  return htmlToPlainText(text, EXCERPT_MAX_CHARS);
}

/**
 * Reads feeds one after another and yields their entries as they are parsed.
 * A feed that is invalid, unreachable, non-2xx or not parseable is reported
 * through onError and skipped; the remaining feeds are still read.
 */
export async function* readFeedItems(
  feedUrls: string[],
  options: FeedReadOptions = {}
): AsyncGenerator<MonitorItem> {
  const skip = (feedUrl: string, message: string) => options.onError?.(feedUrl, message);

  for (const feedUrl of feedUrls) {
    if (!isHttpUrl(feedUrl)) {
      skip(feedUrl, "invalid URL");
      continue;
    }

    let feed: Parser.Output<NoCustomFields>;
    try {
      const res = await fetchWithTimeout(
        feedUrl,
        { headers: { Accept: FEED_ACCEPT } },
        { timeoutMs: options.timeoutMs }
      );
      if (!res.ok) {
        skip(feedUrl, `HTTP ${res.status}`);
        continue;
      }
      feed = await parser.parseString(await res.text());
    } catch (err) {
      skip(feedUrl, errorMessage(err));
      continue;
    }

    for (const entry of feed.items) {
      const url = (entry.link ?? "").trim();
      if (!url) continue;
      yield {
        source: "feed",
        title: (entry.title ?? "").trim(),
        url,
        publishedAt: publishedAtFor(entry),
        excerpt: excerptFor(entry),
        origin: feedUrl,
      };
    }
  }
}

export async function runFeeds(feedUrls: string[], options: FeedOptions = {}): Promise<SourceResult> {
  const items: MonitorItem[] = [];
  const errors: string[] = [];

  const entries = readFeedItems(feedUrls, {
    ...options,
    onError: (feedUrl, message) => {
      console.warn(`[feeds] Skipped ${feedUrl}: ${message}`);
      errors.push(`${feedUrl}: ${message}`);
    },
  });
  for await (const item of entries) {
    items.push(item);
  }

  return { items, errors };
}
