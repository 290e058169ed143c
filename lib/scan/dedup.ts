import type { MonitorItem } from "../types";

/** Keep the first item per URL. Items without a URL are never merged. */
export function dedupeByUrl(items: MonitorItem[]): MonitorItem[] {
  const seenUrls = new Set<string>();
  const unique: MonitorItem[] = [];
  for (const item of items) {
    if (item.url) {
      if (seenUrls.has(item.url)) continue;
      seenUrls.add(item.url);
    }
    unique.push(item);
  }
  return unique;
}
