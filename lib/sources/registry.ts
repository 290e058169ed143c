/**
 * The monitor reads two kinds of source: configured RSS/Atom feeds and Google
 * Custom Search queries. Ids label CSV rows; labels appear in summaries.
 */
export const SOURCE_REGISTRY = [
  { id: "feed", label: "RSS/Atom feeds" },
  { id: "search", label: "Google Search" },
] as const;

export type SourceId = (typeof SOURCE_REGISTRY)[number]["id"];

export const ALL_SOURCE_IDS: readonly SourceId[] = SOURCE_REGISTRY.map((s) => s.id);

export function getSourceLabel(id: SourceId): string {
  const entry = SOURCE_REGISTRY.find((s) => s.id === id);
  return entry?.label ?? id;
}

export function isSourceId(value: string): value is SourceId {
  return ALL_SOURCE_IDS.some((id) => id === value);
}
