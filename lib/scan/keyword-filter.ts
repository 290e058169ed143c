/**
 * Keyword filter: keep only items whose title or excerpt mentions a configured
 * keyword. Matching is case-insensitive substring search; a keyword written as
 * /pattern/ is treated as a case-insensitive regular expression instead.
 */

import type { KeywordMatch, KeywordSet, MonitorItem } from "../types";

type Matcher = { keyword: string; test: (text: string) => boolean };

function literalMatcher(keyword: string): Matcher {
  const needle = keyword.toLowerCase();
  return { keyword, test: (text) => text.toLowerCase().includes(needle) };
}

function compileKeyword(keyword: string): Matcher {
  const pattern = /^\/(.+)\/$/.exec(keyword);
  if (!pattern) return literalMatcher(keyword);
  let re: RegExp;
  try {
    re = new RegExp(pattern[1], "i");
  } catch {
    return literalMatcher(keyword);
  }
  return { keyword, test: (text) => re.test(text) };
}

/**
 * Compile a keyword list once. Blank entries are ignored and entries that only
 * differ by case collapse into the first one, so each keyword is reported at
 * most once per text.
 */
export function createKeywordMatcher(keywords: string[]): (text: string) => string[] {
  const seen = new Set<string>();
  const matchers: Matcher[] = [];
  for (const raw of keywords) {
    const keyword = raw.trim();
    const key = keyword.toLowerCase();
    if (!keyword || seen.has(key)) continue;
    seen.add(key);
    matchers.push(compileKeyword(keyword));
  }
  return (text) => (text ? matchers.filter((m) => m.test(text)).map((m) => m.keyword) : []);
}

/** Keywords occurring in text, in keyword-list order. */
export function findKeywordMatches(text: string, keywords: string[]): string[] {
  return createKeywordMatcher(keywords)(text);
}

export function itemText(item: MonitorItem): string {
  return `${item.title} ${item.excerpt}`.trim();
}

/**
 * One entry per (item, matching keyword), in item order then keyword order.
 * Items mentioning an exclude term are dropped. Region terms are not applied
 * here; they only steer the summary and agent prompts.
 */
export function filterItems(items: MonitorItem[], keywordSet: KeywordSet): KeywordMatch[] {
  const matchKeywords = createKeywordMatcher(keywordSet.keywords);
  const matchExcluded = createKeywordMatcher(keywordSet.exclude);

  const matches: KeywordMatch[] = [];
  for (const item of items) {
    const text = itemText(item);
    if (matchExcluded(text).length > 0) continue;
    for (const keyword of matchKeywords(text)) {
      matches.push({ item, keyword });
    }
  }
  return matches;
}
