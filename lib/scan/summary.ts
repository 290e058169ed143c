import { generateText, type LanguageModel } from "ai";
import type { KeywordSet, ReportRow } from "../types";
import { getSourceLabel } from "../sources/registry";
import { errorMessage } from "./http";
import { parseReportCsv } from "./report";

/** Keeps the prompt bounded on busy days; rows beyond this are dropped from the model input. */
const CSV_MAX_CHARS = 60_000;

const SUMMARY_SYSTEM_PROMPT = `You are a content monitoring assistant.

You will receive a CSV file (columns: source, title, url, matched_keyword) with articles collected from RSS feeds and web searches. Every row already matched at least one keyword. An article can appear on several rows, once per matched keyword.

Your job is to:
1. Merge rows that share a URL or a headline into one article.
2. Discard articles that are clearly unrelated to the keywords below, or that are about an excluded topic.
3. Return a numbered list of the remaining articles with title, URL, source and a one-line summary.
4. End with exactly one line: "Total relevant articles found: <N>".`;

function termList(terms: string[]): string {
  const cleaned = terms.map((t) => t.trim()).filter(Boolean);
  return cleaned.length > 0 ? cleaned.join(", ") : "(none)";
}

export function buildSummaryInstructions(keywordSet: KeywordSet): string {
  const regions =
    keywordSet.regions.length > 0
      ? `\n\nRegion terms (an article must mention at least one):\n${termList(keywordSet.regions)}`
      : "";
  return `${SUMMARY_SYSTEM_PROMPT}

Keywords:
${termList(keywordSet.keywords)}

Excluded topics:
${termList(keywordSet.exclude)}${regions}`;
}

/** Cut at the last full line before maxChars so the model never sees a half row. */
function truncateCsv(csvText: string, maxChars: number): string {
  if (csvText.length <= maxChars) return csvText;
  const cut = csvText.lastIndexOf("\n", maxChars);
  return csvText.slice(0, cut > 0 ? cut + 1 : maxChars);
}

/**
 * Rule-based summary: one numbered entry per URL with its matched keywords,
 * followed by the total. Used when no model is configured or the model call fails.
 */
export function describeReport(rows: ReportRow[]): string {
  const byUrl = new Map<string, { row: ReportRow; keywords: string[] }>();
  for (const row of rows) {
    const key = row.url || `${row.source}:${row.title}`;
    const entry = byUrl.get(key);
    if (!entry) {
      byUrl.set(key, { row, keywords: [row.matched_keyword] });
    } else if (!entry.keywords.includes(row.matched_keyword)) {
      entry.keywords.push(row.matched_keyword);
    }
  }

  if (byUrl.size === 0) {
    return "No relevant articles found this run.\nTotal relevant articles found: 0";
  }

  const lines = [...byUrl.values()].map(
    ({ row, keywords }, i) =>
      `${i + 1}. ${row.title || "(untitled)"}\n   ${row.url}\n   Source: ${getSourceLabel(row.source)} | Keywords: ${keywords.join(", ")}`
  );
  return `${lines.join("\n")}\n\nTotal relevant articles found: ${byUrl.size}`;
}

/**
 * Summarize the CSV report with a language model.
 * Falls back to describeReport when model is missing or the call fails.
 */
export async function summarizeReport(
  csvText: string,
  keywordSet: KeywordSet,
  model: LanguageModel | undefined
): Promise<string> {
  const rows = parseReportCsv(csvText);
  if (!model || rows.length === 0) return describeReport(rows);

  const sent = truncateCsv(csvText, CSV_MAX_CHARS);
  const sentRows = sent === csvText ? rows.length : parseReportCsv(sent).length;
  const heading =
    sentRows < rows.length
      ? `CSV report (first ${sentRows} of ${rows.length} rows; the rest were cut for length)`
      : `CSV report (${rows.length} rows)`;

  try {
    const { text } = await generateText({
      model,
      system: buildSummaryInstructions(keywordSet),
      prompt: `Today's date: ${new Date().toISOString().split("T")[0]}

${heading}:

${sent}`,
      maxRetries: 0,
    });
    const summary = text.trim();
    if (summary) return summary;
    console.warn("[summary] Model returned an empty summary; using rule-based summary");
  } catch (err) {
    console.warn(`[summary] Model call failed: ${errorMessage(err)}; using rule-based summary`);
  }
  return describeReport(rows);
}
