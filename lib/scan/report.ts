import { mkdir, writeFile } from "fs/promises";
import { dirname } from "path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";
import type { KeywordMatch, ReportRow, SourceType } from "../types";
import { isSourceId } from "../sources/registry";

export const REPORT_COLUMNS = ["source", "title", "url", "matched_keyword"] as const;

const ReportRowSchema = z.object({
  source: z.custom<SourceType>((v) => typeof v === "string" && isSourceId(v), "unknown source"),
  title: z.string(),
  url: z.string(),
  matched_keyword: z.string(),
});

export function toReportRows(matches: KeywordMatch[]): ReportRow[] {
  return matches.map(({ item, keyword }) => ({
    source: item.source,
    title: item.title,
    url: item.url,
    matched_keyword: keyword,
  }));
}

/** Header row plus one line per row, quoted where needed. */
export function formatReportCsv(rows: ReportRow[]): string {
  if (rows.length === 0) return `${REPORT_COLUMNS.join(",")}\n`;
  return stringify(rows, { header: true, columns: [...REPORT_COLUMNS] });
}

export function parseReportCsv(csvText: string): ReportRow[] {
  const records: unknown = parse(csvText, { columns: true, skip_empty_lines: true, bom: true });
  return z.array(ReportRowSchema).parse(records);
}

/** Writes the report and returns its CSV text. Write failures propagate. */
export async function writeReport(path: string, rows: ReportRow[]): Promise<string> {
  const csv = formatReportCsv(rows);
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, csv, "utf8");
  return csv;
}
