import { MockLanguageModelV1 } from "ai/test";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { KeywordSet, ReportRow } from "../types";
import { formatReportCsv } from "./report";
import { buildSummaryInstructions, describeReport, summarizeReport } from "./summary";

const KEYWORDS: KeywordSet = { keywords: ["IPTV", "piracy"], exclude: ["receta"], regions: [] };

const ROWS: ReportRow[] = [
  { source: "feed", title: "New IPTV crackdown", url: "https://a.example/1", matched_keyword: "IPTV" },
  { source: "search", title: "Piracy ring dismantled", url: "https://c.example/3", matched_keyword: "IPTV" },
  { source: "search", title: "Piracy ring dismantled", url: "https://c.example/3", matched_keyword: "piracy" },
];

const RULE_BASED = [
  "1. New IPTV crackdown",
  "   https://a.example/1",
  "   Source: RSS/Atom feeds | Keywords: IPTV",
  "2. Piracy ring dismantled",
  "   https://c.example/3",
  "   Source: Google Search | Keywords: IPTV, piracy",
  "",
  "Total relevant articles found: 2",
].join("\n");

function textModel(text: string) {
  const systems: string[] = [];
  const prompts: string[] = [];
  const model = new MockLanguageModelV1({
    doGenerate: async (options) => {
      prompts.push(JSON.stringify(options.prompt));
      for (const message of options.prompt) {
        if (message.role === "system") systems.push(message.content);
      }
      return {
        rawCall: { rawPrompt: null, rawSettings: {} },
        finishReason: "stop",
        usage: { promptTokens: 10, completionTokens: 5 },
        text,
      };
    },
  });
  return { model, systems, prompts };
}

describe("describeReport", () => {
  it("lists each URL once with all of its keywords", () => {
    expect(describeReport(ROWS)).toBe(RULE_BASED);
  });

  it("says so when nothing matched", () => {
    expect(describeReport([])).toBe("No relevant articles found this run.\nTotal relevant articles found: 0");
  });
});

describe("buildSummaryInstructions", () => {
  it("lists keywords and excluded topics, and regions only when set", () => {
    const instructions = buildSummaryInstructions(KEYWORDS);

    expect(instructions).toContain("Keywords:\nIPTV, piracy\n\nExcluded topics:\nreceta");
    expect(instructions).not.toContain("Region terms");
    expect(buildSummaryInstructions({ ...KEYWORDS, regions: ["Perú"] })).toMatch(
      /Region terms \(an article must mention at least one\):\nPerú$/
    );
  });
});

describe("summarizeReport", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("builds the rule-based summary when no model is configured", async () => {
    expect(await summarizeReport(formatReportCsv(ROWS), KEYWORDS, undefined)).toBe(RULE_BASED);
  });

  it("does not call the model for an empty report", async () => {
    const { model, systems } = textModel("should not be used");

    const summary = await summarizeReport(formatReportCsv([]), KEYWORDS, model);

    expect(summary).toBe("No relevant articles found this run.\nTotal relevant articles found: 0");
    expect(systems).toEqual([]);
  });

  it("returns the model's trimmed answer", async () => {
    const { model, systems } = textModel("\n1. New IPTV crackdown\n\nTotal relevant articles found: 1\n");

    const summary = await summarizeReport(formatReportCsv(ROWS), KEYWORDS, model);

    expect(summary).toBe("1. New IPTV crackdown\n\nTotal relevant articles found: 1");
    expect(systems).toEqual([buildSummaryInstructions(KEYWORDS)]);
  });

  it("tells the model how many rows it was given", async () => {
    const { model, prompts } = textModel("ok");

    await summarizeReport(formatReportCsv(ROWS), KEYWORDS, model);

    expect(prompts[0]).toContain("CSV report (3 rows):");
  });

  it("says how many rows were sent when the report is cut", async () => {
    const rows: ReportRow[] = Array.from({ length: 1000 }, (_, i) => {
      const n = String(i).padStart(4, "0");
      return {
        source: "feed",
        title: `Article ${n} ${"x".repeat(60)}`,
        url: `https://a.example/${n}`,
        matched_keyword: "IPTV",
      };
    });
    const { model, prompts } = textModel("ok");

    await summarizeReport(formatReportCsv(rows), KEYWORDS, model);

    expect(prompts[0]).toContain("CSV report (first 560 of 1000 rows; the rest were cut for length):");
    expect(prompts[0]).toContain("https://a.example/0559");
    expect(prompts[0]).not.toContain("https://a.example/0560");
  });

  it("falls back when the model answers with nothing", async () => {
    const { model } = textModel("   ");

    expect(await summarizeReport(formatReportCsv(ROWS), KEYWORDS, model)).toBe(RULE_BASED);
    expect(console.warn).toHaveBeenCalledWith("[summary] Model returned an empty summary; using rule-based summary");
  });

  it("falls back when the model call fails", async () => {
    const model = new MockLanguageModelV1({
      doGenerate: async () => {
        throw new Error("connection reset");
      },
    });

    expect(await summarizeReport(formatReportCsv(ROWS), KEYWORDS, model)).toBe(RULE_BASED);
    expect(console.warn).toHaveBeenCalledWith(
      "[summary] Model call failed: connection reset; using rule-based summary"
    );
  });
});
