import { afterEach, describe, expect, it, vi } from "vitest";
import { USER_AGENT, errorMessage, fetchWithTimeout, htmlToPlainText, isHttpUrl } from "./http";

describe("htmlToPlainText", () => {
  it("drops tags, scripts and styles and collapses whitespace", () => {
    const html = "<p>Hello <b>world</b></p>\n<script>var x = 1;</script><style>p { color: red }</style>  bye";

    expect(htmlToPlainText(html)).toBe("Hello world bye");
  });

  it("truncates with an ellipsis", () => {
    expect(htmlToPlainText("abcdefghij", 4)).toBe("abcd…");
    expect(htmlToPlainText("abcd", 4)).toBe("abcd");
  });
});

describe("isHttpUrl", () => {
  it("accepts only absolute http(s) URLs", () => {
    expect(isHttpUrl("https://a.example/feed")).toBe(true);
    expect(isHttpUrl("http://a.example")).toBe(true);
    expect(isHttpUrl("ftp://a.example/feed")).toBe(false);
    expect(isHttpUrl("/relative/feed")).toBe(false);
  });
});

describe("errorMessage", () => {
  it("reads Error messages and stringifies the rest", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
  });
});

describe("fetchWithTimeout", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("sends a browser User-Agent unless one is given", async () => {
    const seen: Array<string | null> = [];
    vi.stubGlobal(
      "fetch",
      vi.fn(async (_url: string, init?: RequestInit) => {
        seen.push(new Headers(init?.headers).get("User-Agent"));
        return new Response("ok");
      })
    );

    await fetchWithTimeout("https://a.example");
    await fetchWithTimeout("https://a.example", { headers: { "User-Agent": "custom/1.0" } });

    expect(seen).toEqual([USER_AGENT, "custom/1.0"]);
  });
});
