import { vi } from "vitest";

export const ALPHA_FEED_URL = "https://alpha.example/feed.xml";
export const BETA_FEED_URL = "https://beta.example/atom.xml";

export const ALPHA_RSS = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Alpha News</title>
    <link>https://alpha.example</link>
    <description>Alpha</description>
    <item>
      <title>New IPTV crackdown announced</title>
      <link>https://alpha.example/iptv</link>
      <pubDate>Mon, 06 Jan 2025 10:00:00 GMT</pubDate>
      <description>Operators &lt;b&gt;blocked&lt;/b&gt; streams</description>
    </item>
    <item>
      <title>No link here</title>
      <description>dropped</description>
    </item>
  </channel>
</rss>`;

export const BETA_ATOM = `<?xml version="1.0" encoding="utf-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>Beta</title>
  <id>urn:beta</id>
  <updated>2025-01-07T08:00:00Z</updated>
  <entry>
    <title>Court orders site blocking</title>
    <link href="https://beta.example/blocking"/>
    <id>urn:beta:1</id>
    <updated>2025-01-07T08:00:00Z</updated>
    <summary>Judges ordered ISPs to block piracy sites</summary>
  </entry>
</feed>`;

type Route = (url: URL) => Response | Promise<Response>;

function requestUrl(input: string | URL | Request): string {
  if (typeof input === "string") return input;
  if (input instanceof URL) return input.href;
  return input.url;
}

/**
 * Replace global fetch. Routes are keyed by URL without the query string;
 * unknown URLs reject like a DNS failure would.
 */
export function stubFetch(routes: Record<string, Route>) {
  const fetchMock = vi.fn(async (input: string | URL | Request) => {
    const url = new URL(requestUrl(input));
    const route = routes[`${url.origin}${url.pathname}`];
    if (!route) throw new TypeError(`fetch failed: ${url.href}`);
    return route(url);
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

export function xmlResponse(body: string, status = 200): Response {
  return new Response(body, { status, headers: { "Content-Type": "application/xml" } });
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}
