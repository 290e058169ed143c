/**
 * Fetch with a per-request timeout and a browser-like User-Agent (several
 * news sites reject the default one). No retries: callers turn a non-2xx
 * response into a per-source error and move on.
 */

const DEFAULT_TIMEOUT_MS = 10_000;

export const USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36";

export interface FetchWithTimeoutOptions {
  /** Abort after this many ms. Default 10s. */
  timeoutMs?: number;
}

export async function fetchWithTimeout(
  url: string,
  init?: RequestInit,
  options?: FetchWithTimeoutOptions
): Promise<Response> {
  const timeoutMs = options?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const headers = new Headers(init?.headers);
  if (!headers.has("User-Agent")) headers.set("User-Agent", USER_AGENT);

  return fetch(url, {
    ...init,
    headers,
    signal: AbortSignal.timeout(timeoutMs),
  });
}

/** True for absolute http(s) URLs with a host. */
export function isHttpUrl(value: string): boolean {
  try {
    const parsed = new URL(value);
    return (parsed.protocol === "http:" || parsed.protocol === "https:") && parsed.hostname !== "";
  } catch {
    return false;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Strip HTML to plain text, collapse whitespace, truncate. */
export function htmlToPlainText(html: string, maxChars = 1000): string {
  let text = html
    .replace(/<script\b[^<]*(?:(?!<\/script>)<[^<]*)*<\/script>/gi, "")
    .replace(/<style\b[^<]*(?:(?!<\/style>)<[^<]*)*<\/style>/gi, "")
    .replace(/<[^>]+>/g, " ")
    .replace(/\s+/g, " ")
    .trim();
  if (text.length > maxChars) text = text.slice(0, maxChars) + "…";
  return text;
}
