/**
 * Configuration: credentials and paths come from the environment (a .env file
 * is loaded by the scripts), feeds and keywords from a JSON file.
 * Everything is checked for presence before any network call is made.
 */

import { readFileSync } from "fs";
import { z } from "zod";
import type { KeywordSet } from "./types";
import type { SearchCredentials } from "./scan/types";

export type Env = Record<string, string | undefined>;

export const DEFAULT_CONFIG_PATH = "config/monitor.json";
export const DEFAULT_OUTPUT_PATH = "monitor_results.csv";
export const DEFAULT_OPENAI_MODEL = "gpt-4o-mini";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const MonitorFileSchema = z.object({
  feeds: z.array(z.string()),
  keywords: z.array(z.string()).min(1),
  exclude: z.array(z.string()).default([]),
  regions: z.array(z.string()).default([]),
  searchQueries: z.array(z.string()).optional(),
});

export interface MonitorSettings {
  feeds: string[];
  keywordSet: KeywordSet;
  searchQueries: string[];
}

export interface OpenAiSettings {
  apiKey: string;
  model: string;
}

function cleanList(values: string[]): string[] {
  return values.map((v) => v.trim()).filter(Boolean);
}

function read(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

export function parseMonitorFile(raw: unknown, source = DEFAULT_CONFIG_PATH): MonitorSettings {
  const parsed = MonitorFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid config file ${source}: ${issues}`);
  }
  const keywords = cleanList(parsed.data.keywords);
  if (keywords.length === 0) {
    throw new ConfigError(`Invalid config file ${source}: keywords must contain at least one non-empty term`);
  }
  const searchQueries = cleanList(parsed.data.searchQueries ?? parsed.data.keywords);
  return {
    feeds: cleanList(parsed.data.feeds),
    keywordSet: {
      keywords,
      exclude: cleanList(parsed.data.exclude),
      regions: cleanList(parsed.data.regions),
    },
    searchQueries,
  };
}

export function loadMonitorSettings(env: Env): MonitorSettings {
  const path = read(env, "MONITOR_CONFIG") ?? DEFAULT_CONFIG_PATH;
  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read config file ${path}: ${reason}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Config file ${path} is not valid JSON: ${reason}`);
  }
  return parseMonitorFile(raw, path);
}

/** Search credentials when both are set; undefined otherwise. */
export function searchCredentialsFrom(env: Env): SearchCredentials | undefined {
  const apiKey = read(env, "GOOGLE_API_KEY");
  const engineId = read(env, "GOOGLE_CSE_ID");
  return apiKey && engineId ? { apiKey, engineId } : undefined;
}

export function requireSearchCredentials(env: Env): SearchCredentials {
  const credentials = searchCredentialsFrom(env);
  if (!credentials) {
    throw new ConfigError("Google API credentials are not configured (set GOOGLE_API_KEY and GOOGLE_CSE_ID)");
  }
  return credentials;
}

export function openAiSettingsFrom(env: Env): OpenAiSettings | undefined {
  const apiKey = read(env, "OPENAI_API_KEY");
  if (!apiKey) return undefined;
  return { apiKey, model: read(env, "OPENAI_MODEL") ?? DEFAULT_OPENAI_MODEL };
}

export function requireOpenAiSettings(env: Env): OpenAiSettings {
  const settings = openAiSettingsFrom(env);
  if (!settings) {
    throw new ConfigError("OPENAI_API_KEY is not configured");
  }
  return settings;
}

export function outputPathFrom(env: Env): string {
  return read(env, "MONITOR_OUTPUT") ?? DEFAULT_OUTPUT_PATH;
}

export function maxStepsFrom(env: Env, fallback: number): number {
  const raw = read(env, "AGENT_MAX_STEPS");
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1) {
    throw new ConfigError(`AGENT_MAX_STEPS must be a positive integer, got "${raw}"`);
  }
  return n;
}
