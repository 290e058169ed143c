import { createOpenAI } from "@ai-sdk/openai";
import type { LanguageModel } from "ai";
import type { OpenAiSettings } from "../config";

/** Tool calls are requested one per step so they never run side by side. */
export function createChatModel(settings: OpenAiSettings): LanguageModel {
  const openai = createOpenAI({ apiKey: settings.apiKey });
  return openai(settings.model, { parallelToolCalls: false });
}
