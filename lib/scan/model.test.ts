import { generateText, tool } from "ai";
import { afterEach, describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { createChatModel } from "./model";
import { jsonResponse } from "./__fixtures__/feeds";

const COMPLETION = {
  id: "chatcmpl-1",
  object: "chat.completion",
  created: 1736150400,
  model: "gpt-4o-mini",
  choices: [{ index: 0, message: { role: "assistant", content: "ok" }, finish_reason: "stop" }],
  usage: { prompt_tokens: 5, completion_tokens: 1, total_tokens: 6 },
};

describe("createChatModel", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("binds the configured OpenAI model", () => {
    const model = createChatModel({ apiKey: "test-key", model: "gpt-4o-mini" });

    expect(model.modelId).toBe("gpt-4o-mini");
  });

  it("asks the API for one tool call at a time", async () => {
    const bodies: unknown[] = [];
    vi.stubGlobal(
      "fetch",
      vi.fn(async (_url: string, init?: RequestInit) => {
        bodies.push(JSON.parse(String(init?.body)));
        return jsonResponse(COMPLETION);
      })
    );
    const noop = tool({
      description: "Does nothing.",
      parameters: z.object({}),
      execute: async () => ({}),
    });

    const { text } = await generateText({
      model: createChatModel({ apiKey: "test-key", model: "gpt-4o-mini" }),
      tools: { noop },
      prompt: "Hello",
      maxRetries: 0,
    });

    expect(text).toBe("ok");
    expect(bodies).toHaveLength(1);
    expect(bodies[0]).toMatchObject({ model: "gpt-4o-mini", parallel_tool_calls: false });
  });
});
