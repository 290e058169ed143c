/**
 * Agent loop: send the prompt with the tool schemas, run whatever tools the
 * model asks for, feed the results back, and stop once the model answers in
 * text or maxSteps model calls have been made. Tool calls run one at a time,
 * even when the model asks for several in one step.
 */

import { APICallError, NoSuchToolError, generateText, type LanguageModel, type ToolSet } from "ai";
import { errorMessage } from "./http";
import { serializeTools } from "./tools";

export const DEFAULT_MAX_STEPS = 8;

export interface AgentOptions {
  model: LanguageModel;
  tools: ToolSet;
  instructions?: string;
  /** Upper bound on model calls in one run. Default 8. */
  maxSteps?: number;
}

export interface AgentToolCall {
  toolName: string;
  args: unknown;
}

export interface AgentResult {
  /** Final answer; empty when the run failed or was cut off by the cap. */
  text: string;
  /** Completed model calls, including those before a failure. */
  steps: number;
  toolCalls: AgentToolCall[];
  /** True when the last model call still asked for tools. */
  stoppedByCap: boolean;
  error?: string;
}

export function describeModelError(err: unknown): string {
  if (NoSuchToolError.isInstance(err)) return `Unknown tool: ${err.toolName}`;
  if (APICallError.isInstance(err)) {
    if (err.statusCode === 401) return "Invalid API key. Check OPENAI_API_KEY.";
    if (err.statusCode === 429) return "Rate limited or out of credits on the model API.";
    return `Model API error${err.statusCode != null ? ` (${err.statusCode})` : ""}: ${err.message}`;
  }
  return `Unexpected error: ${errorMessage(err)}`;
}

export async function runAgent(prompt: string, options: AgentOptions): Promise<AgentResult> {
  const maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
  if (!Number.isInteger(maxSteps) || maxSteps < 1) {
    throw new Error(`maxSteps must be a positive integer, got ${maxSteps}`);
  }

  let steps = 0;
  const toolCalls: AgentToolCall[] = [];

  try {
    const result = await generateText({
      model: options.model,
      tools: serializeTools(options.tools),
      system: options.instructions,
      prompt,
      maxSteps,
      maxRetries: 0,
      onStepFinish: (step) => {
        steps += 1;
        for (const call of step.toolCalls) {
          toolCalls.push({ toolName: call.toolName, args: call.args });
        }
      },
    });

    const stoppedByCap = steps >= maxSteps && result.toolCalls.length > 0;
    if (stoppedByCap) {
      console.warn(`[agent] Stopped after ${maxSteps} steps with tool calls still pending`);
    }

    return {
      text: stoppedByCap ? "" : result.text.trim(),
      steps,
      toolCalls,
      stoppedByCap,
    };
  } catch (err) {
    return { text: "", steps, toolCalls, stoppedByCap: false, error: describeModelError(err) };
  }
}
