/**
 * Judge model client.
 *
 * Grading goes through the OpenAI chat completions API. Setting
 * JUDGE_BASE_URL routes calls through any OpenAI-compatible proxy (for
 * example the Braintrust AI proxy), which also makes non-OpenAI judge models
 * available by name.
 */

import OpenAI from "openai";
import type { PromptMessage } from "../utils/tokenBudget.js";

// =============================================================================
// MODEL CONFIGURATION
// =============================================================================

/** Model used for grading */
export const JUDGE_MODEL = process.env.JUDGE_MODEL || "gpt-4-1106-preview";

// =============================================================================
// CLIENT
// =============================================================================

export interface JudgeRequest {
  model: string;
  messages: readonly PromptMessage[];
}

/** Anything that can answer a grading prompt with JSON text */
export interface JudgeClient {
  complete(request: JudgeRequest): Promise<string>;
}

export interface OpenAIJudgeOptions {
  apiKey?: string;
  baseURL?: string;
}

/**
 * Create a judge backed by the OpenAI SDK, requesting JSON-object output.
 *
 * @throws Error when no API key is configured
 */
export function createOpenAIJudgeClient(options: OpenAIJudgeOptions = {}): JudgeClient {
  const apiKey = options.apiKey || process.env.OPENAI_API_KEY;
  if (!apiKey) {
    throw new Error("No judge API key. Set OPENAI_API_KEY.");
  }

  const client = new OpenAI({
    apiKey,
    baseURL: options.baseURL || process.env.JUDGE_BASE_URL || undefined,
  });

  return {
    async complete(request: JudgeRequest): Promise<string> {
      const response = await client.chat.completions.create({
        model: request.model,
        messages: request.messages.map((message) =>
          message.role === "system"
            ? { role: "system" as const, content: message.content }
            : { role: "user" as const, content: message.content }
        ),
        response_format: { type: "json_object" },
      });
      const content = response.choices[0]?.message?.content;
      if (content === null || content === undefined) {
        throw new Error(`Judge ${request.model} returned no content`);
      }
      return content;
    },
  };
}
