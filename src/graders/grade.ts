/**
 * Generic LLM grading primitive.
 *
 * Every grading dimension is one judge call: the instructions go in the
 * system message, the content to grade in the user message. Grading never
 * throws: any failure comes back as `{ error }`.
 */

import type { z } from "zod";
import type { GradingResult } from "../schemas/judgments.js";
import { fitPromptToContext, type GradingPrompt, type TokenBudgetOptions } from "../utils/tokenBudget.js";
import { JUDGE_MODEL, type JudgeClient } from "./judgeClient.js";

export interface GradeOptions {
  judge: JudgeClient;
  /** Judge model (default: JUDGE_MODEL) */
  model?: string;
  /** Overrides for token counting and context lookup */
  budget?: TokenBudgetOptions;
}

/**
 * Grade `content` against `instructions`, validating the reply with `schema`.
 */
export async function grade<T extends z.ZodTypeAny>(
  content: string,
  instructions: string,
  schema: T,
  options: GradeOptions
): Promise<GradingResult<z.infer<T>>> {
  const { judge, model = JUDGE_MODEL, budget } = options;

  try {
    const prompt: GradingPrompt = [
      { role: "system", content: instructions },
      { role: "user", content },
    ];
    const { messages } = fitPromptToContext(prompt, model, budget);

    const text = await judge.complete({ model, messages });
    const parsed: unknown = JSON.parse(text);

    const result = schema.safeParse(parsed);
    if (!result.success) {
      const issues = result.error.issues
        .map((e) => `${String(e.path.join("."))}: ${e.message}`)
        .join("; ");
      return { error: `Judge reply did not match the expected schema: ${issues}` };
    }
    return result.data;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`[Grader] Grading failed: ${message}`);
    return { error: message };
  }
}
