import { vi } from "vitest";
import type { JudgeClient, JudgeRequest } from "../src/graders/judgeClient.js";
import type { SampleExecutor, SampleRunOutcome } from "../src/harness/types.js";

export interface JudgeReplies {
  diff?: object | string;
  response?: object | string;
  comparison?: object | string;
}

export const CLEAN_DIFF_GRADE = { off_by_one: false, indentation: false, syntax: false };
export const CLEAN_RESPONSE_GRADE = { referenced_format: false, trailing_waffling: false };
export const CLEAN_COMPARISON_GRADE = { missing_functionality: false, extra_functionality: false };

function dimension(request: JudgeRequest): keyof JudgeReplies {
  const instructions = request.messages[0]?.content ?? "";
  if (instructions.includes("two diffs")) return "comparison";
  if (instructions.includes("stylistic errors")) return "response";
  return "diff";
}

/** Judge that answers each grading dimension with a fixed reply */
export function fakeJudge(replies: JudgeReplies = {}) {
  const defaults: Required<JudgeReplies> = {
    diff: CLEAN_DIFF_GRADE,
    response: CLEAN_RESPONSE_GRADE,
    comparison: CLEAN_COMPARISON_GRADE,
  };
  const complete = vi.fn(async (request: JudgeRequest): Promise<string> => {
    const reply = replies[dimension(request)] ?? defaults[dimension(request)];
    return typeof reply === "string" ? reply : JSON.stringify(reply);
  });
  const judge: JudgeClient = { complete };
  return { judge, complete };
}

export function sampleOutcome(overrides: Partial<SampleRunOutcome> = {}): SampleRunOutcome {
  return {
    cost: 0.25,
    tokens: 1200,
    diffEval: "diff --git a/app.ts b/app.ts\n+console.log('hi');\n",
    messageEval: "I added a log line.",
    transcript: { id: "t-1", messages: [{ role: "assistant", content: "I added a log line." }] },
    ...overrides,
  };
}

/** Executor returning the same outcome for every sample */
export function fakeExecutor(outcome: SampleRunOutcome = sampleOutcome()) {
  const runSample = vi.fn(async () => outcome);
  const executor: SampleExecutor = { runSample };
  return { executor, runSample };
}
