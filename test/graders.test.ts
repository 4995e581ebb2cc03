import { beforeEach, describe, expect, it, vi } from "vitest";
import { createGrader, grade } from "../src/graders/index.js";
import { COMPARISON_INSTRUCTIONS, DIFF_SYNTAX_INSTRUCTIONS } from "../src/graders/prompts.js";
import { createBenchmarkResult } from "../src/schemas/benchmarkResult.js";
import { ModelResponseJudgmentSchema } from "../src/schemas/judgments.js";
import { CLEAN_DIFF_GRADE, fakeJudge } from "./helpers.js";

beforeEach(() => {
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

describe("grade", () => {
  it("sends instructions as the system message and content as the user message", async () => {
    const { judge, complete } = fakeJudge();
    await grade("the response", "grading instructions", ModelResponseJudgmentSchema, { judge, model: "gpt-4o" });

    expect(complete).toHaveBeenCalledWith({
      model: "gpt-4o",
      messages: [
        { role: "system", content: "grading instructions" },
        { role: "user", content: "the response" },
      ],
    });
  });

  it("returns the parsed judgment", async () => {
    const { judge } = fakeJudge({ diff: { referenced_format: true, trailing_waffling: false } });
    const result = await grade("text", "instructions", ModelResponseJudgmentSchema, { judge, model: "gpt-4o" });
    expect(result).toEqual({ referenced_format: true, trailing_waffling: false });
  });

  it("returns an error object for replies that are not JSON", async () => {
    const { judge } = fakeJudge({ diff: "not json" });
    const result = await grade("text", "instructions", ModelResponseJudgmentSchema, { judge, model: "gpt-4o" });

    expect(Object.keys(result)).toEqual(["error"]);
    expect("error" in result && typeof result.error).toBe("string");
  });

  it("returns an error object when the judge call fails", async () => {
    const judge = { complete: vi.fn(async () => Promise.reject(new Error("network down"))) };
    const result = await grade("text", "instructions", ModelResponseJudgmentSchema, { judge, model: "gpt-4o" });
    expect(result).toEqual({ error: "network down" });
  });

  it("returns an error object when token counting fails", async () => {
    const { judge, complete } = fakeJudge();
    const result = await grade("text", "instructions", ModelResponseJudgmentSchema, {
      judge,
      model: "gpt-4o",
      budget: {
        countTokens: () => {
          throw new Error("tokenizer unavailable");
        },
      },
    });

    expect(result).toEqual({ error: "tokenizer unavailable" });
    expect(complete).not.toHaveBeenCalled();
  });

  it("returns an error object when the reply misses required fields", async () => {
    const { judge } = fakeJudge({ diff: { referenced_format: true } });
    const result = await grade("text", "instructions", ModelResponseJudgmentSchema, { judge, model: "gpt-4o" });
    expect(result).toEqual({
      error: "Judge reply did not match the expected schema: trailing_waffling: Required",
    });
  });

  it("truncates oversized content before calling the judge", async () => {
    const { judge, complete } = fakeJudge({ diff: { referenced_format: false, trailing_waffling: false } });
    await grade("x".repeat(100), "", ModelResponseJudgmentSchema, {
      judge,
      model: "gpt-4o",
      budget: { countTokens: () => 100, contextLength: () => 1050, verbose: false },
    });

    const request = complete.mock.calls[0]?.[0];
    expect(request?.messages[1]?.content).toBe("x".repeat(50));
  });
});

describe("createGrader", () => {
  it("grades diffs with the diff syntax instructions", async () => {
    const { judge, complete } = fakeJudge({
      diff: {
        off_by_one: true,
        off_by_one_lines: [12],
        off_by_one_direction: [-1],
        indentation: false,
        syntax: false,
      },
    });
    const grader = createGrader({ judge, model: "gpt-4o" });

    const result = await grader.gradeDiffSyntax("some diff");

    expect(complete.mock.calls[0]?.[0].messages[0]?.content).toBe(DIFF_SYNTAX_INSTRUCTIONS);
    expect(result).toEqual({
      off_by_one: true,
      off_by_one_lines: [12],
      off_by_one_direction: [-1],
      indentation: false,
      syntax: false,
    });
  });

  it("puts the reference diff before the generated diff when comparing", async () => {
    const { judge, complete } = fakeJudge();
    const grader = createGrader({ judge, model: "gpt-4o" });

    await grader.compareDiffs("+human", "+generated");

    const request = complete.mock.calls[0]?.[0];
    expect(request?.messages[0]?.content).toBe(COMPARISON_INSTRUCTIONS);
    expect(request?.messages[1]?.content).toBe("HUMAN WRITTEN DIFF:\n+human\nGENERATED DIFF:\n+generated");
  });
});

describe("gradeDiff", () => {
  it("grades syntax then response and skips the comparison without a reference diff", async () => {
    const { judge, complete } = fakeJudge();
    const grader = createGrader({ judge, model: "gpt-4o" });
    const result = createBenchmarkResult("task-0-1", "task");

    await grader.gradeDiff("+line", "Here you go.", result);

    expect(complete).toHaveBeenCalledTimes(2);
    expect(complete.mock.calls[0]?.[0].messages[1]?.content).toBe("+line");
    expect(complete.mock.calls[1]?.[0].messages[1]?.content).toBe("Here you go.");
    expect(result).toEqual({
      name: "task-0-1",
      family: "task",
      code: "+line",
      diffGrade: { off_by_one: false, indentation: false, syntax: false },
      offByOne: false,
      indentationError: false,
      syntaxError: false,
      responseGrade: { referenced_format: false, trailing_waffling: false },
      referencedFormat: false,
      trailingWaffling: false,
    });
    expect(result.comparisonGrade).toBeUndefined();
    expect(result.missingFunctionality).toBeUndefined();
    expect(result.extraFunctionality).toBeUndefined();
  });

  it("fills in the comparison fields with a reference diff", async () => {
    const { judge, complete } = fakeJudge({
      comparison: {
        missing_functionality: true,
        missing_description: "No input validation",
        extra_functionality: false,
      },
    });
    const grader = createGrader({ judge, model: "gpt-4o" });
    const result = createBenchmarkResult("task-0-1", "task");

    await grader.gradeDiff("+generated", "Done.", result, "+reference");

    expect(complete).toHaveBeenCalledTimes(3);
    expect(complete.mock.calls[2]?.[0].messages[1]?.content).toBe(
      "HUMAN WRITTEN DIFF:\n+reference\nGENERATED DIFF:\n+generated"
    );
    expect(result.comparisonGrade).toEqual({
      missing_functionality: true,
      missing_description: "No input validation",
      extra_functionality: false,
    });
    expect(result.missingFunctionality).toBe(true);
    expect(result.missingDescription).toBe("No input validation");
    expect(result.extraFunctionality).toBe(false);
    expect(result.extraDescription).toBeUndefined();
  });

  it("records grading errors without setting derived flags", async () => {
    const { judge } = fakeJudge({ diff: "{ broken" });
    const grader = createGrader({ judge, model: "gpt-4o" });
    const result = createBenchmarkResult("task-0-1", "task");

    await grader.gradeDiff("+line", "Done.", result);

    expect(result.diffGrade && "error" in result.diffGrade).toBe(true);
    expect(result.offByOne).toBeUndefined();
    expect(result.syntaxError).toBeUndefined();
    expect(result.referencedFormat).toBe(false);
  });

  it("keeps the syntax description when a syntax error is flagged", async () => {
    const { judge } = fakeJudge({
      diff: { off_by_one: false, indentation: false, syntax: true, syntax_description: "Unclosed brace" },
    });
    const grader = createGrader({ judge, model: "gpt-4o" });
    const result = createBenchmarkResult("task-0-1", "task");

    await grader.gradeDiff("+{", "Done.", result);

    expect(result.syntaxError).toBe(true);
    expect(result.syntaxDescription).toBe("Unclosed brace");
  });

  it("grades diffs that contain special-token markup", async () => {
    const { judge, complete } = fakeJudge();
    const grader = createGrader({ judge, model: "gpt-4o" });
    const result = createBenchmarkResult("task-0-1", "task");

    await grader.gradeDiff('+STOP = "<|endoftext|>"\n', "Added the stop marker.", result);

    expect(complete).toHaveBeenCalledTimes(2);
    expect(result.diffGrade).toEqual(CLEAN_DIFF_GRADE);
    expect(result.offByOne).toBe(false);
    expect(result.referencedFormat).toBe(false);
  });
});
