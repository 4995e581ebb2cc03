/**
 * Graders for assistant edits.
 *
 * Three grading dimensions, each a single judge call:
 * - Diff syntax: misplaced lines, bad indentation, syntax errors
 * - Response style: the assistant discussing its edit format or hedging
 * - Comparison: missing or extra functionality versus a reference diff
 */

import {
  applyComparisonGrade,
  applyDiffGrade,
  applyResponseGrade,
  type BenchmarkResult,
} from "../schemas/benchmarkResult.js";
import {
  ComparisonJudgmentSchema,
  DiffSyntaxJudgmentSchema,
  ModelResponseJudgmentSchema,
  type ComparisonJudgment,
  type DiffSyntaxJudgment,
  type GradingResult,
  type ModelResponseJudgment,
} from "../schemas/judgments.js";
import { grade, type GradeOptions } from "./grade.js";
import {
  COMPARISON_INSTRUCTIONS,
  DIFF_SYNTAX_INSTRUCTIONS,
  MODEL_RESPONSE_INSTRUCTIONS,
  formatComparisonContent,
} from "./prompts.js";

export { grade, type GradeOptions } from "./grade.js";
export { JUDGE_MODEL, createOpenAIJudgeClient, type JudgeClient, type JudgeRequest } from "./judgeClient.js";

export interface Grader {
  gradeDiffSyntax(diff: string): Promise<GradingResult<DiffSyntaxJudgment>>;
  gradeModelResponse(responseText: string): Promise<GradingResult<ModelResponseJudgment>>;
  compareDiffs(referenceDiff: string, generatedDiff: string): Promise<GradingResult<ComparisonJudgment>>;
  /**
   * Grade a generated diff and the assistant's response, writing every
   * judgment onto `result`. The comparison only runs when a reference diff
   * is given.
   */
  gradeDiff(diff: string, response: string, result: BenchmarkResult, comparisonDiff?: string): Promise<BenchmarkResult>;
}

export function createGrader(options: GradeOptions): Grader {
  const grader: Grader = {
    gradeDiffSyntax: (diff) => grade(diff, DIFF_SYNTAX_INSTRUCTIONS, DiffSyntaxJudgmentSchema, options),

    gradeModelResponse: (responseText) =>
      grade(responseText, MODEL_RESPONSE_INSTRUCTIONS, ModelResponseJudgmentSchema, options),

    compareDiffs: (referenceDiff, generatedDiff) =>
      grade(
        formatComparisonContent(referenceDiff, generatedDiff),
        COMPARISON_INSTRUCTIONS,
        ComparisonJudgmentSchema,
        options
      ),

    async gradeDiff(diff, response, result, comparisonDiff) {
      result.code = diff;
      applyDiffGrade(result, await grader.gradeDiffSyntax(diff));
      applyResponseGrade(result, await grader.gradeModelResponse(response));

      if (comparisonDiff) {
        applyComparisonGrade(result, await grader.compareDiffs(comparisonDiff, diff));
      }
      return result;
    },
  };
  return grader;
}
