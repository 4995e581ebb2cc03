/**
 * Zod schemas for the JSON judgments returned by the grading model.
 *
 * Conditional fields (line lists, descriptions) are only required by the
 * instructions when their flag is true; models sometimes send them as null.
 */

import { z } from "zod";

const LineList = z.array(z.number().int()).nullish();
const Description = z.string().nullish();

// =============================================================================
// DIFF SYNTAX
// =============================================================================

export const DiffSyntaxJudgmentSchema = z.object({
  off_by_one: z.boolean(),
  /** Line numbers inserted at the wrong place */
  off_by_one_lines: LineList,
  /** Same order as off_by_one_lines; positive means inserted too low */
  off_by_one_direction: LineList,
  indentation: z.boolean(),
  indentation_lines: LineList,
  /** Same order as indentation_lines; positive means indented too far */
  indentation_direction: LineList,
  syntax: z.boolean(),
  syntax_description: Description,
});

// =============================================================================
// MODEL RESPONSE STYLE
// =============================================================================

export const ModelResponseJudgmentSchema = z.object({
  /** The response talks about its own edit format */
  referenced_format: z.boolean(),
  /** The response hedges after presenting its edits */
  trailing_waffling: z.boolean(),
});

// =============================================================================
// DIFF COMPARISON
// =============================================================================

export const ComparisonJudgmentSchema = z.object({
  missing_functionality: z.boolean(),
  missing_description: Description,
  extra_functionality: z.boolean(),
  extra_description: Description,
});

// =============================================================================
// GRADING RESULTS
// =============================================================================

/** Returned in place of a judgment when grading failed for any reason */
export const GradingErrorSchema = z.object({ error: z.string() });

export type DiffSyntaxJudgment = z.infer<typeof DiffSyntaxJudgmentSchema>;
export type ModelResponseJudgment = z.infer<typeof ModelResponseJudgmentSchema>;
export type ComparisonJudgment = z.infer<typeof ComparisonJudgmentSchema>;
export type GradingError = z.infer<typeof GradingErrorSchema>;

/** A judgment or the error that prevented it */
export type GradingResult<T> = T | GradingError;

export function isGradingError<T extends object>(result: GradingResult<T>): result is GradingError {
  return "error" in result && typeof result.error === "string" && Object.keys(result).length === 1;
}
