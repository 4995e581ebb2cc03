/**
 * Benchmark result records.
 *
 * One record per sample attempt. It is created before the attempt starts,
 * filled in by the grading pipeline, and written to the staging log whether
 * or not the attempt succeeded. A failed attempt only carries `runError`
 * plus whatever was recorded before the failure.
 */

import { z } from "zod";
import {
  ComparisonJudgmentSchema,
  DiffSyntaxJudgmentSchema,
  GradingErrorSchema,
  ModelResponseJudgmentSchema,
  isGradingError,
  type ComparisonJudgment,
  type DiffSyntaxJudgment,
  type GradingResult,
  type ModelResponseJudgment,
} from "./judgments.js";

// =============================================================================
// NESTED SCHEMAS
// =============================================================================

const TranscriptSchema = z.object({
  id: z.string(),
  messages: z.array(
    z.object({
      role: z.enum(["system", "user", "assistant"]),
      content: z.string(),
    })
  ),
});

const TestEvalResultsSchema = z.object({
  command: z.string(),
  exitCode: z.number().nullable(),
  output: z.string(),
});

const ContextResultsSchema = z.object({
  precision: z.number(),
  recall: z.number(),
  selected: z.array(z.string()),
  expected: z.array(z.string()),
  autoContextTokens: z.number(),
});

// =============================================================================
// RESULT SCHEMA
// =============================================================================

export const BenchmarkResultSchema = z.object({
  name: z.string(),
  family: z.string(),

  // Assistant run
  cost: z.number().optional(),
  tokens: z.number().optional(),
  transcript: TranscriptSchema.optional(),
  testEvalResults: TestEvalResultsSchema.optional(),
  testEvalPassed: z.boolean().optional(),
  verify: z.boolean().optional(),

  // Auto-context evaluation
  contextResults: ContextResultsSchema.optional(),
  contextPrecision: z.number().optional(),
  contextRecall: z.number().optional(),

  // Diff syntax grading
  code: z.string().optional(),
  diffGrade: z.union([DiffSyntaxJudgmentSchema, GradingErrorSchema]).optional(),
  offByOne: z.boolean().optional(),
  indentationError: z.boolean().optional(),
  syntaxError: z.boolean().optional(),
  syntaxDescription: z.string().optional(),

  // Response style grading
  responseGrade: z.union([ModelResponseJudgmentSchema, GradingErrorSchema]).optional(),
  referencedFormat: z.boolean().optional(),
  trailingWaffling: z.boolean().optional(),

  // Comparison against the reference diff
  comparisonGrade: z.union([ComparisonJudgmentSchema, GradingErrorSchema]).optional(),
  missingFunctionality: z.boolean().optional(),
  missingDescription: z.string().optional(),
  extraFunctionality: z.boolean().optional(),
  extraDescription: z.string().optional(),

  runError: z.string().optional(),
});

export type BenchmarkResult = z.infer<typeof BenchmarkResultSchema>;
export type Transcript = z.infer<typeof TranscriptSchema>;
export type TestEvalResults = z.infer<typeof TestEvalResultsSchema>;
export type ContextResults = z.infer<typeof ContextResultsSchema>;

export function createBenchmarkResult(name: string, family: string): BenchmarkResult {
  return { name, family };
}

// =============================================================================
// ACCUMULATION
// =============================================================================

/**
 * Record a diff syntax grade. An error grade is kept as the raw grade but
 * sets none of the derived flags.
 */
export function applyDiffGrade(result: BenchmarkResult, grade: GradingResult<DiffSyntaxJudgment>): void {
  result.diffGrade = grade;
  if (isGradingError(grade)) return;

  result.offByOne = grade.off_by_one;
  result.indentationError = grade.indentation;
  result.syntaxError = grade.syntax;
  if (grade.syntax && grade.syntax_description) {
    result.syntaxDescription = grade.syntax_description;
  }
}

export function applyResponseGrade(
  result: BenchmarkResult,
  grade: GradingResult<ModelResponseJudgment>
): void {
  result.responseGrade = grade;
  if (isGradingError(grade)) return;

  result.referencedFormat = grade.referenced_format;
  result.trailingWaffling = grade.trailing_waffling;
}

export function applyComparisonGrade(
  result: BenchmarkResult,
  grade: GradingResult<ComparisonJudgment>
): void {
  result.comparisonGrade = grade;
  if (isGradingError(grade)) return;

  result.missingFunctionality = grade.missing_functionality;
  result.extraFunctionality = grade.extra_functionality;
  if (grade.missing_description) {
    result.missingDescription = grade.missing_description;
  }
  if (grade.extra_description) {
    result.extraDescription = grade.extra_description;
  }
}

// =============================================================================
// SERIALIZATION
// =============================================================================

/** One JSON line of the staging log */
export function serializeResult(result: BenchmarkResult): string {
  return JSON.stringify(result);
}

/**
 * Parse one staging log line.
 *
 * @throws Error when the line is not a valid result record
 */
export function parseResultLine(line: string): BenchmarkResult {
  const parsed: unknown = JSON.parse(line);
  const result = BenchmarkResultSchema.safeParse(parsed);
  if (!result.success) {
    const errors = result.error.issues
      .map((e) => `${String(e.path.join("."))}: ${e.message}`)
      .join("; ");
    throw new Error(`Invalid result record: ${errors}`);
  }
  return result.data;
}
