/**
 * Result aggregation for run reports.
 *
 * Counts grading flags per result family (one family per benchmark title)
 * and across the whole run. Flags only count where a judgment set them.
 */

import type { BenchmarkResult } from "../schemas/benchmarkResult.js";
import { isGradingError } from "../schemas/judgments.js";

export interface ResultSummary {
  /** Family name, or "All" for the run-wide summary */
  name: string;
  attempts: number;
  runErrors: number;
  gradingErrors: number;
  offByOne: number;
  indentationErrors: number;
  syntaxErrors: number;
  referencedFormat: number;
  trailingWaffling: number;
  missingFunctionality: number;
  extraFunctionality: number;
  testsEvaluated: number;
  testsPassed: number;
  verified: number;
  totalCost: number;
  /** Mean over attempts with an auto-context evaluation */
  contextPrecision?: number;
  contextRecall?: number;
}

export interface RunSummary {
  families: ResultSummary[];
  overall: ResultSummary;
}

function countWhere(results: readonly BenchmarkResult[], predicate: (r: BenchmarkResult) => boolean): number {
  return results.filter(predicate).length;
}

function mean(values: number[]): number | undefined {
  return values.length > 0 ? values.reduce((sum, v) => sum + v, 0) / values.length : undefined;
}

function hasGradingError(result: BenchmarkResult): boolean {
  return [result.diffGrade, result.responseGrade, result.comparisonGrade].some(
    (grade) => grade !== undefined && isGradingError(grade)
  );
}

export function summarizeGroup(name: string, results: readonly BenchmarkResult[]): ResultSummary {
  return {
    name,
    attempts: results.length,
    runErrors: countWhere(results, (r) => r.runError !== undefined),
    gradingErrors: countWhere(results, hasGradingError),
    offByOne: countWhere(results, (r) => r.offByOne === true),
    indentationErrors: countWhere(results, (r) => r.indentationError === true),
    syntaxErrors: countWhere(results, (r) => r.syntaxError === true),
    referencedFormat: countWhere(results, (r) => r.referencedFormat === true),
    trailingWaffling: countWhere(results, (r) => r.trailingWaffling === true),
    missingFunctionality: countWhere(results, (r) => r.missingFunctionality === true),
    extraFunctionality: countWhere(results, (r) => r.extraFunctionality === true),
    testsEvaluated: countWhere(results, (r) => r.testEvalPassed !== undefined),
    testsPassed: countWhere(results, (r) => r.testEvalPassed === true),
    verified: countWhere(results, (r) => r.verify === true),
    totalCost: results.reduce((sum, r) => sum + (r.cost ?? 0), 0),
    contextPrecision: mean(results.flatMap((r) => (r.contextPrecision === undefined ? [] : [r.contextPrecision]))),
    contextRecall: mean(results.flatMap((r) => (r.contextRecall === undefined ? [] : [r.contextRecall]))),
  };
}

/**
 * Summarize results per family, in order of first appearance, plus overall.
 */
export function summarizeResults(results: readonly BenchmarkResult[]): RunSummary {
  const byFamily = new Map<string, BenchmarkResult[]>();
  for (const result of results) {
    const group = byFamily.get(result.family);
    if (group) {
      group.push(result);
    } else {
      byFamily.set(result.family, [result]);
    }
  }

  return {
    families: [...byFamily.entries()].map(([family, group]) => summarizeGroup(family, group)),
    overall: summarizeGroup("All", results),
  };
}
