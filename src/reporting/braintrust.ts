/**
 * Braintrust reporting.
 *
 * Logs a finished run as a Braintrust experiment, one row per attempt.
 * Grading flags become scores where 1 means the problem was absent; flags a
 * judgment never set are logged as null.
 */

import { init } from "braintrust";
import type { BenchmarkRun } from "../harness/benchmarkRun.js";
import type { BenchmarkResult } from "../schemas/benchmarkResult.js";

export const BRAINTRUST_PROJECT = process.env.BRAINTRUST_PROJECT || "Edit Grading Bench";

function absent(flag: boolean | undefined): number | null {
  if (flag === undefined) return null;
  return flag ? 0 : 1;
}

function passed(flag: boolean | undefined): number | null {
  if (flag === undefined) return null;
  return flag ? 1 : 0;
}

/** Braintrust scores for one attempt */
export function resultScores(result: BenchmarkResult): Record<string, number | null> {
  return {
    Run_Succeeded: result.runError === undefined ? 1 : 0,
    Diff_NoOffByOne: absent(result.offByOne),
    Diff_NoIndentationError: absent(result.indentationError),
    Diff_NoSyntaxError: absent(result.syntaxError),
    Response_NoReferencedFormat: absent(result.referencedFormat),
    Response_NoTrailingWaffling: absent(result.trailingWaffling),
    Comparison_NoMissingFunctionality: absent(result.missingFunctionality),
    Comparison_NoExtraFunctionality: absent(result.extraFunctionality),
    Tests_Passed: passed(result.testEvalPassed),
    Verify_Passed: passed(result.verify),
    Context_Precision: result.contextPrecision ?? null,
    Context_Recall: result.contextRecall ?? null,
  };
}

export interface BraintrustReportOptions {
  projectName?: string;
  apiKey?: string;
}

/**
 * Log every result of `run` to a new experiment.
 *
 * @returns The experiment URL, when Braintrust reports one
 */
export async function logRunToBraintrust(
  run: BenchmarkRun,
  options: BraintrustReportOptions = {}
): Promise<string | undefined> {
  const { projectName = BRAINTRUST_PROJECT, apiKey = process.env.BRAINTRUST_API_KEY } = options;

  const experiment = init({
    project: projectName,
    experiment: `Sampled ${run.metadata.date}`,
    apiKey,
    metadata: { ...run.metadata },
  });

  for (const result of run.results) {
    experiment.log({
      input: { name: result.name, family: result.family, transcript: result.transcript },
      output: result.code ?? "",
      scores: resultScores(result),
      metadata: {
        diffGrade: result.diffGrade,
        responseGrade: result.responseGrade,
        comparisonGrade: result.comparisonGrade,
        syntaxDescription: result.syntaxDescription,
        missingDescription: result.missingDescription,
        extraDescription: result.extraDescription,
        cost: result.cost,
        tokens: result.tokens,
        runError: result.runError,
      },
    });
  }

  const summary = await experiment.summarize();
  console.log(`[Braintrust] Logged ${run.results.length} result(s) to ${projectName}`);
  return summary.experimentUrl;
}
