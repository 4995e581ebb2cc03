/**
 * The report of one batch: every attempt's result plus run metadata.
 */

import { mkdirSync, writeFileSync } from "fs";
import { join } from "path";
import type { BenchmarkResult } from "../schemas/benchmarkResult.js";
import { getCurrentBranch, getHeadRevision } from "../utils/git.js";
import { summarizeResults, type ResultSummary, type RunSummary } from "../utils/summarizeResults.js";

export interface RunMetadata {
  type: string;
  date: string;
  /** Harness revision the run was made from */
  commit: string;
  branch: string;
}

/** "YYYY-MM-DD HH:MM:SS" in local time */
export function formatRunDate(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Metadata for a sampled run. Outside a git checkout the revision and
 * branch are recorded as "unknown".
 */
export async function collectRunMetadata(cwd: string = process.cwd(), now: Date = new Date()): Promise<RunMetadata> {
  let commit = "unknown";
  let branch = "unknown";
  try {
    commit = await getHeadRevision(cwd);
    branch = await getCurrentBranch(cwd);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`[Runner] Could not read harness revision: ${message}`);
  }
  return { type: "Sampled", date: formatRunDate(now), commit, branch };
}

function isFileExistsError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "EEXIST";
}

function formatSummaryLine(summary: ResultSummary): string {
  const parts = [
    `${summary.attempts} attempt(s)`,
    `${summary.runErrors} run error(s)`,
    `${summary.gradingErrors} grading error(s)`,
    `off-by-one ${summary.offByOne}`,
    `indentation ${summary.indentationErrors}`,
    `syntax ${summary.syntaxErrors}`,
    `referenced format ${summary.referencedFormat}`,
    `trailing waffling ${summary.trailingWaffling}`,
    `missing ${summary.missingFunctionality}`,
    `extra ${summary.extraFunctionality}`,
  ];
  if (summary.testsEvaluated > 0) {
    parts.push(`tests ${summary.testsPassed}/${summary.testsEvaluated}`);
  }
  if (summary.contextPrecision !== undefined && summary.contextRecall !== undefined) {
    parts.push(`context P ${summary.contextPrecision.toFixed(2)} R ${summary.contextRecall.toFixed(2)}`);
  }
  parts.push(`cost $${summary.totalCost.toFixed(4)}`);
  return `${summary.name}: ${parts.join(", ")}`;
}

export class BenchmarkRun {
  readonly results: BenchmarkResult[];
  readonly metadata: RunMetadata;

  constructor(results: BenchmarkResult[], metadata: RunMetadata) {
    this.results = results;
    this.metadata = metadata;
  }

  summarize(): RunSummary {
    return summarizeResults(this.results);
  }

  /**
   * Write the run as JSON into `dir`. Existing reports are never
   * overwritten: a run saved in the same second gets a numeric suffix.
   *
   * @returns Path of the written file
   */
  save(dir: string): string {
    mkdirSync(dir, { recursive: true });
    const stamp = this.metadata.date.replace(/[ :]/g, "-");
    const content = JSON.stringify({ metadata: this.metadata, results: this.results }, null, 2);

    for (let n = 0; ; n++) {
      const path = join(dir, n === 0 ? `benchmark_run_${stamp}.json` : `benchmark_run_${stamp}-${n}.json`);
      try {
        writeFileSync(path, content, { flag: "wx" });
      } catch (error) {
        if (isFileExistsError(error)) continue;
        throw error;
      }
      console.log(`[Runner] Saved run report to ${path}`);
      return path;
    }
  }

  /** Summary lines, one per family then the overall line */
  renderLines(): string[] {
    const { families, overall } = this.summarize();
    return [...families.map(formatSummaryLine), formatSummaryLine(overall)];
  }

  render(): void {
    console.log(`\nRun ${this.metadata.date} (${this.metadata.branch} @ ${this.metadata.commit})`);
    for (const line of this.renderLines()) {
      console.log(`  ${line}`);
    }
  }
}
