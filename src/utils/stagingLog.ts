/**
 * Append-only staging log for benchmark results.
 *
 * Results are written one JSON record per line as each benchmark finishes,
 * so an interrupted batch keeps everything completed so far.
 */

import { randomUUID } from "crypto";
import { appendFileSync, readFileSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { parseResultLine, serializeResult, type BenchmarkResult } from "../schemas/benchmarkResult.js";

export class StagingLog {
  readonly path: string;

  private constructor(path: string) {
    this.path = path;
  }

  /** Create an empty log with a unique name inside `dir` */
  static create(dir: string): StagingLog {
    const path = join(dir, `benchmark_results_cache_${randomUUID()}.jsonl`);
    writeFileSync(path, "");
    return new StagingLog(path);
  }

  append(results: readonly BenchmarkResult[]): void {
    if (results.length === 0) return;
    appendFileSync(this.path, results.map((r) => serializeResult(r) + "\n").join(""));
  }

  /** All staged results in the order they were appended */
  readAll(): BenchmarkResult[] {
    return readFileSync(this.path, "utf-8")
      .split("\n")
      .filter((line) => line.trim().length > 0)
      .map(parseResultLine);
  }

  remove(): void {
    rmSync(this.path, { force: true });
  }
}
