/**
 * Benchmark Harness
 *
 * Runs a coding assistant over benchmark samples and grades its edits with
 * an LLM judge:
 * 1. Discover benchmarks in a directory (YAML definitions, JSON samples)
 * 2. Run each benchmark's attempts sequentially through the executor
 * 3. Grade each diff and response, staging results as benchmarks finish
 * 4. Collect the staged results into a run report
 *
 * Usage:
 * ```typescript
 * import { runBenchmarks } from "./harness/index.js";
 * import { createCommandExecutor } from "./executors/commandExecutor.js";
 * import { createGrader, createOpenAIJudgeClient } from "./graders/index.js";
 *
 * const run = await runBenchmarks({
 *   directory: "benchmarks",
 *   executor: createCommandExecutor({ command: "my-assistant" }),
 *   grader: createGrader({ judge: createOpenAIJudgeClient() }),
 * });
 * ```
 */

import { existsSync } from "fs";
import { resolve } from "path";
import type { Grader } from "../graders/index.js";
import { benchmarkListed, discoverBenchmarks, type DiscoverOptions } from "../utils/loadBenchmarks.js";
import { StagingLog } from "../utils/stagingLog.js";
import { Benchmark, type BenchmarkPlugin } from "./benchmark.js";
import { BenchmarkRun, collectRunMetadata, type RunMetadata } from "./benchmarkRun.js";
import type { ContextSelector, SampleExecutor } from "./types.js";

export { Benchmark, commandVerify, diffFromComparisonCommit, formatTitle, type BenchmarkPlugin } from "./benchmark.js";
export { BenchmarkRun, collectRunMetadata, formatRunDate, type RunMetadata } from "./benchmarkRun.js";
export { scoreContextSelection, type ContextScore } from "./contextScore.js";
export type * from "./types.js";

/** Default directory for saved run reports */
export const RESULTS_DIR = "benchmark_results";

export interface RunBenchmarksOptions {
  /** Directory to discover benchmarks in */
  directory: string;
  /** Title substrings to run (default: all) */
  benchmarks?: string[];
  /** Attempts per sample (default: 1) */
  retries?: number;
  /** Run at most this many benchmarks */
  maxBenchmarks?: number;
  /** Auto-context budget for benchmarks loaded from samples (default: 0, off) */
  autoContextTokens?: number;
  executor: SampleExecutor;
  grader: Grader;
  contextSelector?: ContextSelector;
  /** Registered benchmarks run after the discovered ones */
  plugins?: BenchmarkPlugin[];
  /** Where the run report is saved (default: RESULTS_DIR) */
  resultsDir?: string;
  /** Aborting stops the batch after the current benchmark's staged results */
  signal?: AbortSignal;
  /** Reference diff resolution for definitions with a comparisonCommit */
  referenceDiff?: DiscoverOptions["referenceDiff"];
  metadata?: () => Promise<RunMetadata>;
}

/** A benchmark whose samples are loaded when its turn in the batch comes */
interface PendingBenchmark {
  title: string;
  load: () => Promise<Benchmark>;
}

/**
 * Run a batch of benchmarks and return the run report.
 *
 * Benchmarks run one at a time. A benchmark that throws is skipped; an
 * abort stops the batch. Either way the results staged so far make up the
 * report.
 */
export async function runBenchmarks(options: RunBenchmarksOptions): Promise<BenchmarkRun> {
  const {
    benchmarks: filters = [],
    retries = 1,
    maxBenchmarks,
    autoContextTokens = 0,
    executor,
    grader,
    contextSelector,
    plugins = [],
    resultsDir = RESULTS_DIR,
    signal,
    referenceDiff,
    metadata = () => collectRunMetadata(),
  } = options;

  const dirPath = resolve(options.directory);
  if (!existsSync(dirPath)) {
    throw new Error(`Invalid directory: ${options.directory}`);
  }
  console.log(`Running benchmarks from ${dirPath}`);

  const discovered = await discoverBenchmarks(dirPath, { filters, autoContextTokens, referenceDiff });
  const benchmarks: PendingBenchmark[] = [
    ...discovered.map((benchmark) => ({ title: benchmark.title, load: async () => benchmark })),
    ...plugins
      .filter((plugin) => benchmarkListed(plugin.title, filters))
      .map((plugin) => ({ title: plugin.title, load: () => Benchmark.fromPlugin(plugin) })),
  ];
  console.log("Found benchmarks:\n" + benchmarks.map((b) => b.title).join("\n"));
  console.log("*".repeat(80));

  const staging = StagingLog.create(dirPath);
  let totalCost = 0;

  for (const [i, pending] of benchmarks.entries()) {
    if (maxBenchmarks && i >= maxBenchmarks) break;
    if (signal?.aborted) {
      console.log("Exiting...");
      break;
    }

    try {
      const benchmark = await pending.load();
      const results = await benchmark.run({ retries, executor, grader, contextSelector, signal });
      staging.append(results);
      totalCost += results.reduce((sum, r) => sum + (r.cost ?? 0), 0);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Error running benchmark ${pending.title}: ${message}`);
    }
  }

  console.log(`Total cost: ${totalCost}`);
  const run = new BenchmarkRun(staging.readAll(), await metadata());
  run.save(resultsDir);
  staging.remove();
  run.render();

  return run;
}
