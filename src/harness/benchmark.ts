/**
 * A benchmark: a titled set of samples run against the assistant and graded.
 *
 * Each (sample, retry) pair is one attempt, and every attempt yields exactly
 * one result record, failed or not:
 *
 *   pending -> context eval (optional) -> execution -> verify (optional)
 *           -> grading -> completed
 *   pending -> ... -> failed (runError set, partial fields kept)
 */

import {
  BenchmarkConfigSchema,
  type BenchmarkConfig,
  type BenchmarkDefinition,
  type VerifyCheck,
} from "../schemas/benchmarkDefinition.js";
import { createBenchmarkResult, type BenchmarkResult } from "../schemas/benchmarkResult.js";
import { createSample, type Sample } from "../schemas/sample.js";
import { getGitDiff, setupRepo } from "../utils/git.js";
import { runShellCommand } from "../utils/shell.js";
import { withRestoredWorkingDirectory } from "../utils/workingDirectory.js";
import { scoreContextSelection } from "./contextScore.js";
import type { AttemptOutcome, BenchmarkRunOptions, VerifyFn } from "./types.js";

// =============================================================================
// PLUGINS & DEFINITION HELPERS
// =============================================================================

/** Programmatic benchmark source: produces samples for a config */
export interface BenchmarkPlugin {
  title: string;
  description?: string;
  config?: Partial<BenchmarkConfig>;
  loadSamples(config: BenchmarkConfig): Promise<Sample[]>;
  verify?: VerifyFn;
}

export interface DefinitionOptions {
  /** Resolves the reference diff for a definition's comparisonCommit */
  referenceDiff?: (sample: Sample, comparisonCommit: string) => Promise<string>;
}

/** Reference diff between a sample's starting state and another commit */
export async function diffFromComparisonCommit(sample: Sample, comparisonCommit: string): Promise<string> {
  const repoDir = await setupRepo({
    url: sample.repo,
    commit: sample.mergeBase,
    diffMergeBase: sample.diffMergeBase,
    diffActive: sample.diffActive,
  });
  return getGitDiff("HEAD", comparisonCommit, repoDir);
}

/** A verify check that passes when its command exits 0 in the checkout */
export function commandVerify(check: VerifyCheck): VerifyFn {
  return async ({ workingDirectory }) => {
    const { exitCode } = await runShellCommand(check.command, { cwd: workingDirectory ?? process.cwd() });
    return exitCode === 0;
  };
}

/** Result name stem: drops spaces, quotes, slashes, backslashes, `]` and `^` */
export function formatTitle(title: string): string {
  return title.replace(/[ '"/\\\]^]/g, "");
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// =============================================================================
// BENCHMARK
// =============================================================================

export interface BenchmarkInit {
  title: string;
  description?: string;
  config?: BenchmarkConfig;
  verify?: VerifyFn;
  samples: Sample[];
}

export class Benchmark {
  readonly title: string;
  readonly description: string;
  readonly config: BenchmarkConfig;
  readonly verify?: VerifyFn;
  readonly samples: Sample[];

  constructor(init: BenchmarkInit) {
    this.title = init.title;
    this.description = init.description ?? "";
    this.config = init.config ?? BenchmarkConfigSchema.parse({});
    this.verify = init.verify;
    this.samples = init.samples;
  }

  /**
   * Build a benchmark from a declarative definition: one sample per prompt.
   * With a comparisonCommit, samples get its diff as their reference diff.
   */
  static async fromDefinition(definition: BenchmarkDefinition, options: DefinitionOptions = {}): Promise<Benchmark> {
    const { referenceDiff = diffFromComparisonCommit } = options;

    const samples = definition.prompts.map((prompt) =>
      createSample({
        title: definition.title,
        description: definition.description,
        repo: definition.repo,
        mergeBase: definition.commit,
        messagePrompt: prompt,
        context: definition.minimumContext ?? [],
      })
    );

    const first = samples[0];
    if (definition.comparisonCommit && first) {
      const diff = await referenceDiff(first, definition.comparisonCommit);
      for (const sample of samples) {
        if (!sample.diffEdit) sample.diffEdit = diff;
      }
    }

    return new Benchmark({
      title: definition.title,
      description: definition.description,
      config: definition.config,
      verify: definition.verify ? commandVerify(definition.verify) : undefined,
      samples,
    });
  }

  static fromSample(sample: Sample, config?: BenchmarkConfig): Benchmark {
    return new Benchmark({
      title: sample.title,
      description: sample.description,
      config,
      samples: [sample],
    });
  }

  static async fromPlugin(plugin: BenchmarkPlugin): Promise<Benchmark> {
    const config = BenchmarkConfigSchema.parse(plugin.config ?? {});
    return new Benchmark({
      title: plugin.title,
      description: plugin.description,
      config,
      verify: plugin.verify,
      samples: await plugin.loadSamples(config),
    });
  }

  /**
   * Run every sample `retries` times, sequentially. Returns one result per
   * attempt in sample-then-retry order; attempts not started because the
   * signal was aborted produce no record.
   */
  async run(options: BenchmarkRunOptions): Promise<BenchmarkResult[]> {
    const { retries = 1, signal } = options;
    console.log(`Benchmark: ${this.title}`);

    const results: BenchmarkResult[] = [];

    for (const [i, sample] of this.samples.entries()) {
      console.log(`  Prompt: ${sample.messagePrompt}`);
      for (let j = 1; j <= retries; j++) {
        if (signal?.aborted) {
          console.warn(`[Runner] Interrupted, skipping remaining attempts of ${this.title}`);
          return results;
        }

        const family = formatTitle(sample.title);
        const name = `${family}-${i}-${j}`;
        const outcome = await this.runAttempt(sample, createBenchmarkResult(name, family), options);
        if (outcome.status === "failed") {
          console.warn(`[Runner] ${name} failed: ${outcome.reason}`);
        }
        results.push(outcome.result);
      }
    }

    return results;
  }

  private runAttempt(sample: Sample, result: BenchmarkResult, options: BenchmarkRunOptions): Promise<AttemptOutcome> {
    const { executor, grader, contextSelector } = options;

    return withRestoredWorkingDirectory(async (): Promise<AttemptOutcome> => {
      try {
        const { autoContextTokens } = this.config;
        if (sample.context.length > 0 && autoContextTokens > 0) {
          if (contextSelector) {
            const selected = await contextSelector.selectContext(sample, { autoContextTokens });
            const score = scoreContextSelection(selected, sample.context);
            result.contextResults = { ...score, selected, expected: sample.context, autoContextTokens };
            result.contextPrecision = score.precision;
            result.contextRecall = score.recall;
          } else {
            console.warn(`[Runner] No context selector configured; skipping auto-context evaluation`);
          }
        }

        const run = await executor.runSample(sample, { config: this.config });
        result.cost = run.cost;
        result.tokens = run.tokens;
        result.transcript = run.transcript;
        result.testEvalResults = run.testEvalResults;
        result.testEvalPassed = run.testEvalPassed;

        if (this.verify) {
          result.verify = await this.verify({ sample, workingDirectory: run.workingDirectory });
        }

        await grader.gradeDiff(run.diffEval, run.messageEval, result, sample.diffEdit || undefined);
        return { status: "completed", result };
      } catch (error) {
        const reason = errorMessage(error);
        result.runError = reason;
        return { status: "failed", result, reason };
      }
    });
  }
}
