/**
 * Command-line interface for running benchmarks.
 *
 * Usage: edit-grading-bench [--benchmarks <title>...] [--directory <dir>]
 *          [--retries <n>] [--max-benchmarks <n>] [--auto-context-tokens <n>]
 *          [--swe-bench dev|train|test] [--assistant-command <cmd>]
 */

import { join } from "path";
import { parseArgs } from "util";
import { z } from "zod";
import { createGrader, createOpenAIJudgeClient, JUDGE_MODEL } from "./graders/index.js";
import { createCommandExecutor } from "./executors/commandExecutor.js";
import { RESULTS_DIR, runBenchmarks } from "./harness/index.js";
import { logRunToBraintrust } from "./reporting/braintrust.js";
import { SWE_BENCH_SAMPLES_DIR, getSweSamples, isSweBenchSplit } from "./swebench/index.js";

const CliOptionsSchema = z.object({
  benchmarks: z.array(z.string()).default([]),
  directory: z.string().default("benchmarks"),
  retries: z.coerce.number().int().positive().default(1),
  maxBenchmarks: z.coerce.number().int().positive().optional(),
  autoContextTokens: z.coerce.number().int().nonnegative().default(0),
  sweBench: z.string().optional(),
  assistantCommand: z.string().optional(),
  judgeModel: z.string().default(JUDGE_MODEL),
  resultsDir: z.string().default(RESULTS_DIR),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

/**
 * Parse command-line flags.
 *
 * @throws Error for unknown flags or invalid values
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      benchmarks: { type: "string", short: "b", multiple: true },
      directory: { type: "string", short: "d" },
      retries: { type: "string", short: "r" },
      "max-benchmarks": { type: "string" },
      "auto-context-tokens": { type: "string" },
      "swe-bench": { type: "string" },
      "assistant-command": { type: "string" },
      "judge-model": { type: "string" },
      "results-dir": { type: "string" },
    },
    strict: true,
  });

  const result = CliOptionsSchema.safeParse({
    benchmarks: values.benchmarks,
    directory: values.directory,
    retries: values.retries,
    maxBenchmarks: values["max-benchmarks"],
    autoContextTokens: values["auto-context-tokens"],
    sweBench: values["swe-bench"],
    assistantCommand: values["assistant-command"],
    judgeModel: values["judge-model"],
    resultsDir: values["results-dir"],
  });
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${String(e.path.join("."))}: ${e.message}`).join("\n");
    throw new Error(`Invalid arguments:\n${errors}`);
  }
  return result.data;
}

/**
 * Run the CLI and resolve with the process exit status.
 */
export async function main(argv: string[]): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    return 1;
  }

  let { benchmarks, directory } = options;
  if (options.sweBench !== undefined) {
    if (!isSweBenchSplit(options.sweBench)) {
      console.error("Invalid SWE-Bench split.");
      return 1;
    }
    const samples = await getSweSamples(options.sweBench, options.maxBenchmarks);
    benchmarks = samples.map((sample) => sample.title);
    directory = join(SWE_BENCH_SAMPLES_DIR, options.sweBench);
  }

  const assistantCommand = options.assistantCommand || process.env.ASSISTANT_COMMAND;
  if (!assistantCommand) {
    console.error("No assistant command. Pass --assistant-command or set ASSISTANT_COMMAND.");
    return 1;
  }

  const controller = new AbortController();
  const onInterrupt = () => {
    console.log("\nInterrupted, finishing the current attempt...");
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  try {
    const grader = createGrader({ judge: createOpenAIJudgeClient(), model: options.judgeModel });
    const run = await runBenchmarks({
      benchmarks,
      directory,
      retries: options.retries,
      maxBenchmarks: options.maxBenchmarks,
      autoContextTokens: options.autoContextTokens,
      executor: createCommandExecutor({ command: assistantCommand }),
      grader,
      resultsDir: options.resultsDir,
      signal: controller.signal,
    });

    if (process.env.BRAINTRUST_API_KEY) {
      try {
        const url = await logRunToBraintrust(run);
        if (url) console.log(`View the experiment at: ${url}`);
      } catch (error) {
        console.warn(`[Braintrust] Could not log run: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
    return 0;
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    return 1;
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }
}
