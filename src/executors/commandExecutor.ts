/**
 * Command-line assistant executor.
 *
 * Prepares the sample checkout, pipes the prompt to a configured assistant
 * command running inside it, then reads the resulting diff with git and runs
 * the sample's test command, if any.
 *
 * The assistant can report usage by writing `{ "cost": ..., "tokens": ... }`
 * to the file named by BENCH_USAGE_FILE.
 */

import { randomUUID } from "crypto";
import { existsSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { z } from "zod";
import type { SampleExecutor, SampleRunOutcome } from "../harness/types.js";
import type { TestEvalResults } from "../schemas/benchmarkResult.js";
import type { Sample } from "../schemas/sample.js";
import { getWorkingTreeDiff, setupRepo } from "../utils/git.js";
import { runShellCommand } from "../utils/shell.js";

const UsageSchema = z.object({
  cost: z.number().nonnegative().default(0),
  tokens: z.number().int().nonnegative().default(0),
});

export type Usage = z.infer<typeof UsageSchema>;

export interface CommandExecutorOptions {
  /** Shell command for the assistant; receives the prompt on stdin */
  command: string;
  /** Clone cache for sample repositories */
  cacheDir?: string;
}

/**
 * Prompt text for the assistant: earlier conversation turns, if any,
 * followed by the sample prompt.
 */
export function buildAssistantPrompt(sample: Sample): string {
  const history = sample.messageHistory.map((m) => `${m.role.toUpperCase()}: ${m.content}`);
  return history.length > 0 ? `${history.join("\n\n")}\n\nUSER: ${sample.messagePrompt}` : sample.messagePrompt;
}

/** Usage reported by the assistant, or zero usage when none was written */
export function readUsageFile(path: string): Usage {
  if (!existsSync(path)) return { cost: 0, tokens: 0 };

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch {
    parsed = undefined;
  }

  const result = UsageSchema.safeParse(parsed);
  if (!result.success) {
    console.warn(`[Executor] Ignoring malformed usage file ${path}`);
    return { cost: 0, tokens: 0 };
  }
  return result.data;
}

function tail(text: string, lines: number = 20): string {
  return text.trimEnd().split("\n").slice(-lines).join("\n");
}

export function createCommandExecutor(options: CommandExecutorOptions): SampleExecutor {
  return {
    async runSample(sample: Sample): Promise<SampleRunOutcome> {
      const cwd = await setupRepo({
        url: sample.repo,
        commit: sample.mergeBase,
        diffMergeBase: sample.diffMergeBase,
        diffActive: sample.diffActive,
        cacheDir: options.cacheDir,
      });

      const prompt = buildAssistantPrompt(sample);
      const usageFile = join(tmpdir(), `bench-usage-${randomUUID()}.json`);

      try {
        console.log(`[Executor] Running assistant in ${cwd}`);
        const run = await runShellCommand(options.command, {
          cwd,
          input: prompt,
          env: { BENCH_USAGE_FILE: usageFile },
        });
        if (run.exitCode !== 0) {
          throw new Error(`Assistant command exited with status ${run.exitCode}:\n${tail(run.output)}`);
        }

        const usage = readUsageFile(usageFile);
        const diff = await getWorkingTreeDiff(cwd);

        let testEvalResults: TestEvalResults | undefined;
        let testEvalPassed: boolean | undefined;
        if (sample.testCommand) {
          const test = await runShellCommand(sample.testCommand, { cwd });
          testEvalResults = { command: sample.testCommand, exitCode: test.exitCode, output: tail(test.output, 200) };
          testEvalPassed = test.exitCode === 0;
        }

        return {
          cost: usage.cost,
          tokens: usage.tokens,
          diffEval: diff,
          messageEval: run.stdout,
          transcript: {
            id: sample.id || randomUUID(),
            messages: [
              ...sample.messageHistory,
              { role: "user", content: sample.messagePrompt },
              { role: "assistant", content: run.stdout },
            ],
          },
          testEvalResults,
          testEvalPassed,
          workingDirectory: cwd,
        };
      } finally {
        rmSync(usageFile, { force: true });
      }
    },
  };
}
