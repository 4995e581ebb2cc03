/**
 * Shell command execution for assistant runs, test commands and verify checks.
 */

import { spawn } from "child_process";

export interface ShellCommandOptions {
  cwd: string;
  /** Written to the command's stdin */
  input?: string;
  env?: Record<string, string>;
}

export interface ShellCommandResult {
  /** null when the process was killed by a signal */
  exitCode: number | null;
  stdout: string;
  /** stdout and stderr interleaved */
  output: string;
}

/**
 * Run `command` through the shell. Resolves for any exit status; rejects
 * only when the process cannot be started.
 */
export function runShellCommand(command: string, options: ShellCommandOptions): Promise<ShellCommandResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, {
      cwd: options.cwd,
      shell: true,
      env: { ...process.env, ...options.env },
      stdio: ["pipe", "pipe", "pipe"],
    });
    let stdout = "";
    let output = "";

    child.stdout.on("data", (chunk: Buffer) => {
      stdout += chunk.toString();
      output += chunk.toString();
    });
    child.stderr.on("data", (chunk: Buffer) => {
      output += chunk.toString();
    });
    child.on("error", reject);
    child.on("close", (code) => resolve({ exitCode: code, stdout, output }));

    child.stdin.on("error", () => {
      // The command may exit without reading its input; the exit status reports the outcome.
    });
    child.stdin.end(options.input ?? "");
  });
}
