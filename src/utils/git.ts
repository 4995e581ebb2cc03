/**
 * Git helpers for preparing sample checkouts and reading diffs.
 */

import { spawn } from "child_process";
import { existsSync } from "fs";
import { mkdir } from "fs/promises";
import { tmpdir } from "os";
import { basename, join } from "path";

export interface GitOptions {
  cwd: string;
  /** Written to git's stdin */
  input?: string;
}

/**
 * Run a git command and resolve with its stdout.
 *
 * @throws Error with git's stderr when the command exits non-zero
 */
export function runGit(args: string[], options: GitOptions): Promise<string> {
  return new Promise((resolve, reject) => {
    const child = spawn("git", args, { cwd: options.cwd, stdio: ["pipe", "pipe", "pipe"] });
    let stdout = "";
    let stderr = "";

    child.stdout.on("data", (chunk: Buffer) => {
      stdout += chunk.toString();
    });
    child.stderr.on("data", (chunk: Buffer) => {
      stderr += chunk.toString();
    });
    child.on("error", reject);
    child.on("close", (code) => {
      if (code === 0) {
        resolve(stdout);
      } else {
        reject(new Error(`git ${args.join(" ")} failed (${code}): ${stderr.trim()}`));
      }
    });

    child.stdin.end(options.input ?? "");
  });
}

// =============================================================================
// REPOSITORY SETUP
// =============================================================================

/** Where sample repositories are cloned (override with REPO_CACHE_DIR) */
export const REPO_CACHE_DIR = process.env.REPO_CACHE_DIR || join(tmpdir(), "edit-grading-bench", "repos");

export interface RepoSetup {
  url: string;
  commit: string;
  /** Applied and committed on top of `commit` */
  diffMergeBase?: string;
  /** Applied and left uncommitted */
  diffActive?: string;
  cacheDir?: string;
}

export function repoDirectoryName(url: string): string {
  return basename(url.replace(/\/+$/, "")).replace(/\.git$/, "");
}

/**
 * Clone (once) and reset a repository to the requested state.
 *
 * @returns Path of the working tree
 */
export async function setupRepo(setup: RepoSetup): Promise<string> {
  const cacheDir = setup.cacheDir ?? REPO_CACHE_DIR;
  const repoDir = join(cacheDir, repoDirectoryName(setup.url));

  if (!existsSync(repoDir)) {
    await mkdir(cacheDir, { recursive: true });
    console.log(`[Git] Cloning ${setup.url}`);
    await runGit(["clone", setup.url, repoDir], { cwd: cacheDir });
  }

  await runGit(["reset", "--hard"], { cwd: repoDir });
  await runGit(["clean", "-fdx"], { cwd: repoDir });
  await runGit(["checkout", "--detach", setup.commit], { cwd: repoDir });

  if (setup.diffMergeBase) {
    await runGit(["apply", "-"], { cwd: repoDir, input: setup.diffMergeBase });
    await runGit(["add", "-A"], { cwd: repoDir });
    await runGit(
      ["-c", "user.name=edit-grading-bench", "-c", "user.email=bench@localhost", "commit", "-m", "merge base diff"],
      { cwd: repoDir }
    );
  }
  if (setup.diffActive) {
    await runGit(["apply", "-"], { cwd: repoDir, input: setup.diffActive });
  }

  return repoDir;
}

// =============================================================================
// DIFFS & METADATA
// =============================================================================

export function getGitDiff(from: string, to: string, cwd: string): Promise<string> {
  return runGit(["diff", from, to], { cwd });
}

/** Diff of the working tree against HEAD, including new files */
export async function getWorkingTreeDiff(cwd: string): Promise<string> {
  await runGit(["add", "--intent-to-add", "--all"], { cwd });
  return runGit(["diff", "HEAD"], { cwd });
}

export async function getHeadRevision(cwd: string): Promise<string> {
  return (await runGit(["rev-parse", "HEAD"], { cwd })).trim();
}

export async function getCurrentBranch(cwd: string): Promise<string> {
  return (await runGit(["rev-parse", "--abbrev-ref", "HEAD"], { cwd })).trim();
}
