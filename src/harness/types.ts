/**
 * Collaborator contracts for the benchmark runner.
 *
 * The runner itself never talks to an assistant or sets up repositories;
 * it drives these interfaces and records what they return.
 */

import type { BenchmarkConfig } from "../schemas/benchmarkDefinition.js";
import type { BenchmarkResult, TestEvalResults, Transcript } from "../schemas/benchmarkResult.js";
import type { Sample } from "../schemas/sample.js";
import type { Grader } from "../graders/index.js";

// =============================================================================
// ASSISTANT EXECUTION
// =============================================================================

export interface SampleRunContext {
  config: BenchmarkConfig;
}

/** What one assistant run on a sample produced */
export interface SampleRunOutcome {
  cost: number;
  tokens: number;
  /** Diff of the assistant's edits */
  diffEval: string;
  /** The assistant's final response text */
  messageEval: string;
  transcript: Transcript;
  testEvalResults?: TestEvalResults;
  testEvalPassed?: boolean;
  /** Checkout the assistant worked in, handed to verify checks */
  workingDirectory?: string;
}

export interface SampleExecutor {
  runSample(sample: Sample, context: SampleRunContext): Promise<SampleRunOutcome>;
}

// =============================================================================
// AUTO-CONTEXT EVALUATION
// =============================================================================

export interface ContextSelector {
  /** Repository paths the assistant would pull into context for this sample */
  selectContext(sample: Sample, options: { autoContextTokens: number }): Promise<string[]>;
}

// =============================================================================
// VERIFY
// =============================================================================

export interface VerifyContext {
  sample: Sample;
  workingDirectory?: string;
}

export type VerifyFn = (context: VerifyContext) => Promise<boolean>;

// =============================================================================
// RUN OPTIONS & OUTCOMES
// =============================================================================

export interface BenchmarkRunOptions {
  /** Attempts per sample (default: 1) */
  retries?: number;
  executor: SampleExecutor;
  grader: Grader;
  contextSelector?: ContextSelector;
  /** Stops scheduling further attempts once aborted */
  signal?: AbortSignal;
}

export type AttemptOutcome =
  | { status: "completed"; result: BenchmarkResult }
  | { status: "failed"; result: BenchmarkResult; reason: string };
