/**
 * Edit Grading Bench
 *
 * Runs a coding assistant over benchmark samples and grades the edits it
 * makes with an LLM judge along three dimensions:
 *
 * 1. Diff syntax: misplaced insertions, indentation, syntax errors
 * 2. Response style: talking about the edit format, trailing hedges
 * 3. Comparison: missing or extra functionality against a human-written diff
 *
 * To run benchmarks:
 * 1. Copy .env.example to .env and fill in your credentials
 * 2. Run: npm run bench -- --directory benchmarks
 */

// Re-export harness
export {
  runBenchmarks,
  Benchmark,
  BenchmarkRun,
  collectRunMetadata,
  commandVerify,
  diffFromComparisonCommit,
  formatTitle,
  formatRunDate,
  scoreContextSelection,
  RESULTS_DIR,
  type RunBenchmarksOptions,
  type BenchmarkPlugin,
  type RunMetadata,
  type ContextScore,
  type SampleExecutor,
  type SampleRunContext,
  type SampleRunOutcome,
  type ContextSelector,
  type VerifyFn,
  type VerifyContext,
  type BenchmarkRunOptions,
  type AttemptOutcome,
} from "./harness/index.js";

// Re-export graders
export {
  createGrader,
  createOpenAIJudgeClient,
  grade,
  JUDGE_MODEL,
  type Grader,
  type GradeOptions,
  type JudgeClient,
  type JudgeRequest,
} from "./graders/index.js";

// Re-export schemas
export { SampleSchema, createSample, loadSample, type Sample, type SampleInput } from "./schemas/sample.js";
export {
  BenchmarkDefinitionSchema,
  BenchmarkConfigSchema,
  type BenchmarkDefinition,
  type BenchmarkConfig,
} from "./schemas/benchmarkDefinition.js";
export {
  BenchmarkResultSchema,
  createBenchmarkResult,
  applyDiffGrade,
  applyResponseGrade,
  applyComparisonGrade,
  serializeResult,
  parseResultLine,
  type BenchmarkResult,
} from "./schemas/benchmarkResult.js";
export {
  isGradingError,
  type DiffSyntaxJudgment,
  type ModelResponseJudgment,
  type ComparisonJudgment,
  type GradingError,
  type GradingResult,
} from "./schemas/judgments.js";

// Re-export utilities
export {
  fitPromptToContext,
  countPromptTokens,
  getContextLength,
  RESPONSE_BUFFER_TOKENS,
  type TruncationInfo,
} from "./utils/tokenBudget.js";
export { discoverBenchmarks, loadDefinitionFromFile, benchmarkListed } from "./utils/loadBenchmarks.js";
export { summarizeResults, type RunSummary, type ResultSummary } from "./utils/summarizeResults.js";
export { StagingLog } from "./utils/stagingLog.js";
export { createCommandExecutor, type CommandExecutorOptions } from "./executors/commandExecutor.js";
export { logRunToBraintrust } from "./reporting/braintrust.js";
export { getSweSamples, isSweBenchSplit, SWE_BENCH_SPLITS, type SweBenchSplit } from "./swebench/index.js";
