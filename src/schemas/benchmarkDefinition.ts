/**
 * Zod schema for declarative benchmark definition files (YAML).
 *
 * A definition describes one repository state and one or more prompts; each
 * prompt becomes a sample. Definitions are data, never executed code.
 */

import { z } from "zod";

// =============================================================================
// CONFIG & VERIFY SCHEMAS
// =============================================================================

/** Per-benchmark run configuration */
export const BenchmarkConfigSchema = z.object({
  /** Token budget for the auto-context evaluation; 0 disables it */
  autoContextTokens: z.number().int().nonnegative().default(0),
});

/** Post-run check executed in the sample checkout; passes on exit status 0 */
const VerifySchema = z.object({
  command: z.string().min(1),
});

// =============================================================================
// DEFINITION SCHEMA
// =============================================================================

export const BenchmarkDefinitionSchema = z.object({
  title: z.string(),
  description: z.string().default(""),
  config: BenchmarkConfigSchema.default({}),
  repo: z.string(),
  commit: z.string(),
  prompts: z.array(z.string()).min(1),
  minimumContext: z.array(z.string()).optional(),
  /** Commit whose diff against `commit` serves as the reference diff */
  comparisonCommit: z.string().optional(),
  verify: VerifySchema.optional(),
});

export type BenchmarkConfig = z.infer<typeof BenchmarkConfigSchema>;
export type BenchmarkDefinition = z.infer<typeof BenchmarkDefinitionSchema>;
export type VerifyCheck = z.infer<typeof VerifySchema>;
