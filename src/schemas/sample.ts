/**
 * Zod schema for benchmark samples.
 *
 * A sample is a fixed task: a repository at a commit, a prompt for the
 * assistant, and optionally the files a good answer needs in context and a
 * human-written reference diff. Samples are stored as JSON files.
 */

import { readFileSync } from "fs";
import { z } from "zod";

// =============================================================================
// MESSAGE HISTORY
// =============================================================================

/** A prior conversation turn replayed before the prompt */
const HistoryMessageSchema = z.object({
  role: z.enum(["system", "user", "assistant"]),
  content: z.string(),
});

// =============================================================================
// SAMPLE SCHEMA
// =============================================================================

export const SampleSchema = z.object({
  title: z.string(),
  description: z.string().default(""),
  id: z.string().default(""),
  parentId: z.string().default(""),
  /** Clone URL or local path of the repository */
  repo: z.string(),
  /** Commit the assistant starts from */
  mergeBase: z.string(),
  /** Patch applied and committed on top of the merge base */
  diffMergeBase: z.string().default(""),
  /** Patch applied but left uncommitted */
  diffActive: z.string().default(""),
  messageHistory: z.array(HistoryMessageSchema).default([]),
  messagePrompt: z.string(),
  messageEdit: z.string().default(""),
  /** Minimum context: repository paths a correct answer needs to see */
  context: z.array(z.string()).default([]),
  /** Human-written reference diff */
  diffEdit: z.string().default(""),
  /** Shell command whose exit status decides test evaluation */
  testCommand: z.string().optional(),
  version: z.string().default("0.1.0"),
});

export type Sample = z.infer<typeof SampleSchema>;
export type SampleInput = z.input<typeof SampleSchema>;
export type HistoryMessage = z.infer<typeof HistoryMessageSchema>;

/**
 * Build a sample from loosely specified fields, applying schema defaults.
 */
export function createSample(input: SampleInput): Sample {
  return SampleSchema.parse(input);
}

/**
 * Load and validate a serialized sample.
 *
 * @throws Error listing every invalid field
 */
export function loadSample(filePath: string): Sample {
  const content = readFileSync(filePath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid sample file ${filePath}: ${message}`);
  }

  const result = SampleSchema.safeParse(parsed);
  if (!result.success) {
    const errors = result.error.issues
      .map((e) => `  - ${String(e.path.join("."))}: ${e.message}`)
      .join("\n");
    throw new Error(`Invalid sample file ${filePath}:\n${errors}`);
  }

  return result.data;
}
