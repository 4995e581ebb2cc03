/**
 * SWE-Bench samples.
 *
 * Downloads a SWE-Bench split from the Hugging Face datasets server and
 * stores each task as a sample JSON file, so a run can use the split
 * directory like any other benchmark directory. Splits already on disk are
 * not downloaded again.
 */

import { mkdirSync, readdirSync, writeFileSync } from "fs";
import { join } from "path";
import { z } from "zod";
import { createSample, loadSample, type Sample } from "../schemas/sample.js";

export const SWE_BENCH_SPLITS = ["dev", "train", "test"] as const;
export type SweBenchSplit = (typeof SWE_BENCH_SPLITS)[number];

export const SWE_BENCH_SAMPLES_DIR = process.env.SWE_BENCH_SAMPLES_DIR || join(process.cwd(), "swe_bench_samples");

const DATASET = "princeton-nlp/SWE-bench";
const ROWS_URL = "https://datasets-server.huggingface.co/rows";
/** Largest page the datasets server returns */
const PAGE_SIZE = 100;

export function isSweBenchSplit(value: string): value is SweBenchSplit {
  return SWE_BENCH_SPLITS.some((split) => split === value);
}

// =============================================================================
// ROW CONVERSION
// =============================================================================

const SweBenchRowSchema = z.object({
  repo: z.string(),
  instance_id: z.string(),
  base_commit: z.string(),
  patch: z.string(),
  problem_statement: z.string(),
  version: z.string().optional(),
});

const RowsResponseSchema = z.object({
  rows: z.array(z.object({ row_idx: z.number(), row: SweBenchRowSchema })),
  num_rows_total: z.number(),
});

export type SweBenchRow = z.infer<typeof SweBenchRowSchema>;

/** Paths touched by a unified diff, in order of appearance */
export function filesInPatch(patch: string): string[] {
  const files: string[] = [];
  for (const match of patch.matchAll(/^diff --git a\/(\S+) b\/\S+$/gm)) {
    const file = match[1];
    if (file && !files.includes(file)) files.push(file);
  }
  return files;
}

export function sweBenchRowToSample(row: SweBenchRow): Sample {
  return createSample({
    title: row.instance_id,
    description: row.problem_statement.split("\n")[0] ?? "",
    id: row.instance_id,
    repo: `https://github.com/${row.repo}`,
    mergeBase: row.base_commit,
    messagePrompt: row.problem_statement,
    context: filesInPatch(row.patch),
    diffEdit: row.patch,
  });
}

// =============================================================================
// DOWNLOAD
// =============================================================================

export interface GetSweSamplesOptions {
  samplesDir?: string;
  fetchImpl?: typeof fetch;
}

async function downloadRows(split: SweBenchSplit, limit: number | undefined, fetchImpl: typeof fetch): Promise<SweBenchRow[]> {
  const rows: SweBenchRow[] = [];
  let total = Infinity;

  while (rows.length < total && (limit === undefined || rows.length < limit)) {
    const length = limit === undefined ? PAGE_SIZE : Math.min(PAGE_SIZE, limit - rows.length);
    const params = new URLSearchParams({
      dataset: DATASET,
      config: "default",
      split,
      offset: String(rows.length),
      length: String(length),
    });

    const response = await fetchImpl(`${ROWS_URL}?${params.toString()}`);
    if (!response.ok) {
      throw new Error(`Failed to download SWE-Bench ${split}: ${response.status} ${response.statusText}`);
    }

    const page = RowsResponseSchema.parse(await response.json());
    total = page.num_rows_total;
    if (page.rows.length === 0) break;
    rows.push(...page.rows.map((r) => r.row));
  }

  return limit === undefined ? rows : rows.slice(0, limit);
}

/**
 * Samples for a split, downloading and saving them under
 * `<samplesDir>/<split>` the first time.
 */
export async function getSweSamples(
  split: SweBenchSplit,
  maxBenchmarks?: number,
  options: GetSweSamplesOptions = {}
): Promise<Sample[]> {
  const { samplesDir = SWE_BENCH_SAMPLES_DIR, fetchImpl = fetch } = options;
  const splitDir = join(samplesDir, split);
  mkdirSync(splitDir, { recursive: true });

  const saved = readdirSync(splitDir)
    .filter((f) => f.endsWith(".json"))
    .sort();
  if (saved.length > 0) {
    const samples = saved.map((f) => loadSample(join(splitDir, f)));
    return maxBenchmarks ? samples.slice(0, maxBenchmarks) : samples;
  }

  console.log(`[SWE-Bench] Downloading ${split} split...`);
  const rows = await downloadRows(split, maxBenchmarks || undefined, fetchImpl);
  const samples = rows.map(sweBenchRowToSample);
  for (const sample of samples) {
    writeFileSync(join(splitDir, `${sample.id}.json`), JSON.stringify(sample, null, 2));
  }
  console.log(`[SWE-Bench] Saved ${samples.length} sample(s) to ${splitDir}`);

  return samples;
}
