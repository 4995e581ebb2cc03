/**
 * Benchmark discovery.
 *
 * Walks a directory (recursively) for benchmark sources:
 * - `.yml` / `.yaml`: declarative benchmark definitions
 * - `.json`: serialized samples, one benchmark each
 */

import { readFileSync, readdirSync, statSync } from "fs";
import { extname, join } from "path";
import { parse as parseYaml } from "yaml";
import { Benchmark, type DefinitionOptions } from "../harness/benchmark.js";
import { BenchmarkConfigSchema, BenchmarkDefinitionSchema, type BenchmarkDefinition } from "../schemas/benchmarkDefinition.js";
import { loadSample } from "../schemas/sample.js";

/**
 * Load and validate a benchmark definition from a YAML file.
 *
 * @throws Error if the file cannot be read or validation fails
 */
export function loadDefinitionFromFile(filePath: string): BenchmarkDefinition {
  const content = readFileSync(filePath, "utf-8");
  const parsed: unknown = parseYaml(content);

  const result = BenchmarkDefinitionSchema.safeParse(parsed);
  if (!result.success) {
    const errors = result.error.issues
      .map((e) => `  - ${String(e.path.join("."))}: ${e.message}`)
      .join("\n");
    throw new Error(`Invalid benchmark definition ${filePath}:\n${errors}`);
  }

  return result.data;
}

/**
 * True if any filter is a case-insensitive substring of the title.
 * An empty filter list matches everything.
 */
export function benchmarkListed(title: string, filters: readonly string[]): boolean {
  if (filters.length === 0) return true;
  const lowered = title.toLowerCase();
  return filters.some((filter) => lowered.includes(filter.toLowerCase()));
}

export interface DiscoverOptions extends DefinitionOptions {
  /** Title substrings to keep (default: all) */
  filters?: string[];
  /** Auto-context budget given to benchmarks loaded from samples */
  autoContextTokens?: number;
}

function listFiles(dir: string): string[] {
  const files: string[] = [];

  function walkDir(current: string): void {
    for (const entry of readdirSync(current).sort()) {
      const fullPath = join(current, entry);
      const stat = statSync(fullPath);
      if (stat.isDirectory()) {
        walkDir(fullPath);
      } else if (stat.isFile()) {
        files.push(fullPath);
      }
    }
  }

  walkDir(dir);
  return files;
}

/**
 * Load every benchmark in `dir` whose title passes the filters, in path order.
 */
export async function discoverBenchmarks(dir: string, options: DiscoverOptions = {}): Promise<Benchmark[]> {
  const { filters = [], autoContextTokens = 0, ...definitionOptions } = options;
  const benchmarks: Benchmark[] = [];

  for (const path of listFiles(dir)) {
    const extension = extname(path);

    if (extension === ".yml" || extension === ".yaml") {
      const definition = loadDefinitionFromFile(path);
      if (!benchmarkListed(definition.title, filters)) continue;
      benchmarks.push(await Benchmark.fromDefinition(definition, definitionOptions));
    } else if (extension === ".json") {
      const sample = loadSample(path);
      if (!benchmarkListed(sample.title, filters)) continue;
      benchmarks.push(Benchmark.fromSample(sample, BenchmarkConfigSchema.parse({ autoContextTokens })));
    }
  }

  return benchmarks;
}
