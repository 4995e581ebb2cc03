import { mkdirSync, mkdtempSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { describe, expect, it } from "vitest";
import { benchmarkListed, discoverBenchmarks, loadDefinitionFromFile } from "../src/utils/loadBenchmarks.js";
import { loadSample } from "../src/schemas/sample.js";

function tempDir(): string {
  return mkdtempSync(join(tmpdir(), "bench-load-"));
}

describe("benchmarkListed", () => {
  it("matches any filter as a case-insensitive substring", () => {
    expect(benchmarkListed("Clojure Exercism Runner", ["exercism"])).toBe(true);
    expect(benchmarkListed("Clojure Exercism Runner", ["rust", "RUNNER"])).toBe(true);
    expect(benchmarkListed("Clojure Exercism Runner", ["rust"])).toBe(false);
  });

  it("matches everything without filters", () => {
    expect(benchmarkListed("Anything", [])).toBe(true);
  });
});

describe("loadDefinitionFromFile", () => {
  it("applies defaults for optional fields", () => {
    const dir = tempDir();
    const path = join(dir, "def.yml");
    writeFileSync(path, "title: T\nrepo: r\ncommit: c\nprompts:\n  - p\n");

    expect(loadDefinitionFromFile(path)).toEqual({
      title: "T",
      description: "",
      config: { autoContextTokens: 0 },
      repo: "r",
      commit: "c",
      prompts: ["p"],
    });
  });

  it("lists every invalid field", () => {
    const dir = tempDir();
    const path = join(dir, "bad.yml");
    writeFileSync(path, "title: T\nprompts: []\n");

    expect(() => loadDefinitionFromFile(path)).toThrow(
      `Invalid benchmark definition ${path}:\n` +
        "  - repo: Required\n" +
        "  - commit: Required\n" +
        "  - prompts: Array must contain at least 1 element(s)"
    );
  });
});

describe("loadSample", () => {
  it("rejects files that are not JSON", () => {
    const dir = tempDir();
    const path = join(dir, "sample.json");
    writeFileSync(path, "{ nope");
    expect(() => loadSample(path)).toThrow(`Invalid sample file ${path}:`);
  });
});

describe("discoverBenchmarks", () => {
  it("loads YAML definitions and JSON samples from nested directories", async () => {
    const dir = tempDir();
    mkdirSync(join(dir, "nested"));
    writeFileSync(join(dir, "one.yaml"), "title: One\nrepo: r\ncommit: c\nprompts:\n  - first\n  - second\n");
    writeFileSync(
      join(dir, "nested", "two.json"),
      JSON.stringify({ title: "Two", repo: "r", mergeBase: "m", messagePrompt: "p", context: ["src/a.ts"] })
    );
    writeFileSync(join(dir, "notes.txt"), "ignored");

    const benchmarks = await discoverBenchmarks(dir, { autoContextTokens: 4000 });

    expect(benchmarks.map((b) => [b.title, b.samples.length])).toEqual([
      ["Two", 1],
      ["One", 2],
    ]);
    expect(benchmarks[0]?.config).toEqual({ autoContextTokens: 4000 });
    expect(benchmarks[0]?.samples[0]?.context).toEqual(["src/a.ts"]);
  });

  it("wires a definition's verify command into the benchmark", async () => {
    const dir = tempDir();
    writeFileSync(join(dir, "v.yml"), "title: V\nrepo: r\ncommit: c\nprompts: [p]\nverify:\n  command: exit 0\n");

    const [benchmark] = await discoverBenchmarks(dir);
    const sample = benchmark?.samples[0];
    const verify = benchmark?.verify;
    if (!sample || !verify) throw new Error("expected a verified benchmark");

    await expect(verify({ sample, workingDirectory: dir })).resolves.toBe(true);
  });
});
