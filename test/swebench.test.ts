import { existsSync, mkdtempSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { filesInPatch, getSweSamples, isSweBenchSplit, sweBenchRowToSample, type SweBenchRow } from "../src/swebench/index.js";

const PATCH =
  "diff --git a/pkg/core.py b/pkg/core.py\n--- a/pkg/core.py\n+++ b/pkg/core.py\n@@ -1 +1 @@\n-a\n+b\n" +
  "diff --git a/pkg/util.py b/pkg/util.py\n--- a/pkg/util.py\n+++ b/pkg/util.py\n@@ -1 +1 @@\n-c\n+d\n";

const ROWS: SweBenchRow[] = [
  {
    repo: "example/alpha",
    instance_id: "alpha__alpha-1",
    base_commit: "1111111",
    patch: PATCH,
    problem_statement: "Crash on empty input\nSteps to reproduce...",
  },
  {
    repo: "example/beta",
    instance_id: "beta__beta-2",
    base_commit: "2222222",
    patch: PATCH,
    problem_statement: "Wrong rounding",
  },
];

function rowsResponse(rows: SweBenchRow[], total: number): Response {
  return new Response(
    JSON.stringify({ rows: rows.map((row, i) => ({ row_idx: i, row })), num_rows_total: total })
  );
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("isSweBenchSplit", () => {
  it("accepts only known splits", () => {
    expect(["dev", "train", "test", "bogus"].map(isSweBenchSplit)).toEqual([true, true, true, false]);
  });
});

describe("filesInPatch", () => {
  it("lists each touched file once", () => {
    expect(filesInPatch(PATCH + PATCH)).toEqual(["pkg/core.py", "pkg/util.py"]);
  });
});

describe("sweBenchRowToSample", () => {
  it("maps a task to a sample with its patch as reference diff", () => {
    const [row] = ROWS;
    if (!row) throw new Error("missing fixture");

    expect(sweBenchRowToSample(row)).toMatchObject({
      title: "alpha__alpha-1",
      id: "alpha__alpha-1",
      description: "Crash on empty input",
      repo: "https://github.com/example/alpha",
      mergeBase: "1111111",
      messagePrompt: row.problem_statement,
      context: ["pkg/core.py", "pkg/util.py"],
      diffEdit: PATCH,
    });
  });
});

describe("getSweSamples", () => {
  it("downloads once and then loads the saved samples", async () => {
    const samplesDir = mkdtempSync(join(tmpdir(), "bench-swe-"));
    const fetchImpl = vi.fn(async () => rowsResponse(ROWS, 10));

    const first = await getSweSamples("dev", 2, { samplesDir, fetchImpl });
    const second = await getSweSamples("dev", 2, { samplesDir, fetchImpl });

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(fetchImpl).toHaveBeenCalledWith(
      "https://datasets-server.huggingface.co/rows?dataset=princeton-nlp%2FSWE-bench&config=default&split=dev&offset=0&length=2"
    );
    expect(existsSync(join(samplesDir, "dev", "beta__beta-2.json"))).toBe(true);
    expect(first.map((s) => s.title)).toEqual(["alpha__alpha-1", "beta__beta-2"]);
    expect(second).toEqual(first);
  });

  it("fails on an error response", async () => {
    const samplesDir = mkdtempSync(join(tmpdir(), "bench-swe-"));
    const fetchImpl = vi.fn(async () => new Response("nope", { status: 500, statusText: "Server Error" }));

    await expect(getSweSamples("test", 1, { samplesDir, fetchImpl })).rejects.toThrow(
      "Failed to download SWE-Bench test: 500 Server Error"
    );
  });
});
