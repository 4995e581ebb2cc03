/**
 * Scoring for auto-context selection against a sample's minimum context.
 */

import { posix } from "path";

export interface ContextScore {
  precision: number;
  recall: number;
}

function normalizePath(path: string): string {
  return posix.normalize(path.replace(/\\/g, "/")).replace(/^\.\//, "");
}

/**
 * Precision: share of selected paths that were expected.
 * Recall: share of expected paths that were selected.
 * Either is 0 when its denominator is empty.
 */
export function scoreContextSelection(selected: readonly string[], expected: readonly string[]): ContextScore {
  const selectedSet = new Set(selected.map(normalizePath));
  const expectedSet = new Set(expected.map(normalizePath));

  let hits = 0;
  for (const path of selectedSet) {
    if (expectedSet.has(path)) hits++;
  }

  return {
    precision: selectedSet.size > 0 ? hits / selectedSet.size : 0,
    recall: expectedSet.size > 0 ? hits / expectedSet.size : 0,
  };
}
