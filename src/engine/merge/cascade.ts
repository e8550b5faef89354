import { clearCompletedRows } from "../core/board";

import { applyGravity } from "./compaction";
import { type MergeRecord, executeMerges } from "./execute";
import { findMergePairs } from "./find-pairs";

import type { EngineConfig } from "../config";
import type { Board } from "../core/types";

export type MergePassResult =
  | {
      kind: "merged";
      board: Board;
      combo: number;
      merges: ReadonlyArray<MergeRecord>;
    }
  | { kind: "settled" }
  | { kind: "limitReached" };

/**
 * One merge stage of a cascade. `iterations` counts the passes that already
 * merged something; once it reaches the cap, pending pairs are left alone.
 */
export function runMergePass(
  board: Board,
  combo: number,
  iterations: number,
  cfg: EngineConfig,
): MergePassResult {
  const pairs = findMergePairs(board);
  if (pairs.length === 0) return { kind: "settled" };
  if (iterations >= cfg.maxMergeIterations) return { kind: "limitReached" };
  return { kind: "merged", ...executeMerges(board, pairs, combo, cfg) };
}

export type ResolveResult = {
  board: Board;
  combo: number;
  merges: ReadonlyArray<MergeRecord>;
  iterations: number;
  limitReached: boolean;
  rows: ReadonlyArray<number>;
  rowsCleared: number;
};

/**
 * Run merge passes (find, execute, gravity) to a fixed point without pacing,
 * then clear completed rows once.
 */
export function resolveMerges(
  board: Board,
  combo: number,
  cfg: EngineConfig,
): ResolveResult {
  let b = board;
  let count = combo;
  let iterations = 0;
  let limitReached = false;
  const merges: Array<MergeRecord> = [];

  for (;;) {
    const pass = runMergePass(b, count, iterations, cfg);
    if (pass.kind === "settled") break;
    if (pass.kind === "limitReached") {
      limitReached = true;
      break;
    }
    merges.push(...pass.merges);
    count = pass.combo;
    iterations++;
    b = applyGravity(pass.board);
  }

  const cleared = clearCompletedRows(b);
  return {
    board: cleared.board,
    combo: count,
    iterations,
    limitReached,
    merges,
    rows: cleared.rows,
    rowsCleared: cleared.rowsCleared,
  };
}
