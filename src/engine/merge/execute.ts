import { remove, setCell } from "../core/board";
import { type Board, type CellValue, doubleCellValue } from "../core/types";
import { mergePoints } from "../scoring/combo";

import type { MergePair } from "./find-pairs";
import type { EngineConfig } from "../config";

export type MergeRecord = Readonly<{
  x: number;
  y: number;
  value: CellValue;
  combo: number;
  points: number;
}>;

// Apply pairs in order: the scanning cell doubles, its partner disappears
export function executeMerges(
  board: Board,
  pairs: ReadonlyArray<MergePair>,
  combo: number,
  cfg: EngineConfig,
): { board: Board; combo: number; merges: ReadonlyArray<MergeRecord> } {
  let b = board;
  let count = combo;
  const merges: Array<MergeRecord> = [];

  for (const pair of pairs) {
    const value = doubleCellValue(pair.value);
    b = remove(b, pair.partnerX, pair.partnerY);
    b = setCell(b, pair.x, pair.y, value);
    count++;
    merges.push({
      combo: count,
      points: mergePoints(value, count, cfg),
      value,
      x: pair.x,
      y: pair.y,
    });
  }

  return { board: b, combo: count, merges };
}
