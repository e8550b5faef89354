import { getCell } from "../core/board";
import { type Board, type CellValue, idx } from "../core/types";

/** Cell (x, y) absorbs its partner, which sits to its right or above it. */
export type MergePair = Readonly<{
  x: number;
  y: number;
  partnerX: number;
  partnerY: number;
  value: CellValue;
}>;

/**
 * Row-major scan (bottom row first, left to right). Each unpaired block pairs
 * with an equal right neighbour, else an equal top neighbour. A block joins at
 * most one pair per pass.
 */
export function findMergePairs(board: Board): ReadonlyArray<MergePair> {
  const used = new Uint8Array(board.width * board.height);
  const pairs: Array<MergePair> = [];

  const tryPair = (
    x: number,
    y: number,
    px: number,
    py: number,
    value: CellValue,
  ): boolean => {
    if (getCell(board, px, py) !== value) return false;
    if (used[idx(board, px, py)] === 1) return false;
    used[idx(board, x, y)] = 1;
    used[idx(board, px, py)] = 1;
    pairs.push({ partnerX: px, partnerY: py, value, x, y });
    return true;
  };

  for (let y = 0; y < board.height; y++) {
    for (let x = 0; x < board.width; x++) {
      const value = getCell(board, x, y);
      if (value === null || used[idx(board, x, y)] === 1) continue;
      if (!tryPair(x, y, x + 1, y, value)) tryPair(x, y, x, y + 1, value);
    }
  }
  return pairs;
}
