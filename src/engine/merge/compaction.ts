import { type Board, copyBoardCells, idx } from "../core/types";

/**
 * Per-column compaction: blocks fall straight down, keeping their vertical
 * order. Running it twice changes nothing.
 */
export function applyGravity(board: Board): Board {
  const cells = copyBoardCells(board.cells);
  const out: Board = { ...board, cells };
  let changed = false;

  for (let x = 0; x < board.width; x++) {
    let write = 0;
    for (let y = 0; y < board.height; y++) {
      const e = board.cells[idx(board, x, y)] ?? 0;
      if (e === 0) continue;
      if (write !== y) {
        cells[idx(out, x, write)] = e;
        cells[idx(out, x, y)] = 0;
        changed = true;
      }
      write++;
    }
  }
  return changed ? out : board;
}
