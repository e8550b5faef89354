import { getCell, listBlocksByColumn, remove, setCell } from "../core/board";
import { nextInt } from "../core/rng/draw";
import { type Board, type CellValue } from "../core/types";

import type { BoardPowerUpKind } from "./types";
import type { RandomGenerator } from "../core/rng/interface";

type EffectResult = { board: Board; newRng: RandomGenerator };

// Destroys the lowest non-empty row in place; rows above do not shift
export function clearLowestRow(board: Board): Board {
  for (let y = 0; y < board.height; y++) {
    let b = board;
    for (let x = 0; x < board.width; x++) b = remove(b, x, y);
    if (b !== board) return b;
  }
  return board;
}

/**
 * Rows are scanned top to bottom and the leftmost block of each non-empty
 * row is kept, so the last one kept (lowest row) is the target.
 */
export function bombTarget(board: Board): { x: number; y: number } {
  let target: { x: number; y: number } | null = null;
  for (let y = board.height - 1; y >= 0; y--) {
    for (let x = 0; x < board.width; x++) {
      if (getCell(board, x, y) !== null) {
        target = { x, y };
        break;
      }
    }
  }
  return (
    target ?? {
      x: Math.floor(board.width / 2),
      y: Math.min(5, board.height - 1),
    }
  );
}

export function detonateBomb(board: Board): Board {
  const { x, y } = bombTarget(board);
  let b = board;
  for (let dy = -1; dy <= 1; dy++) {
    for (let dx = -1; dx <= 1; dx++) b = remove(b, x + dx, y + dy);
  }
  return b;
}

// Picks one block (column-major order) and removes every block of its value
export function colorBomb(board: Board, rng: RandomGenerator): EffectResult {
  const blocks = listBlocksByColumn(board);
  if (blocks.length === 0) return { board, newRng: rng };
  const pick = nextInt(rng, blocks.length);
  const chosen = blocks[pick.value];
  if (chosen === undefined) return { board, newRng: pick.newRng };

  let b = board;
  for (const block of blocks) {
    if (block.value === chosen.value) b = remove(b, block.x, block.y);
  }
  return { board: b, newRng: pick.newRng };
}

// Fisher-Yates over the values; occupied positions stay the same
export function shuffleBlocks(
  board: Board,
  rng: RandomGenerator,
): EffectResult {
  const blocks = listBlocksByColumn(board);
  if (blocks.length < 2) return { board, newRng: rng };

  const values: Array<CellValue> = blocks.map((b) => b.value);
  let r = rng;
  for (let i = values.length - 1; i > 0; i--) {
    const pick = nextInt(r, i + 1);
    r = pick.newRng;
    const a = values[i];
    const c = values[pick.value];
    if (a === undefined || c === undefined) continue;
    values[i] = c;
    values[pick.value] = a;
  }

  let b = board;
  blocks.forEach((block, i) => {
    b = setCell(b, block.x, block.y, values[i] ?? block.value);
  });
  return { board: b, newRng: r };
}

export function applyBoardPowerUp(
  kind: BoardPowerUpKind,
  board: Board,
  rng: RandomGenerator,
): EffectResult {
  switch (kind) {
    case "ClearRow":
      return { board: clearLowestRow(board), newRng: rng };
    case "Bomb":
      return { board: detonateBomb(board), newRng: rng };
    case "ColorBomb":
      return colorBomb(board, rng);
    case "Shuffle":
      return shuffleBlocks(board, rng);
  }
}
