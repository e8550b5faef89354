import { InvariantError } from "../errors";

import { pieceBlocks } from "./pieces";
import {
  type ActivePiece,
  type Board,
  type CellValue,
  type PlacedBlock,
  BOARD_HEIGHT,
  BOARD_WIDTH,
  cellValueToExponent,
  copyBoardCells,
  createBoardCells,
  exponentToCellValue,
  idx,
} from "./types";

export function createEmptyBoard(
  width: number = BOARD_WIDTH,
  height: number = BOARD_HEIGHT,
): Board {
  return { cells: createBoardCells(width, height), height, width };
}

export function isInside(board: Board, x: number, y: number): boolean {
  return (
    Number.isInteger(x) &&
    Number.isInteger(y) &&
    x >= 0 &&
    x < board.width &&
    y >= 0 &&
    y < board.height
  );
}

export function isEmpty(board: Board, x: number, y: number): boolean {
  return isInside(board, x, y) && board.cells[idx(board, x, y)] === 0;
}

export function getCell(board: Board, x: number, y: number): CellValue | null {
  if (!isInside(board, x, y)) return null;
  const e = board.cells[idx(board, x, y)] ?? 0;
  return e === 0 ? null : exponentToCellValue(e);
}

// Unchecked write used by effects that keep occupancy intact; value null clears
export function setCell(
  board: Board,
  x: number,
  y: number,
  value: CellValue | null,
): Board {
  if (!isInside(board, x, y)) return board;
  const cells = copyBoardCells(board.cells);
  cells[idx(board, x, y)] = value === null ? 0 : cellValueToExponent(value);
  return { ...board, cells };
}

// null when outside or occupied
export function place(
  board: Board,
  x: number,
  y: number,
  value: CellValue,
): Board | null {
  if (!isEmpty(board, x, y)) return null;
  return setCell(board, x, y, value);
}

export function remove(board: Board, x: number, y: number): Board {
  if (getCell(board, x, y) === null) return board;
  return setCell(board, x, y, null);
}

function isRowFull(board: Board, y: number): boolean {
  for (let x = 0; x < board.width; x++) {
    if (board.cells[idx(board, x, y)] === 0) return false;
  }
  return true;
}

/**
 * Removes every complete row, bottom to top. Rows above a cleared row shift
 * down one and the same index is checked again. `rows` holds the indices the
 * cleared rows had on the input board.
 */
export function clearCompletedRows(board: Board): {
  board: Board;
  rowsCleared: number;
  rows: ReadonlyArray<number>;
} {
  const cells = copyBoardCells(board.cells);
  const work: Board = { ...board, cells };
  const rows: Array<number> = [];

  let y = 0;
  while (y < board.height) {
    if (!isRowFull(work, y)) {
      y++;
      continue;
    }
    rows.push(y + rows.length);
    cells.copyWithin(y * board.width, (y + 1) * board.width);
    cells.fill(0, (board.height - 1) * board.width);
  }

  if (rows.length === 0) return { board, rows, rowsCleared: 0 };
  return { board: work, rows, rowsCleared: rows.length };
}

export function isTopRowOccupied(board: Board): boolean {
  const y = board.height - 1;
  for (let x = 0; x < board.width; x++) {
    if (board.cells[idx(board, x, y)] !== 0) return true;
  }
  return false;
}

export function clearAll(board: Board): Board {
  return createEmptyBoard(board.width, board.height);
}

// Occupied cells in row-major order (y ascending, then x ascending)
export function listBlocks(board: Board): ReadonlyArray<PlacedBlock> {
  const out: Array<PlacedBlock> = [];
  for (let y = 0; y < board.height; y++) {
    for (let x = 0; x < board.width; x++) {
      const value = getCell(board, x, y);
      if (value !== null) out.push({ value, x, y });
    }
  }
  return out;
}

// Occupied cells in column-major order (x ascending, then y ascending)
export function listBlocksByColumn(board: Board): ReadonlyArray<PlacedBlock> {
  const out: Array<PlacedBlock> = [];
  for (let x = 0; x < board.width; x++) {
    for (let y = 0; y < board.height; y++) {
      const value = getCell(board, x, y);
      if (value !== null) out.push({ value, x, y });
    }
  }
  return out;
}

export function getRow(
  board: Board,
  y: number,
): ReadonlyArray<CellValue | null> {
  const row: Array<CellValue | null> = [];
  for (let x = 0; x < board.width; x++) row.push(getCell(board, x, y));
  return row;
}

// Check if a piece fits: every block inside and on an empty cell
export function canPlacePiece(board: Board, piece: ActivePiece): boolean {
  return pieceBlocks(piece).every((b) => isEmpty(board, b.x, b.y));
}

// Return a new position if valid; otherwise null
export function tryMove(
  board: Board,
  piece: ActivePiece,
  dx: number,
  dy: number,
): ActivePiece | null {
  const moved = { ...piece, x: piece.x + dx, y: piece.y + dy };
  return canPlacePiece(board, moved) ? moved : null;
}

// Lowest valid anchor straight below the piece (used for hard drop and ghost)
export function dropToBottom(board: Board, piece: ActivePiece): ActivePiece {
  let current = piece;
  let next = tryMove(board, current, 0, -1);
  while (next !== null) {
    current = next;
    next = tryMove(board, current, 0, -1);
  }
  return current;
}

export function isGrounded(board: Board, piece: ActivePiece): boolean {
  return tryMove(board, piece, 0, -1) === null;
}

// Write the piece's blocks into the board; any collision is a broken invariant
export function lockPiece(board: Board, piece: ActivePiece): Board {
  let next = board;
  for (const block of pieceBlocks(piece)) {
    const placed = place(next, block.x, block.y, block.value);
    if (placed === null) {
      throw new InvariantError(
        `lockPiece: cell (${String(block.x)}, ${String(block.y)}) is outside or occupied`,
      );
    }
    next = placed;
  }
  return next;
}
