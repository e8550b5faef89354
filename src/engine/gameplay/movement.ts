import { dropToBottom, tryMove } from "../core/board";
import { tryRotateClockwise } from "../core/rotation";

import type { GameState } from "../types";

type MoveResult =
  | { moved: false; state: GameState }
  | { moved: true; state: GameState; fromX: number; toX: number };

export function tryShift(state: GameState, dx: -1 | 1): MoveResult {
  if (!state.piece) return { moved: false, state };
  const next = tryMove(state.board, state.piece, dx, 0);
  if (!next) return { moved: false, state };
  return {
    fromX: state.piece.x,
    moved: true,
    state: { ...state, piece: next },
    toX: next.x,
  };
}

export function tryMoveLeft(state: GameState): MoveResult {
  return tryShift(state, -1);
}

export function tryMoveRight(state: GameState): MoveResult {
  return tryShift(state, 1);
}

export function tryRotateCW(
  state: GameState,
):
  | { rotated: false; state: GameState }
  | { rotated: true; state: GameState; kick: number } {
  if (!state.piece) return { rotated: false, state };
  const r = tryRotateClockwise(state.board, state.piece);
  if (!r) return { rotated: false, state };
  return { kick: r.kick, rotated: true, state: { ...state, piece: r.piece } };
}

// Drops straight down; the caller locks the piece on the same tick
export function tryHardDrop(state: GameState): {
  state: GameState;
  hardDropped: boolean;
  cells: number;
} {
  if (!state.piece) return { cells: 0, hardDropped: false, state };
  const dropped = dropToBottom(state.board, state.piece);
  return {
    cells: state.piece.y - dropped.y,
    hardDropped: true,
    state: { ...state, piece: dropped },
  };
}
