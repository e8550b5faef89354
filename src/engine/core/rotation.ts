import { canPlacePiece } from "./board";
import { type ActivePiece, type Board, nextRot } from "./types";

// Anchor offsets tried after the unshifted rotation fails, in order
export const WALL_KICKS: ReadonlyArray<readonly [number, number]> = [
  [1, 0],
  [-1, 0],
  [0, 1],
  [2, 0],
  [-2, 0],
];

/**
 * Clockwise rotation with wall kicks. `kick` is 0 when the piece rotated in
 * place, otherwise the 1-based index of the kick that fit.
 */
export function tryRotateClockwise(
  board: Board,
  piece: ActivePiece,
): { piece: ActivePiece; kick: number } | null {
  const rotated: ActivePiece = { ...piece, rot: nextRot(piece.rot) };
  if (canPlacePiece(board, rotated)) return { kick: 0, piece: rotated };

  for (let i = 0; i < WALL_KICKS.length; i++) {
    const [dx, dy] = WALL_KICKS[i] ?? [0, 0];
    const kicked = { ...rotated, x: rotated.x + dx, y: rotated.y + dy };
    if (canPlacePiece(board, kicked)) return { kick: i + 1, piece: kicked };
  }
  return null;
}
