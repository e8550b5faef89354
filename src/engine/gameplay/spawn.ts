import { lockPiece } from "../core/board";
import {
  createActivePiece,
  drawBlockValues,
  drawShape,
  isSpawnBlocked,
} from "../core/spawning";
import { mkInitialPhysics } from "../types";

import type { GameState, Shape } from "../types";

// Write the active piece into the board and clear the per-piece physics
export function placeActivePiece(state: GameState): {
  state: GameState;
  shape: Shape | null;
} {
  if (!state.piece) {
    return { shape: null, state };
  }

  return {
    shape: state.piece.id,
    state: {
      ...state,
      board: lockPiece(state.board, state.piece),
      physics: mkInitialPhysics(state.physics.softDropOn),
      piece: null,
      piecesLocked: state.piecesLocked + 1,
    },
  };
}

/**
 * Spawn the previewed shape with fresh block values and draw the next
 * preview. A blocked spawn leaves the state untouched.
 */
export function spawnPiece(state: GameState): {
  state: GameState;
  blocked: boolean;
} {
  const drawn = drawBlockValues(state.rng, state.cfg);
  const piece = createActivePiece(state.nextShape, drawn.values, state.cfg);
  if (isSpawnBlocked(state.board, piece)) {
    return { blocked: true, state };
  }

  const next = drawShape(drawn.newRng);
  return {
    blocked: false,
    state: {
      ...state,
      nextShape: next.shape,
      physics: mkInitialPhysics(state.physics.softDropOn),
      piece,
      rng: next.newRng,
    },
  };
}
