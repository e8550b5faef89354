import { canPlacePiece } from "./board";
import { pickUniform, pickWeighted } from "./rng/draw";
import {
  type ActivePiece,
  type Board,
  type BlockValues,
  type Shape,
  SHAPES,
  createCellValue,
} from "./types";

import type { RandomGenerator } from "./rng/interface";
import type { EngineConfig } from "../config";

/**
 * Create a new active piece at the spawn anchor in rotation 0
 */
export function createActivePiece(
  shape: Shape,
  values: BlockValues,
  cfg: Pick<EngineConfig, "spawnX" | "spawnY">,
): ActivePiece {
  return { id: shape, rot: 0, values, x: cfg.spawnX, y: cfg.spawnY };
}

export function drawShape(rng: RandomGenerator): {
  shape: Shape;
  newRng: RandomGenerator;
} {
  const r = pickUniform(rng, SHAPES);
  return { newRng: r.newRng, shape: r.value };
}

// Four independent weighted draws, one per block
export function drawBlockValues(
  rng: RandomGenerator,
  cfg: Pick<EngineConfig, "valueWeights">,
): { values: BlockValues; newRng: RandomGenerator } {
  const a = pickWeighted(rng, cfg.valueWeights);
  const b = pickWeighted(a.newRng, cfg.valueWeights);
  const c = pickWeighted(b.newRng, cfg.valueWeights);
  const d = pickWeighted(c.newRng, cfg.valueWeights);
  return {
    newRng: d.newRng,
    values: [
      createCellValue(a.value),
      createCellValue(b.value),
      createCellValue(c.value),
      createCellValue(d.value),
    ],
  };
}

/**
 * Check if the game is topped out (the piece does not fit at spawn)
 */
export function isSpawnBlocked(board: Board, piece: ActivePiece): boolean {
  return !canPlacePiece(board, piece);
}
