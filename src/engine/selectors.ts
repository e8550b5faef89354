import { dropToBottom, isGrounded, listBlocks } from "./core/board";
import { pieceBlocks } from "./core/pieces";
import { effectiveDropIntervalMs } from "./physics/gravity";
import { speedMultiplier } from "./powerups/queue";

import type { ActiveEffect, PowerUpKind } from "./powerups/types";
import type {
  ActivePiece,
  CellValue,
  GameState,
  PlacedBlock,
  Rot,
  Shape,
} from "./types";

// Status helpers for host branching
export const selectStatus = (s: GameState): GameState["status"] => s.status;
export const selectIsPaused = (s: GameState): boolean => s.status === "paused";
export const selectIsGameOver = (s: GameState): boolean =>
  s.status === "gameOver";
export const selectIsCascading = (s: GameState): boolean => s.cascade !== null;

// Board snapshots
export const selectBlocks = (s: GameState): ReadonlyArray<PlacedBlock> =>
  listBlocks(s.board);

export const cellKey = (x: number, y: number): string =>
  `${String(x)},${String(y)}`;

export function selectCellMap(s: GameState): ReadonlyMap<string, CellValue> {
  const map = new Map<string, CellValue>();
  for (const b of listBlocks(s.board)) map.set(cellKey(b.x, b.y), b.value);
  return map;
}

export type PieceSnapshot = Readonly<{
  shape: Shape;
  rot: Rot;
  x: number;
  y: number;
  blocks: ReadonlyArray<PlacedBlock>;
}>;

function snapshot(piece: ActivePiece): PieceSnapshot {
  return {
    blocks: pieceBlocks(piece),
    rot: piece.rot,
    shape: piece.id,
    x: piece.x,
    y: piece.y,
  };
}

export const selectActive = (s: GameState): PieceSnapshot | null =>
  s.piece ? snapshot(s.piece) : null;

// Ghost piece: where a hard drop would land, state untouched
export function selectGhost(s: GameState): PieceSnapshot | null {
  return s.piece ? snapshot(dropToBottom(s.board, s.piece)) : null;
}

export const selectNextShape = (s: GameState): Shape => s.nextShape;

export const selectIsGrounded = (s: GameState): boolean =>
  s.piece !== null && isGrounded(s.board, s.piece);

export const selectLockElapsedMs = (s: GameState): number =>
  s.physics.lock.tag === "Locking" ? s.physics.lock.elapsedMs : 0;

export type Hud = Readonly<{
  score: number;
  highScore: number;
  level: number;
  lines: number;
  combo: number;
}>;

export function selectHud(s: GameState): Hud {
  return {
    combo: s.combo.count,
    highScore: s.scoring.highScore,
    level: s.scoring.level,
    lines: s.scoring.totalLines,
    score: s.scoring.score,
  };
}

export const selectActiveEffects = (
  s: GameState,
): ReadonlyArray<ActiveEffect> => s.powerUps.active;
export const selectQueuedPowerUps = (
  s: GameState,
): ReadonlyArray<PowerUpKind> => s.powerUps.queue;
export const selectSpeedMultiplier = (s: GameState): number =>
  speedMultiplier(s.powerUps, s.cfg);
export const selectDropIntervalMs = (s: GameState): number =>
  effectiveDropIntervalMs(s);
