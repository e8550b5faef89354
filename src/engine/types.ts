import { pickUniform } from "./core/rng/draw";
import { createSeededRng } from "./core/rng/seeded";
import { createEmptyBoard } from "./core/board";
import { type Board, type ActivePiece, type Shape, SHAPES } from "./core/types";
import { type PowerUpState, emptyPowerUps } from "./powerups/types";

import type { EngineConfig } from "./config";
import type { RandomGenerator } from "./core/rng/interface";

export * from "./core/types";
export type Tick = number & { readonly brand: "Tick" };

export { type RandomGenerator } from "./core/rng/interface";
export { type EngineConfig } from "./config";

export type GameStatus = "playing" | "paused" | "gameOver";

// Lock-delay ADT: a falling piece either drops freely or counts toward lock
export type LockState =
  | { readonly tag: "Falling" }
  | { readonly tag: "Locking"; readonly elapsedMs: number };

export type PhysicsState = {
  readonly dropTimerMs: number;
  readonly softDropOn: boolean;
  readonly lock: LockState;
};

/**
 * Paced merge cascade. Stages alternate merge → gravity → merge ... with
 * `waitMs` left before the next stage runs; finishing clears rows.
 */
export type CascadeState = {
  readonly stage: "merge" | "gravity";
  readonly waitMs: number;
  readonly iterations: number;
  readonly source: "lock" | "powerUp";
};

export type ScoreState = {
  readonly score: number;
  readonly highScore: number;
  readonly level: number;
  readonly linesTowardLevel: number;
  readonly totalLines: number;
};

export type ComboState = {
  readonly count: number;
  readonly sinceLastMergeMs: number;
};

export type GameState = {
  readonly cfg: EngineConfig;
  readonly board: Board;
  readonly piece: ActivePiece | null;
  readonly nextShape: Shape;
  readonly rng: RandomGenerator;
  readonly tick: Tick;
  readonly status: GameStatus;
  readonly physics: PhysicsState;
  readonly cascade: CascadeState | null;
  readonly scoring: ScoreState;
  readonly combo: ComboState;
  readonly powerUps: PowerUpState;
  readonly piecesLocked: number;
};

export function mkInitialScore(cfg: EngineConfig, highScore = 0): ScoreState {
  return {
    highScore,
    level: cfg.startingLevel,
    linesTowardLevel: 0,
    score: 0,
    totalLines: 0,
  };
}

export function mkInitialPhysics(softDropOn = false): PhysicsState {
  return { dropTimerMs: 0, lock: { tag: "Falling" }, softDropOn };
}

export function mkInitialState(
  cfg: EngineConfig,
  startTick: Tick,
  opts: { highScore?: number; rng?: RandomGenerator } = {},
): GameState {
  const rng = opts.rng ?? createSeededRng(cfg.rngSeed);
  const first = pickUniform(rng, SHAPES);

  return {
    board: createEmptyBoard(cfg.width, cfg.height),
    cascade: null,
    cfg,
    combo: { count: 0, sinceLastMergeMs: 0 },
    nextShape: first.value,
    physics: mkInitialPhysics(),
    piece: null,
    piecesLocked: 0,
    powerUps: emptyPowerUps(),
    rng: first.newRng,
    scoring: mkInitialScore(cfg, opts.highScore ?? 0),
    status: "playing",
    tick: startTick,
  };
}
