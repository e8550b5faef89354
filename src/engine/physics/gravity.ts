import { tryMove } from "../core/board";
import { speedMultiplier } from "../powerups/queue";
import { dropIntervalMs } from "../scoring/score";

import type { GameState } from "../types";

/**
 * Current gravity interval: level speed, shortened by soft drop and
 * stretched by active power-ups. Infinity while gravity is frozen.
 */
export function effectiveDropIntervalMs(state: GameState): number {
  const base = dropIntervalMs(state.scoring.level, state.cfg);
  const soft = state.physics.softDropOn ? state.cfg.softDropFactor : 1;
  const speed = speedMultiplier(state.powerUps, state.cfg);
  if (speed <= 0) return Number.POSITIVE_INFINITY;
  return base / soft / speed;
}

export type GravityOutcome = "idle" | "moved" | "blocked";

/**
 * Advance the drop timer by dtMs. When it reaches the interval the piece
 * tries one cell down and the timer restarts at 0.
 */
export function gravityStep(
  state: GameState,
  dtMs: number,
): { state: GameState; outcome: GravityOutcome } {
  const s = state;
  if (!s.piece) return { outcome: "idle", state: s };

  const interval = effectiveDropIntervalMs(s);
  if (!Number.isFinite(interval)) return { outcome: "idle", state: s };

  const dropTimerMs = s.physics.dropTimerMs + dtMs;
  if (dropTimerMs < interval) {
    return {
      outcome: "idle",
      state: { ...s, physics: { ...s.physics, dropTimerMs } },
    };
  }

  const physics = { ...s.physics, dropTimerMs: 0 };
  const moved = tryMove(s.board, s.piece, 0, -1);
  if (!moved) return { outcome: "blocked", state: { ...s, physics } };
  return { outcome: "moved", state: { ...s, physics, piece: moved } };
}
