import type { GameState, LockState } from "../types";
import type { GravityOutcome } from "./gravity";

export function Falling(): LockState {
  return { tag: "Falling" };
}

export function Locking(elapsedMs = 0): LockState {
  return { elapsedMs, tag: "Locking" };
}

export function isLocking(
  lock: LockState,
): lock is Extract<LockState, { tag: "Locking" }> {
  return lock.tag === "Locking";
}

/**
 * Lock-delay transitions for one tick.
 * - Falling + blocked gravity step → Locking(0), counted from the next tick
 * - Locking + unsupported piece or successful drop → Falling
 * - Locking with elapsed >= lockDelayMs → lock now
 */
export function updateLock(
  state: GameState,
  dtMs: number,
  opts: { grounded: boolean; gravity: GravityOutcome },
): {
  state: GameState;
  started: boolean;
  cancelled: boolean;
  lockNow: boolean;
} {
  const lock = state.physics.lock;
  const withLock = (next: LockState): GameState => ({
    ...state,
    physics: { ...state.physics, lock: next },
  });

  if (!isLocking(lock)) {
    if (opts.gravity === "blocked") {
      return {
        cancelled: false,
        lockNow: false,
        started: true,
        state: withLock(Locking(0)),
      };
    }
    return { cancelled: false, lockNow: false, started: false, state };
  }

  if (!opts.grounded || opts.gravity === "moved") {
    return {
      cancelled: true,
      lockNow: false,
      started: false,
      state: withLock(Falling()),
    };
  }

  const elapsedMs = lock.elapsedMs + dtMs;
  return {
    cancelled: false,
    lockNow: elapsedMs >= state.cfg.lockDelayMs,
    started: false,
    state: withLock(Locking(elapsedMs)),
  };
}
