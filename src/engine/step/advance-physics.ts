import { isGrounded } from "../core/board";
import { gravityStep } from "../physics/gravity";
import { updateLock } from "../physics/lock-delay";

import type { DomainEvent } from "../events";
import type { CommandSideEffects } from "./apply-commands";
import type { GameState } from "../types";

export type PhysicsSideEffects = {
  hardDropped: boolean;
  lockNow: boolean;
};

export function advancePhysics(
  state: GameState,
  cmdFx: CommandSideEffects,
  dtMs: number,
): {
  state: GameState;
  events: ReadonlyArray<DomainEvent>;
  sideEffects: PhysicsSideEffects;
} {
  // Hard drop bypasses gravity and lock delay entirely
  if (cmdFx.hardDropped) {
    return {
      events: [],
      sideEffects: { hardDropped: true, lockNow: true },
      state,
    };
  }

  const idle = {
    events: [],
    sideEffects: { hardDropped: false, lockNow: false },
    state,
  };
  if (state.status !== "playing" || state.cascade !== null) return idle;
  if (!state.piece) return idle;

  const events: Array<DomainEvent> = [];

  // 1) Drop timer (may move the piece down one cell)
  const g = gravityStep(state, dtMs);
  let s = g.state;

  // 2) Grounded flag is derived, never stored
  const grounded = s.piece ? isGrounded(s.board, s.piece) : false;

  // 3) Lock-delay transitions
  const L = updateLock(s, dtMs, { gravity: g.outcome, grounded });
  s = L.state;
  if (L.started) events.push({ kind: "LockStarted", tick: s.tick });
  if (L.cancelled) events.push({ kind: "LockCancelled", tick: s.tick });

  return {
    events,
    sideEffects: { hardDropped: false, lockNow: L.lockNow },
    state: s,
  };
}
