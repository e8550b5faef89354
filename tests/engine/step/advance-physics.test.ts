import { Locking } from "@/engine/physics/lock-delay";
import { advancePhysics } from "@/engine/step/advance-physics";
import { mkInitialPhysics } from "@/engine/types";

import { createTestGameState, createTestPiece } from "../../test-helpers";

const NO_DROP = { hardDropped: false };

describe("@/engine/step/advance-physics", () => {
  test("a hard drop locks immediately", () => {
    const s = createTestGameState({ piece: createTestPiece("O", 4, 0) });
    const r = advancePhysics(s, { hardDropped: true }, 16);
    expect(r.sideEffects).toEqual({ hardDropped: true, lockNow: true });
    expect(r.state).toBe(s);
  });

  test("gravity blocked on the floor starts the lock delay", () => {
    const s = createTestGameState({
      physics: { ...mkInitialPhysics(), dropTimerMs: 990 },
      piece: createTestPiece("O", 4, 0),
    });
    const r = advancePhysics(s, NO_DROP, 10);
    expect(r.events).toEqual([{ kind: "LockStarted", tick: 0 }]);
    expect(r.state.physics.lock).toEqual(Locking(0));
    expect(r.sideEffects.lockNow).toBe(false);
  });

  test("moving off a ledge cancels the lock delay", () => {
    const s = createTestGameState({
      physics: { ...mkInitialPhysics(), lock: Locking(200) },
      piece: createTestPiece("O", 4, 5),
    });
    const r = advancePhysics(s, NO_DROP, 16);
    expect(r.events).toEqual([{ kind: "LockCancelled", tick: 0 }]);
  });

  test("physics stands still while paused or cascading", () => {
    const piece = createTestPiece("O", 4, 5);
    const paused = createTestGameState({ piece, status: "paused" });
    expect(advancePhysics(paused, NO_DROP, 5000).state).toBe(paused);

    const cascading = createTestGameState({
      cascade: { iterations: 0, source: "lock", stage: "merge", waitMs: 50 },
      piece,
    });
    expect(advancePhysics(cascading, NO_DROP, 5000).state).toBe(cascading);
  });
});
