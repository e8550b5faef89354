import { emptyPowerUps } from "@/engine/powerups/types";
import { applyCommands } from "@/engine/step/apply-commands";
import { type CascadeState } from "@/engine/types";

import {
  boardWith,
  cellsOf,
  createTestGameState,
  createTestPiece,
  kindsOf,
} from "../../test-helpers";

const cascading: CascadeState = {
  iterations: 0,
  source: "lock",
  stage: "merge",
  waitMs: 100,
};

describe("@/engine/step/apply-commands — piece input", () => {
  test("shifts emit Moved with both columns", () => {
    const s = createTestGameState({ piece: createTestPiece("T", 4, 10) });
    const r = applyCommands(s, [{ kind: "MoveLeft" }]);
    expect(r.state.piece?.x).toBe(3);
    expect(r.events).toEqual([
      { direction: "left", fromX: 4, kind: "Moved", tick: 0, toX: 3 },
    ]);
  });

  test("a shift into the wall does nothing", () => {
    const s = createTestGameState({ piece: createTestPiece("O", 0, 10) });
    const r = applyCommands(s, [{ kind: "MoveLeft" }]);
    expect(r.state).toBe(s);
    expect(r.events).toEqual([]);
  });

  test("rotation reports the new orientation and kick", () => {
    const s = createTestGameState({ piece: createTestPiece("T", 4, 10) });
    const r = applyCommands(s, [{ kind: "RotateCW" }]);
    expect(r.events).toEqual([{ kick: 0, kind: "Rotated", rot: 1, tick: 0 }]);
  });

  test("piece input is ignored during a cascade", () => {
    const s = createTestGameState({
      cascade: cascading,
      piece: createTestPiece("T", 4, 10),
    });
    const r = applyCommands(s, [{ kind: "MoveRight" }, { kind: "HardDrop" }]);
    expect(r.state.piece?.x).toBe(4);
    expect(r.sideEffects.hardDropped).toBe(false);
  });

  test("soft drop toggles once and is accepted during a cascade", () => {
    const s = createTestGameState({ cascade: cascading });
    const r = applyCommands(s, [
      { kind: "SoftDropOn" },
      { kind: "SoftDropOn" },
    ]);
    expect(r.state.physics.softDropOn).toBe(true);
    expect(kindsOf(r.events)).toEqual(["SoftDropToggled"]);
  });
});

describe("@/engine/step/apply-commands — hard drop", () => {
  test("drops to the floor and scores two points per cell", () => {
    const s = createTestGameState({ piece: createTestPiece("O", 4, 10) });
    const r = applyCommands(s, [{ kind: "HardDrop" }]);
    expect(r.state.piece?.y).toBe(0);
    expect(r.state.scoring.score).toBe(20);
    expect(r.sideEffects.hardDropped).toBe(true);
    expect(kindsOf(r.events)).toEqual([
      "HardDropped",
      "ScoreChanged",
      "HighScoreChanged",
    ]);
  });

  test("later commands in the tick are dropped except pause", () => {
    const s = createTestGameState({ piece: createTestPiece("O", 4, 10) });
    const r = applyCommands(s, [
      { kind: "HardDrop" },
      { kind: "MoveLeft" },
      { kind: "Pause" },
    ]);
    expect(r.state.piece?.x).toBe(4);
    expect(r.state.status).toBe("paused");
    expect(r.sideEffects.hardDropped).toBe(true);
  });
});

describe("@/engine/step/apply-commands — pause", () => {
  test("pause and resume toggle the status", () => {
    const s = createTestGameState();
    const r = applyCommands(s, [{ kind: "Pause" }, { kind: "Pause" }]);
    expect(r.state.status).toBe("paused");
    expect(kindsOf(r.events)).toEqual(["Paused"]);

    const back = applyCommands(r.state, [{ kind: "Resume" }]);
    expect(back.state.status).toBe("playing");
    expect(kindsOf(back.events)).toEqual(["Resumed"]);
  });

  test("piece input is ignored while paused", () => {
    const s = createTestGameState({
      piece: createTestPiece("T", 4, 10),
      status: "paused",
    });
    const r = applyCommands(s, [{ kind: "MoveLeft" }, { kind: "SoftDropOn" }]);
    expect(r.state).toBe(s);
  });
});

describe("@/engine/step/apply-commands — power-ups", () => {
  test("an empty queue activates nothing", () => {
    const s = createTestGameState();
    expect(applyCommands(s, [{ kind: "ActivatePowerUp" }]).events).toEqual([]);
  });

  test("timed power-ups start running at once", () => {
    const s = createTestGameState({
      powerUps: { ...emptyPowerUps(), queue: ["Freeze", "Bomb"] },
    });
    const r = applyCommands(s, [{ kind: "ActivatePowerUp" }]);
    expect(r.state.powerUps).toEqual({
      active: [{ kind: "Freeze", remainingMs: 5000 }],
      queue: ["Bomb"],
    });
    expect(r.events).toEqual([
      { kind: "PowerUpActivated", powerUp: "Freeze", tick: 0 },
    ]);
  });

  test("board power-ups change the board under a falling piece", () => {
    const s = createTestGameState({
      board: boardWith([
        [0, 0, 2],
        [5, 5, 4],
      ]),
      piece: createTestPiece("T", 4, 10),
      powerUps: { ...emptyPowerUps(), queue: ["Bomb"] },
    });
    const r = applyCommands(s, [{ kind: "ActivatePowerUp" }]);
    expect(cellsOf(r.state.board)).toEqual([[5, 5, 4]]);
    expect(r.state.piece).toBe(s.piece);
    expect(r.state.powerUps.queue).toEqual([]);
    expect(r.state.cascade).toEqual({
      iterations: 0,
      source: "powerUp",
      stage: "gravity",
      waitMs: 0,
    });
    expect(kindsOf(r.events)).toEqual(["PowerUpActivated"]);
  });

  test("piece input waits for the power-up cascade", () => {
    const s = createTestGameState({
      piece: createTestPiece("T", 4, 10),
      powerUps: { ...emptyPowerUps(), queue: ["ClearRow"] },
    });
    const r = applyCommands(s, [
      { kind: "ActivatePowerUp" },
      { kind: "MoveLeft" },
    ]);
    expect(r.state.piece).toBe(s.piece);
    expect(kindsOf(r.events)).toEqual(["PowerUpActivated"]);
  });

  test("without a piece a board power-up fires and opens a cascade", () => {
    const s = createTestGameState({
      board: boardWith([
        [0, 0, 2],
        [5, 5, 4],
      ]),
      powerUps: { ...emptyPowerUps(), queue: ["Bomb"] },
    });
    const r = applyCommands(s, [{ kind: "ActivatePowerUp" }]);
    expect(cellsOf(r.state.board)).toEqual([[5, 5, 4]]);
    expect(r.state.cascade).toEqual({
      iterations: 0,
      source: "powerUp",
      stage: "gravity",
      waitMs: 0,
    });
  });

  test("nothing activates while a cascade runs", () => {
    const s = createTestGameState({
      cascade: cascading,
      powerUps: { ...emptyPowerUps(), queue: ["Freeze"] },
    });
    const r = applyCommands(s, [{ kind: "ActivatePowerUp" }]);
    expect(r.state).toBe(s);
  });
});
