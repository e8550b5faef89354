import { placeActivePiece, spawnPiece } from "@/engine/gameplay/spawn";
import { tryHardDrop, tryMoveRight } from "@/engine/gameplay/movement";
import { mkInitialPhysics } from "@/engine/types";

import {
  boardWith,
  cellsOf,
  createTestGameState,
  createTestPiece,
  values,
} from "../../test-helpers";

describe("@/engine/gameplay/spawn — placing", () => {
  test("writes the piece and resets physics but keeps soft drop", () => {
    const s = createTestGameState({
      physics: {
        dropTimerMs: 300,
        lock: { elapsedMs: 120, tag: "Locking" },
        softDropOn: true,
      },
      piece: createTestPiece("O", 0, 0, 0, values(2, 4, 8, 16)),
    });
    const r = placeActivePiece(s);
    expect(r.shape).toBe("O");
    expect(r.state.piece).toBeNull();
    expect(r.state.physics).toEqual(mkInitialPhysics(true));
    expect(r.state.piecesLocked).toBe(1);
    expect(cellsOf(r.state.board)).toEqual([
      [0, 0, 2],
      [1, 0, 4],
      [0, 1, 8],
      [1, 1, 16],
    ]);
  });

  test("without a piece nothing is placed", () => {
    const s = createTestGameState();
    expect(placeActivePiece(s)).toEqual({ shape: null, state: s });
  });
});

describe("@/engine/gameplay/spawn — spawning", () => {
  test("spawns the previewed shape and draws the next preview", () => {
    const r = spawnPiece(createTestGameState());
    expect(r.blocked).toBe(false);
    expect(r.state.piece).toEqual(createTestPiece("I", 4, 18));
    expect(r.state.nextShape).toBe("I");
  });

  test("a blocked spawn leaves the state untouched", () => {
    const s = createTestGameState({ board: boardWith([[5, 18, 2]]) });
    expect(spawnPiece(s)).toEqual({ blocked: true, state: s });
  });
});

describe("@/engine/gameplay/movement", () => {
  test("hard drop reports the distance fallen", () => {
    const s = createTestGameState({
      board: boardWith([[4, 2, 2]]),
      piece: createTestPiece("T", 4, 12),
    });
    const r = tryHardDrop(s);
    expect(r.cells).toBe(9);
    expect(r.state.piece?.y).toBe(3);
  });

  test("shifting stops at blocks", () => {
    const s = createTestGameState({
      board: boardWith([[6, 10, 2]]),
      piece: createTestPiece("T", 4, 10),
    });
    expect(tryMoveRight(s).moved).toBe(false);
  });
});
