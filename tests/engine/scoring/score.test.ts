import { mergePoints, tickCombo } from "@/engine/scoring/combo";
import {
  addRowClearScore,
  addScore,
  dropIntervalMs,
  rowClearPoints,
} from "@/engine/scoring/score";
import { mkInitialScore, type ScoreState } from "@/engine/types";
import { asTick } from "@/engine/utils/tick";

import { createTestConfig, kindsOf } from "../../test-helpers";

const cfg = createTestConfig();
const tick = asTick(7);

function score(overrides: Partial<ScoreState> = {}): ScoreState {
  return { ...mkInitialScore(cfg), ...overrides };
}

describe("@/engine/scoring/score — points and high score", () => {
  test("addScore raises score and follows with the high score", () => {
    const r = addScore(score({ highScore: 10 }), 25, tick);
    expect(r.scoring.score).toBe(25);
    expect(r.scoring.highScore).toBe(25);
    expect(r.events).toEqual([
      { delta: 25, kind: "ScoreChanged", score: 25, tick: 7 },
      { highScore: 25, kind: "HighScoreChanged", tick: 7 },
    ]);
  });

  test("addScore below the high score leaves it alone", () => {
    const r = addScore(score({ highScore: 100 }), 25, tick);
    expect(r.scoring.highScore).toBe(100);
    expect(kindsOf(r.events)).toEqual(["ScoreChanged"]);
  });

  test("zero points change nothing", () => {
    const s = score();
    expect(addScore(s, 0, tick)).toEqual({ events: [], scoring: s });
  });
});

describe("@/engine/scoring/score — row clears", () => {
  test.each([
    [1, 0, 1, 100],
    [2, 0, 1, 600],
    [3, 0, 1, 1500],
    [4, 0, 1, 3200],
    [5, 0, 1, 4000],
    [1, 2, 1, 150],
    [1, 0, 3, 120],
    [2, 1, 2, 825],
  ])(
    "rows=%d combo=%d level=%d → %d points",
    (rows, combo, level, expected) => {
      expect(rowClearPoints(rows, combo, level, cfg)).toBe(expected);
    },
  );

  test("lines advance both counters", () => {
    const r = addRowClearScore(score(), 2, 0, cfg, tick);
    expect(r.points).toBe(600);
    expect(r.scoring).toEqual({
      highScore: 600,
      level: 1,
      linesTowardLevel: 2,
      score: 600,
      totalLines: 2,
    });
    expect(kindsOf(r.events)).toEqual([
      "ScoreChanged",
      "HighScoreChanged",
      "LinesChanged",
    ]);
  });

  test("reaching ten lines levels up once and keeps the overflow", () => {
    const r = addRowClearScore(
      score({ linesTowardLevel: 9, score: 0, totalLines: 29 }),
      3,
      0,
      cfg,
      tick,
    );
    // 100 * 3 * 5 = 1500, then +1000 level bonus
    expect(r.scoring.level).toBe(2);
    expect(r.scoring.linesTowardLevel).toBe(2);
    expect(r.scoring.totalLines).toBe(32);
    expect(r.scoring.score).toBe(2500);
    expect(kindsOf(r.events)).toEqual([
      "ScoreChanged",
      "HighScoreChanged",
      "LinesChanged",
      "LevelChanged",
      "ScoreChanged",
      "HighScoreChanged",
    ]);
  });

  test("no level beyond the maximum", () => {
    const r = addRowClearScore(
      score({ level: 20, linesTowardLevel: 9 }),
      1,
      0,
      cfg,
      tick,
    );
    expect(r.scoring.level).toBe(20);
    expect(r.scoring.linesTowardLevel).toBe(10);
  });
});

describe("@/engine/scoring/score — drop interval", () => {
  test.each([
    [1, 1000],
    [2, 950],
    [10, 550],
    [20, 50],
  ])("level %d → %d ms", (level, expected) => {
    expect(dropIntervalMs(level, cfg)).toBe(expected);
  });

  test("never falls below the minimum", () => {
    expect(dropIntervalMs(40, cfg)).toBe(50);
  });
});

describe("@/engine/scoring/combo — window", () => {
  test("merge points grow with the combo", () => {
    expect(mergePoints(8, 1, cfg)).toBe(12);
    expect(mergePoints(4, 3, cfg)).toBe(10);
  });

  test("combo survives until the window is exceeded", () => {
    const r = tickCombo({ count: 3, sinceLastMergeMs: 1990 }, 10, cfg);
    expect(r.combo).toEqual({ count: 3, sinceLastMergeMs: 2000 });
    expect(r.ended).toBeNull();
  });

  test("a chain longer than one earns count * 50 when it ends", () => {
    const r = tickCombo({ count: 3, sinceLastMergeMs: 1995 }, 10, cfg);
    expect(r.combo.count).toBe(0);
    expect(r.ended).toBe(3);
    expect(r.bonus).toBe(150);
  });

  test("a single merge ends silently", () => {
    const r = tickCombo({ count: 1, sinceLastMergeMs: 2000 }, 16, cfg);
    expect(r.combo.count).toBe(0);
    expect(r.ended).toBeNull();
    expect(r.bonus).toBe(0);
  });
});
