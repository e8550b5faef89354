import type { DomainEvent } from "../events";
import type { EngineConfig, ScoreState, Tick } from "../types";

type ScoreResult = {
  scoring: ScoreState;
  events: ReadonlyArray<DomainEvent>;
};

// Gravity interval for a level, floored at the configured minimum
export function dropIntervalMs(level: number, cfg: EngineConfig): number {
  return Math.max(
    cfg.minDropIntervalMs,
    cfg.baseDropIntervalMs - (level - 1) * cfg.dropIntervalStepMs,
  );
}

export function addScore(
  scoring: ScoreState,
  points: number,
  tick: Tick,
): ScoreResult {
  if (points <= 0) return { events: [], scoring };
  const score = scoring.score + points;
  const events: Array<DomainEvent> = [
    { delta: points, kind: "ScoreChanged", score, tick },
  ];
  let highScore = scoring.highScore;
  if (score > highScore) {
    highScore = score;
    events.push({ highScore, kind: "HighScoreChanged", tick });
  }
  return { events, scoring: { ...scoring, highScore, score } };
}

export function rowClearPoints(
  rows: number,
  combo: number,
  level: number,
  cfg: EngineConfig,
): number {
  if (rows <= 0) return 0;
  const multipliers = cfg.rowMultipliers;
  const multiplier =
    multipliers[Math.min(rows, multipliers.length) - 1] ??
    multipliers[multipliers.length - 1] ??
    1;
  return Math.round(
    cfg.scorePerRow *
      rows *
      multiplier *
      (1 + combo * cfg.rowComboFactor) *
      (1 + (level - 1) * cfg.levelScoreFactor),
  );
}

/**
 * Scores a row clear and advances line/level counters. At most one level
 * is gained per clear; the counter keeps its overflow.
 */
export function addRowClearScore(
  scoring: ScoreState,
  rows: number,
  combo: number,
  cfg: EngineConfig,
  tick: Tick,
): ScoreResult & { points: number } {
  if (rows <= 0) return { events: [], points: 0, scoring };

  const points = rowClearPoints(rows, combo, scoring.level, cfg);
  const scored = addScore(scoring, points, tick);
  const events: Array<DomainEvent> = [...scored.events];

  let next: ScoreState = {
    ...scored.scoring,
    linesTowardLevel: scored.scoring.linesTowardLevel + rows,
    totalLines: scored.scoring.totalLines + rows,
  };
  events.push({
    kind: "LinesChanged",
    linesTowardLevel: next.linesTowardLevel,
    tick,
    totalLines: next.totalLines,
  });

  if (next.linesTowardLevel >= cfg.linesPerLevel && next.level < cfg.maxLevel) {
    next = {
      ...next,
      level: next.level + 1,
      linesTowardLevel: next.linesTowardLevel - cfg.linesPerLevel,
    };
    events.push({ kind: "LevelChanged", level: next.level, tick });
    const bonus = addScore(next, cfg.scorePerLevel, tick);
    next = bonus.scoring;
    events.push(...bonus.events);
  }

  return { events, points, scoring: next };
}
