import { clearCompletedRows, isTopRowOccupied } from "../core/board";
import { placeActivePiece, spawnPiece } from "../gameplay/spawn";
import { runMergePass } from "../merge/cascade";
import { applyGravity } from "../merge/compaction";
import { rollPowerUp, enqueuePowerUp } from "../powerups/queue";
import { addRowClearScore, addScore } from "../scoring/score";
import { debugLog, warnLog } from "../../utils/debug";
import { invariant } from "../errors";

import type { DomainEvent } from "../events";
import type { PhysicsSideEffects } from "./advance-physics";
import type { CascadeState, GameState } from "../types";

type Transition = { state: GameState; events: Array<DomainEvent> };

function handleLocking(
  state: GameState,
  physFx: PhysicsSideEffects,
): Transition {
  if (!state.piece || !physFx.lockNow) return { events: [], state };

  const placed = placeActivePiece(state);
  invariant(placed.shape !== null, "locking without an active piece");
  const cascade: CascadeState = {
    iterations: 0,
    source: "lock",
    stage: "merge",
    waitMs: 0,
  };
  return {
    events: [
      {
        kind: "Locked",
        shape: placed.shape,
        source: physFx.hardDropped ? "hardDrop" : "ground",
        tick: state.tick,
      },
    ],
    state: { ...placed.state, cascade },
  };
}

// Row clear, scoring and the power-up roll that close every cascade
function finishCascade(state: GameState): Transition {
  const events: Array<DomainEvent> = [];
  const cleared = clearCompletedRows(state.board);
  let s: GameState = { ...state, board: cleared.board, cascade: null };
  debugLog("cascade", "settled", { rowsCleared: cleared.rowsCleared });
  if (cleared.rowsCleared === 0) return { events, state: s };

  const scored = addRowClearScore(
    s.scoring,
    cleared.rowsCleared,
    s.combo.count,
    s.cfg,
    s.tick,
  );
  events.push({
    combo: s.combo.count,
    kind: "RowsCleared",
    points: scored.points,
    rows: cleared.rows,
    tick: s.tick,
  });
  events.push(...scored.events);
  s = { ...s, scoring: scored.scoring };

  const roll = rollPowerUp(s.rng, cleared.rowsCleared, s.cfg);
  s = { ...s, rng: roll.newRng };
  if (roll.kind !== null) {
    s = { ...s, powerUps: enqueuePowerUp(s.powerUps, roll.kind) };
    events.push({ kind: "PowerUpCollected", powerUp: roll.kind, tick: s.tick });
  }
  return { events, state: s };
}

/**
 * Runs every cascade stage whose wait has elapsed within dtMs. With a zero
 * pass delay the cascade settles in a single call.
 */
function advanceCascade(state: GameState, dtMs: number): Transition {
  const events: Array<DomainEvent> = [];
  let s = state;
  let cascade = s.cascade;
  if (!cascade) return { events, state: s };

  const delay = s.cfg.mergePassDelayMs;
  let wait = cascade.waitMs - dtMs;

  while (cascade && wait <= 0) {
    if (cascade.stage === "gravity") {
      s = { ...s, board: applyGravity(s.board) };
      cascade = { ...cascade, stage: "merge" };
      wait += delay;
      continue;
    }

    const pass = runMergePass(
      s.board,
      s.combo.count,
      cascade.iterations,
      s.cfg,
    );
    if (pass.kind === "merged") {
      let scoring = s.scoring;
      for (const m of pass.merges) {
        events.push({
          combo: m.combo,
          kind: "Merged",
          points: m.points,
          tick: s.tick,
          value: m.value,
          x: m.x,
          y: m.y,
        });
        const scored = addScore(scoring, m.points, s.tick);
        scoring = scored.scoring;
        events.push(...scored.events);
      }
      s = {
        ...s,
        board: pass.board,
        combo: { count: pass.combo, sinceLastMergeMs: 0 },
        scoring,
      };
      cascade = {
        ...cascade,
        iterations: cascade.iterations + 1,
        stage: "gravity",
      };
      wait += delay;
      continue;
    }

    if (pass.kind === "limitReached") {
      warnLog(
        "cascade",
        `merge cascade stopped after ${String(cascade.iterations)} passes`,
      );
      events.push({
        iterations: cascade.iterations,
        kind: "CascadeLimitReached",
        tick: s.tick,
      });
    }
    const done = finishCascade({ ...s, cascade: null });
    s = done.state;
    events.push(...done.events);
    cascade = null;
  }

  return {
    events,
    state: { ...s, cascade: cascade ? { ...cascade, waitMs: wait } : null },
  };
}

function handleSpawning(state: GameState): Transition {
  const s = state;
  if (s.status !== "playing" || s.piece || s.cascade) {
    return { events: [], state: s };
  }

  if (isTopRowOccupied(s.board)) {
    return gameOver(s, "topRow");
  }

  const sp = spawnPiece(s);
  if (sp.blocked || !sp.state.piece) return gameOver(s, "spawnBlocked");
  return {
    events: [
      {
        kind: "PieceSpawned",
        shape: sp.state.piece.id,
        tick: s.tick,
        values: sp.state.piece.values,
      },
    ],
    state: sp.state,
  };
}

function gameOver(
  state: GameState,
  reason: "topRow" | "spawnBlocked",
): Transition {
  debugLog("lifecycle", `game over (${reason})`);
  return {
    events: [
      {
        kind: "GameOver",
        reason,
        score: state.scoring.score,
        tick: state.tick,
      },
    ],
    state: { ...state, piece: null, status: "gameOver" },
  };
}

export function resolveTransitions(
  state: GameState,
  physFx: PhysicsSideEffects,
  dtMs: number,
): { state: GameState; events: ReadonlyArray<DomainEvent> } {
  let s = state;
  const allEvents: Array<DomainEvent> = [];

  // 1) Lock the piece and open a cascade
  const lockResult = handleLocking(s, physFx);
  s = lockResult.state;
  allEvents.push(...lockResult.events);

  // 2) Cascades run to completion even while paused
  const cascadeResult = advanceCascade(s, dtMs);
  s = cascadeResult.state;
  allEvents.push(...cascadeResult.events);

  // 3) Game-over check or next piece
  const spawnResult = handleSpawning(s);
  s = spawnResult.state;
  allEvents.push(...spawnResult.events);

  return { events: allEvents, state: s };
}
