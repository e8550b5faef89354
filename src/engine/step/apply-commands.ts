import {
  tryHardDrop,
  tryMoveLeft,
  tryMoveRight,
  tryRotateCW,
} from "../gameplay/movement";
import { applyBoardPowerUp } from "../powerups/effects";
import { dequeuePowerUp, startTimedEffect } from "../powerups/queue";
import { isTimedPowerUp } from "../powerups/types";
import { addScore } from "../scoring/score";
import { debugLog } from "../../utils/debug";

import type { Command } from "../commands";
import type { DomainEvent } from "../events";
import type { GameState } from "../types";

export type CommandSideEffects = {
  hardDropped: boolean;
};

type CommandResult = {
  state: GameState;
  events: ReadonlyArray<DomainEvent>;
  hardDropped: boolean;
};

/**
 * Helper function to create CommandResult objects more ergonomically
 */
function createCommandResult(opts: {
  state: GameState;
  events?: ReadonlyArray<DomainEvent>;
  hardDropped?: boolean;
}): CommandResult {
  return {
    events: opts.events ?? [],
    hardDropped: opts.hardDropped ?? false,
    state: opts.state,
  };
}

// Piece input is only taken while playing with no cascade in progress
function acceptsPieceInput(state: GameState): boolean {
  return (
    state.status === "playing" && state.cascade === null && state.piece !== null
  );
}

function handleShift(
  state: GameState,
  direction: "left" | "right",
): CommandResult {
  if (!acceptsPieceInput(state)) return createCommandResult({ state });
  const r = direction === "left" ? tryMoveLeft(state) : tryMoveRight(state);
  if (!r.moved) return createCommandResult({ state });
  return createCommandResult({
    events: [
      {
        direction,
        fromX: r.fromX,
        kind: "Moved",
        tick: state.tick,
        toX: r.toX,
      },
    ],
    state: r.state,
  });
}

function handleRotation(state: GameState): CommandResult {
  if (!acceptsPieceInput(state)) return createCommandResult({ state });
  const r = tryRotateCW(state);
  if (!r.rotated || !r.state.piece) return createCommandResult({ state });
  return createCommandResult({
    events: [
      {
        kick: r.kick,
        kind: "Rotated",
        rot: r.state.piece.rot,
        tick: state.tick,
      },
    ],
    state: r.state,
  });
}

// Soft drop is a held flag; it is remembered across pieces and cascades
function handleSoftDrop(state: GameState, on: boolean): CommandResult {
  if (state.status !== "playing" || state.physics.softDropOn === on) {
    return createCommandResult({ state });
  }
  return createCommandResult({
    events: [{ kind: "SoftDropToggled", on, tick: state.tick }],
    state: {
      ...state,
      physics: { ...state.physics, softDropOn: on },
    },
  });
}

function handleHardDrop(state: GameState): CommandResult {
  if (!acceptsPieceInput(state)) return createCommandResult({ state });
  const r = tryHardDrop(state);
  if (!r.hardDropped) return createCommandResult({ state });

  const points = r.cells * state.cfg.hardDropPointsPerCell;
  const scored = addScore(r.state.scoring, points, state.tick);
  return createCommandResult({
    events: [
      { cells: r.cells, kind: "HardDropped", tick: state.tick },
      ...scored.events,
    ],
    hardDropped: true,
    state: { ...r.state, scoring: scored.scoring },
  });
}

function handlePause(state: GameState): CommandResult {
  if (state.status !== "playing") return createCommandResult({ state });
  return createCommandResult({
    events: [{ kind: "Paused", tick: state.tick }],
    state: { ...state, status: "paused" },
  });
}

function handleResume(state: GameState): CommandResult {
  if (state.status !== "paused") return createCommandResult({ state });
  return createCommandResult({
    events: [{ kind: "Resumed", tick: state.tick }],
    state: { ...state, status: "playing" },
  });
}

/**
 * Timed kinds start running. Board kinds change the board right away, falling
 * piece or not, and open a power-up cascade that holds piece input until the
 * board settles.
 */
function handleActivatePowerUp(state: GameState): CommandResult {
  if (state.status !== "playing" || state.cascade !== null) {
    return createCommandResult({ state });
  }
  const next = dequeuePowerUp(state.powerUps);
  if (!next) return createCommandResult({ state });

  const { kind } = next;
  const events: Array<DomainEvent> = [
    { kind: "PowerUpActivated", powerUp: kind, tick: state.tick },
  ];
  debugLog("powerups", `activated ${kind}`);

  if (isTimedPowerUp(kind)) {
    return createCommandResult({
      events,
      state: {
        ...state,
        powerUps: startTimedEffect(next.powerUps, kind, state.cfg),
      },
    });
  }

  // Blocks left hanging by the effect fall before the first merge pass
  const fx = applyBoardPowerUp(kind, state.board, state.rng);
  return createCommandResult({
    events,
    state: {
      ...state,
      board: fx.board,
      cascade: {
        iterations: 0,
        source: "powerUp",
        stage: "gravity",
        waitMs: 0,
      },
      powerUps: next.powerUps,
      rng: fx.newRng,
    },
  });
}

/**
 * Maps commands to their appropriate handlers
 */
function getCommandHandler(cmd: Command, state: GameState): CommandResult {
  switch (cmd.kind) {
    case "MoveLeft":
      return handleShift(state, "left");
    case "MoveRight":
      return handleShift(state, "right");
    case "RotateCW":
      return handleRotation(state);
    case "SoftDropOn":
      return handleSoftDrop(state, true);
    case "SoftDropOff":
      return handleSoftDrop(state, false);
    case "HardDrop":
      return handleHardDrop(state);
    case "Pause":
      return handlePause(state);
    case "Resume":
      return handleResume(state);
    case "ActivatePowerUp":
      return handleActivatePowerUp(state);
  }
}

export function applyCommands(
  state: GameState,
  cmds: ReadonlyArray<Command>,
): {
  state: GameState;
  events: ReadonlyArray<DomainEvent>;
  sideEffects: CommandSideEffects;
} {
  let s = state;
  const events: Array<DomainEvent> = [];
  let hardDropped = false;

  for (const cmd of cmds) {
    // The dropped piece locks this tick; only pause/resume still apply
    if (hardDropped && cmd.kind !== "Pause" && cmd.kind !== "Resume") continue;
    const result = getCommandHandler(cmd, s);
    s = result.state;
    events.push(...result.events);
    hardDropped = hardDropped || result.hardDropped;
  }

  return { events, sideEffects: { hardDropped }, state: s };
}
