import { advancePhysics } from "./step/advance-physics";
import { advanceTimers } from "./step/advance-timers";
import { applyCommands } from "./step/apply-commands";
import { resolveTransitions } from "./step/resolve-transitions";
import { mkInitialState } from "./types";
import { incrementTick } from "./utils/tick";

import type { Command } from "./commands";
import type { DomainEvent } from "./events";
import type { Tick, EngineConfig, GameState, RandomGenerator } from "./types";
import type { DurationMs } from "../types/brands";

/**
 * Initialize engine with deterministic seed and starting tick.
 * The first piece spawns on the first step.
 */
export function init(
  cfg: EngineConfig,
  startTick: Tick,
  opts: { highScore?: number; rng?: RandomGenerator } = {},
): { state: GameState; events: ReadonlyArray<DomainEvent> } {
  return { events: [], state: mkInitialState(cfg, startTick, opts) };
}

/**
 * One deterministic tick of dtMs. Applies commands, advances timers and
 * physics, then resolves locks, cascades and spawns.
 */
export function step(
  state: GameState,
  cmds: ReadonlyArray<Command>,
  dtMs: DurationMs,
): { state: GameState; events: ReadonlyArray<DomainEvent> } {
  if (state.status === "gameOver") {
    return { events: [], state };
  }

  const a = applyCommands(state, cmds);
  const t = advanceTimers(a.state, dtMs);
  const b = advancePhysics(t.state, a.sideEffects, dtMs);
  const c = resolveTransitions(b.state, b.sideEffects, dtMs);
  const events = [...a.events, ...t.events, ...b.events, ...c.events];

  // Increment tick at the end of the step
  const finalState = { ...c.state, tick: incrementTick(c.state.tick) };

  return { events, state: finalState };
}

/**
 * Advance multiple ticks of equal length with per-tick command buckets.
 */
export function stepN(
  state: GameState,
  byTick: ReadonlyArray<ReadonlyArray<Command>>,
  dtMs: DurationMs,
): { state: GameState; events: ReadonlyArray<DomainEvent> } {
  let s = state;
  const all: Array<DomainEvent> = [];
  for (const cmds of byTick) {
    const r = step(s, cmds, dtMs);
    s = r.state;
    all.push(...r.events);
  }
  return { events: all, state: s };
}

// Public surface for hosts
export * from "./selectors";
export { createEngineConfig, DEFAULT_CONFIG } from "./config";
export { createSeededRng } from "./core/rng/seeded";
export { asTick } from "./utils/tick";
export type { Command, CommandKind } from "./commands";
export type { DomainEvent, DomainEventKind } from "./events";
export type { PowerUpKind } from "./powerups/types";
export type {
  EngineConfig,
  GameState,
  GameStatus,
  RandomGenerator,
  Tick,
} from "./types";
