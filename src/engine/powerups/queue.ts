import { nextInt } from "../core/rng/draw";

import {
  type ActiveEffect,
  type PowerUpKind,
  type PowerUpState,
  type TimedPowerUpKind,
  POWER_UP_KINDS,
} from "./types";

import type { EngineConfig } from "../config";
import type { RandomGenerator } from "../core/rng/interface";

export function enqueuePowerUp(
  powerUps: PowerUpState,
  kind: PowerUpKind,
): PowerUpState {
  return { ...powerUps, queue: [...powerUps.queue, kind] };
}

export function dequeuePowerUp(
  powerUps: PowerUpState,
): { kind: PowerUpKind; powerUps: PowerUpState } | null {
  const [kind, ...rest] = powerUps.queue;
  if (kind === undefined) return null;
  return { kind, powerUps: { ...powerUps, queue: rest } };
}

export function effectDurationMs(
  kind: TimedPowerUpKind,
  cfg: EngineConfig,
): number {
  return kind === "SlowDown"
    ? cfg.powerUpDurationMs * cfg.slowDownDurationFactor
    : cfg.powerUpDurationMs;
}

// Re-activating a running effect restarts its timer
export function startTimedEffect(
  powerUps: PowerUpState,
  kind: TimedPowerUpKind,
  cfg: EngineConfig,
): PowerUpState {
  const effect: ActiveEffect = {
    kind,
    remainingMs: effectDurationMs(kind, cfg),
  };
  return {
    ...powerUps,
    active: [...powerUps.active.filter((e) => e.kind !== kind), effect],
  };
}

export function tickEffects(
  powerUps: PowerUpState,
  dtMs: number,
): { powerUps: PowerUpState; expired: ReadonlyArray<TimedPowerUpKind> } {
  if (powerUps.active.length === 0) return { expired: [], powerUps };
  const active: Array<ActiveEffect> = [];
  const expired: Array<TimedPowerUpKind> = [];
  for (const e of powerUps.active) {
    const remainingMs = e.remainingMs - dtMs;
    if (remainingMs <= 0) expired.push(e.kind);
    else active.push({ ...e, remainingMs });
  }
  return { expired, powerUps: { ...powerUps, active } };
}

// Freeze stops gravity outright and wins over SlowDown
export function speedMultiplier(
  powerUps: PowerUpState,
  cfg: EngineConfig,
): number {
  if (powerUps.active.some((e) => e.kind === "Freeze")) return 0;
  if (powerUps.active.some((e) => e.kind === "SlowDown")) {
    return cfg.slowDownMultiplier;
  }
  return 1;
}

/**
 * After a row clear of at least `minRowsForPowerUp` rows, award a random
 * power-up with probability spawnChance * rows. Smaller clears draw nothing.
 */
export function rollPowerUp(
  rng: RandomGenerator,
  rowsCleared: number,
  cfg: EngineConfig,
): { kind: PowerUpKind | null; newRng: RandomGenerator } {
  if (rowsCleared < cfg.minRowsForPowerUp) return { kind: null, newRng: rng };
  const roll = rng.nextFloat();
  if (roll.value >= cfg.powerUpSpawnChance * rowsCleared) {
    return { kind: null, newRng: roll.newRng };
  }
  const pick = nextInt(roll.newRng, POWER_UP_KINDS.length);
  return { kind: POWER_UP_KINDS[pick.value] ?? null, newRng: pick.newRng };
}
