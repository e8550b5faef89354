import type { Tick } from "../types";

/**
 * Type-safe helpers for the branded Tick counter.
 */

/**
 * Increments a tick by 1. Used for advancing time in the engine.
 */
export function incrementTick(tick: Tick): Tick {
  return (tick + 1) as Tick;
}

/**
 * Converts a raw number to a branded Tick type.
 * Should only be used at system boundaries (initialization, parsing).
 */
export function asTick(n: number): Tick {
  if (!Number.isInteger(n) || n < 0) {
    throw new Error("Tick must be a non-negative integer");
  }
  return n as Tick;
}
