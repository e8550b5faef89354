/**
 * Fixed-timestep accumulator: converts wall-clock deltas into a whole number
 * of engine steps. Time beyond `maxStepsPerAdvance` steps is dropped so a
 * long stall does not trigger a burst of catch-up ticks.
 */
export class FixedStepClock {
  private accumulatorMs = 0;

  constructor(
    readonly stepMs: number,
    readonly maxStepsPerAdvance = 10,
  ) {
    if (!Number.isFinite(stepMs) || stepMs <= 0) {
      throw new Error("stepMs must be a positive number");
    }
    if (!Number.isInteger(maxStepsPerAdvance) || maxStepsPerAdvance < 1) {
      throw new Error("maxStepsPerAdvance must be a positive integer");
    }
  }

  static fromHz(tickHz: number, maxStepsPerAdvance?: number): FixedStepClock {
    return new FixedStepClock(1000 / tickHz, maxStepsPerAdvance);
  }

  /** Number of steps to run for this delta. */
  advance(elapsedMs: number): number {
    if (!Number.isFinite(elapsedMs) || elapsedMs <= 0) return 0;
    this.accumulatorMs += elapsedMs;
    const steps = Math.floor(this.accumulatorMs / this.stepMs);
    if (steps > this.maxStepsPerAdvance) {
      this.accumulatorMs = 0;
      return this.maxStepsPerAdvance;
    }
    this.accumulatorMs -= steps * this.stepMs;
    return steps;
  }

  get pendingMs(): number {
    return this.accumulatorMs;
  }

  reset(): void {
    this.accumulatorMs = 0;
  }
}
