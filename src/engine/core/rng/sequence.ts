import type { RandomGenerator } from "./interface";

/**
 * RNG that yields a fixed sequence of floats in [0, 1) and then repeats.
 * Each call returns a new RNG instance with advanced index (immutable style).
 */
export class SequenceRng implements RandomGenerator {
  constructor(
    private readonly sequence: ReadonlyArray<number>,
    private readonly index = 0,
  ) {
    if (sequence.length === 0) throw new Error("Sequence must not be empty");
    if (sequence.some((v) => v < 0 || v >= 1)) {
      throw new Error("Sequence values must be in [0, 1)");
    }
  }

  nextFloat(): { value: number; newRng: RandomGenerator } {
    const value = this.sequence[this.index];
    if (value === undefined) throw new Error("Sequence index out of bounds");
    const nextIndex = (this.index + 1) % this.sequence.length;
    return { newRng: new SequenceRng(this.sequence, nextIndex), value };
  }
}
