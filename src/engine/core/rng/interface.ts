/**
 * Interface for the engine's random source.
 * Implementations are immutable: each draw returns the value and a new
 * generator, so a GameState snapshot always replays the same future.
 */
export type RandomGenerator = {
  /** Uniform float in [0, 1) plus the advanced generator. */
  nextFloat(): {
    value: number;
    newRng: RandomGenerator;
  };
};
