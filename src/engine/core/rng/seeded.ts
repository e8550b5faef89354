import type { RandomGenerator } from "./interface";

// Simple seedable RNG state
export type LcgRngState = {
  seed: string;
  internalSeed: number;
};

// Create initial RNG state
export function createRngState(seed = "default"): LcgRngState {
  return { internalSeed: hashString(seed), seed };
}

// Simple string hash (FNV-1a, 32-bit) for stable seeds
export function hashString(str: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < str.length; i++) {
    h ^= str.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0; // unsigned 32-bit
}

// Simple PRNG (Linear Congruential Generator)
export function nextRandom(seed: number): number {
  return (seed * 1664525 + 1013904223) % 2 ** 32;
}

export function nextFloat(rng: LcgRngState): {
  value: number;
  newRng: LcgRngState;
} {
  const internalSeed = nextRandom(rng.internalSeed);
  return {
    newRng: { ...rng, internalSeed },
    value: (internalSeed >>> 0) / 4294967296,
  };
}

/**
 * Wrapper class that implements RandomGenerator for the LCG state
 */
export class SeededRng implements RandomGenerator {
  constructor(private readonly state: LcgRngState) {}

  nextFloat(): { value: number; newRng: RandomGenerator } {
    const result = nextFloat(this.state);
    return { newRng: new SeededRng(result.newRng), value: result.value };
  }
}

export function createSeededRng(seed = "default"): RandomGenerator {
  return new SeededRng(createRngState(seed));
}
