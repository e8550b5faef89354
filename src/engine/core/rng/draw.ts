import { type RandomGenerator } from "./interface";

// Uniform integer in [0, maxExclusive)
export function nextInt(
  rng: RandomGenerator,
  maxExclusive: number,
): { value: number; newRng: RandomGenerator } {
  if (!Number.isInteger(maxExclusive) || maxExclusive <= 0) {
    throw new Error("nextInt: maxExclusive must be a positive integer");
  }
  const r = rng.nextFloat();
  return {
    newRng: r.newRng,
    value: Math.min(maxExclusive - 1, Math.floor(r.value * maxExclusive)),
  };
}

export function pickUniform<T>(
  rng: RandomGenerator,
  items: ReadonlyArray<T>,
): { value: T; newRng: RandomGenerator } {
  const r = nextInt(rng, items.length);
  const value = items[r.value];
  if (value === undefined) throw new Error("pickUniform: empty list");
  return { newRng: r.newRng, value };
}

export type Weighted<T> = Readonly<{ value: T; weight: number }>;

// Picks by cumulative weight; entries with weight <= 0 never win
export function pickWeighted<T>(
  rng: RandomGenerator,
  entries: ReadonlyArray<Weighted<T>>,
): { value: T; newRng: RandomGenerator } {
  const positive = entries.filter((e) => e.weight > 0);
  const total = positive.reduce((sum, e) => sum + e.weight, 0);
  const last = positive[positive.length - 1];
  if (last === undefined) throw new Error("pickWeighted: no positive weight");

  const r = rng.nextFloat();
  let roll = r.value * total;
  for (const entry of positive) {
    if (roll < entry.weight) return { newRng: r.newRng, value: entry.value };
    roll -= entry.weight;
  }
  return { newRng: r.newRng, value: last.value };
}
