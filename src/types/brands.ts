// Branded primitive types for type safety and domain modeling

// Duration in milliseconds - for time intervals/deltas
declare const DurationMsBrand: unique symbol;
export type DurationMs = number & { readonly [DurationMsBrand]: true };

// DurationMs constructors and guards
export function createDurationMs(value: number): DurationMs {
  if (value < 0 || !Number.isFinite(value)) {
    throw new Error("DurationMs must be a non-negative finite number");
  }
  return value as DurationMs;
}

export function isDurationMs(n: unknown): n is DurationMs {
  return typeof n === "number" && n >= 0 && Number.isFinite(n);
}
