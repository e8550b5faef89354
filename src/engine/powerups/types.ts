export type PowerUpKind =
  | "ClearRow"
  | "Bomb"
  | "Freeze"
  | "SlowDown"
  | "ColorBomb"
  | "Shuffle";

export const POWER_UP_KINDS: ReadonlyArray<PowerUpKind> = [
  "ClearRow",
  "Bomb",
  "Freeze",
  "SlowDown",
  "ColorBomb",
  "Shuffle",
];

export type TimedPowerUpKind = Extract<PowerUpKind, "Freeze" | "SlowDown">;
export type BoardPowerUpKind = Exclude<PowerUpKind, TimedPowerUpKind>;

export function isTimedPowerUp(kind: PowerUpKind): kind is TimedPowerUpKind {
  return kind === "Freeze" || kind === "SlowDown";
}

export type ActiveEffect = Readonly<{
  kind: TimedPowerUpKind;
  remainingMs: number;
}>;

export type PowerUpState = Readonly<{
  // FIFO of collected, not yet used power-ups
  queue: ReadonlyArray<PowerUpKind>;
  active: ReadonlyArray<ActiveEffect>;
}>;

export function emptyPowerUps(): PowerUpState {
  return { active: [], queue: [] };
}
