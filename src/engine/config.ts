import { type DurationMs, createDurationMs } from "../types/brands";

import { BOARD_HEIGHT, BOARD_WIDTH, isCellValue } from "./core/types";

import type { Weighted } from "./core/rng/draw";

export type EngineConfig = Readonly<{
  width: number;
  height: number;
  spawnX: number;
  spawnY: number;
  valueWeights: ReadonlyArray<Weighted<number>>;
  rngSeed: string;

  // Piece timing
  lockDelayMs: DurationMs;
  baseDropIntervalMs: DurationMs;
  minDropIntervalMs: DurationMs;
  dropIntervalStepMs: DurationMs;
  softDropFactor: number;
  hardDropPointsPerCell: number;

  // Merging and combos
  mergePassDelayMs: DurationMs;
  maxMergeIterations: number;
  mergeComboFactor: number;
  comboWindowMs: DurationMs;
  comboEndBonusPerMerge: number;

  // Rows and levels
  scorePerRow: number;
  rowMultipliers: ReadonlyArray<number>;
  rowComboFactor: number;
  levelScoreFactor: number;
  scorePerLevel: number;
  startingLevel: number;
  maxLevel: number;
  linesPerLevel: number;

  // Power-ups
  powerUpSpawnChance: number;
  minRowsForPowerUp: number;
  powerUpDurationMs: DurationMs;
  slowDownDurationFactor: number;
  slowDownMultiplier: number;
}>;

export const DEFAULT_CONFIG: EngineConfig = {
  baseDropIntervalMs: createDurationMs(1000),
  comboEndBonusPerMerge: 50,
  comboWindowMs: createDurationMs(2000),
  dropIntervalStepMs: createDurationMs(50),
  hardDropPointsPerCell: 2,
  height: BOARD_HEIGHT,
  levelScoreFactor: 0.1,
  linesPerLevel: 10,
  lockDelayMs: createDurationMs(500),
  maxLevel: 20,
  maxMergeIterations: 100,
  mergeComboFactor: 0.5,
  mergePassDelayMs: createDurationMs(100),
  minDropIntervalMs: createDurationMs(50),
  minRowsForPowerUp: 3,
  powerUpDurationMs: createDurationMs(5000),
  powerUpSpawnChance: 0.1,
  rngSeed: "mergefall",
  rowComboFactor: 0.25,
  rowMultipliers: [1, 3, 5, 8],
  scorePerLevel: 1000,
  scorePerRow: 100,
  slowDownDurationFactor: 2,
  slowDownMultiplier: 0.5,
  softDropFactor: 10,
  spawnX: 4,
  spawnY: 18,
  startingLevel: 1,
  valueWeights: [
    { value: 2, weight: 3 },
    { value: 4, weight: 2 },
    { value: 8, weight: 1 },
  ],
  width: BOARD_WIDTH,
};

function fail(message: string): never {
  throw new Error(`Invalid engine config: ${message}`);
}

function requireInteger(name: string, n: number, min: number): void {
  if (!Number.isInteger(n) || n < min) {
    fail(`${name} must be an integer >= ${String(min)}, got ${String(n)}`);
  }
}

function requirePositive(name: string, n: number): void {
  if (!Number.isFinite(n) || n <= 0) {
    fail(`${name} must be a positive number, got ${String(n)}`);
  }
}

function requireNonNegative(name: string, n: number): void {
  if (!Number.isFinite(n) || n < 0) {
    fail(`${name} must be a non-negative number, got ${String(n)}`);
  }
}

export function validateEngineConfig(cfg: EngineConfig): EngineConfig {
  requireInteger("width", cfg.width, 4);
  requireInteger("height", cfg.height, 4);
  requireInteger("spawnX", cfg.spawnX, 0);
  requireInteger("spawnY", cfg.spawnY, 0);
  if (cfg.spawnX >= cfg.width || cfg.spawnY >= cfg.height) {
    fail("spawn anchor must lie inside the board");
  }

  if (!cfg.valueWeights.some((w) => w.weight > 0)) {
    fail("valueWeights needs at least one positive weight");
  }
  for (const w of cfg.valueWeights) {
    if (!isCellValue(w.value)) {
      fail(`value ${String(w.value)} is not a power of two >= 2`);
    }
    requireNonNegative("value weight", w.weight);
  }

  requirePositive("baseDropIntervalMs", cfg.baseDropIntervalMs);
  requirePositive("minDropIntervalMs", cfg.minDropIntervalMs);
  requireNonNegative("dropIntervalStepMs", cfg.dropIntervalStepMs);
  requireNonNegative("lockDelayMs", cfg.lockDelayMs);
  requirePositive("softDropFactor", cfg.softDropFactor);
  requireNonNegative("hardDropPointsPerCell", cfg.hardDropPointsPerCell);

  requireNonNegative("mergePassDelayMs", cfg.mergePassDelayMs);
  requireInteger("maxMergeIterations", cfg.maxMergeIterations, 1);
  requireNonNegative("mergeComboFactor", cfg.mergeComboFactor);
  requireNonNegative("comboWindowMs", cfg.comboWindowMs);
  requireNonNegative("comboEndBonusPerMerge", cfg.comboEndBonusPerMerge);

  requireNonNegative("scorePerRow", cfg.scorePerRow);
  if (cfg.rowMultipliers.length === 0) fail("rowMultipliers is empty");
  requireNonNegative("rowComboFactor", cfg.rowComboFactor);
  requireNonNegative("levelScoreFactor", cfg.levelScoreFactor);
  requireNonNegative("scorePerLevel", cfg.scorePerLevel);
  requireInteger("startingLevel", cfg.startingLevel, 1);
  requireInteger("maxLevel", cfg.maxLevel, cfg.startingLevel);
  requireInteger("linesPerLevel", cfg.linesPerLevel, 1);

  if (cfg.powerUpSpawnChance < 0 || cfg.powerUpSpawnChance > 1) {
    fail("powerUpSpawnChance must be within [0, 1]");
  }
  requireInteger("minRowsForPowerUp", cfg.minRowsForPowerUp, 1);
  requireNonNegative("powerUpDurationMs", cfg.powerUpDurationMs);
  requireNonNegative("slowDownDurationFactor", cfg.slowDownDurationFactor);
  requirePositive("slowDownMultiplier", cfg.slowDownMultiplier);
  if (cfg.rngSeed.length === 0) fail("rngSeed must not be empty");
  return cfg;
}

/**
 * Merge overrides onto the defaults and validate the result.
 * Throws on configurations the engine cannot run with.
 */
export function createEngineConfig(
  overrides: Partial<EngineConfig> = {},
): EngineConfig {
  return validateEngineConfig({ ...DEFAULT_CONFIG, ...overrides });
}
