// Settings file: JSON overrides for the engine config, loaded with type guards.
// Unknown keys and mistyped values are skipped; a missing or malformed file
// yields no overrides.

import { readFileSync } from "node:fs";

import { isDurationMs } from "../types/brands";
import { debugLog } from "../utils/debug";

import type { EngineConfig } from "../engine/config";

type Overrides = { -readonly [K in keyof EngineConfig]?: EngineConfig[K] };

const DURATION_KEYS = [
  "lockDelayMs",
  "baseDropIntervalMs",
  "minDropIntervalMs",
  "dropIntervalStepMs",
  "mergePassDelayMs",
  "comboWindowMs",
  "powerUpDurationMs",
] as const satisfies ReadonlyArray<keyof EngineConfig>;

const NUMBER_KEYS = [
  "width",
  "height",
  "spawnX",
  "spawnY",
  "softDropFactor",
  "hardDropPointsPerCell",
  "maxMergeIterations",
  "mergeComboFactor",
  "comboEndBonusPerMerge",
  "scorePerRow",
  "rowComboFactor",
  "levelScoreFactor",
  "scorePerLevel",
  "startingLevel",
  "maxLevel",
  "linesPerLevel",
  "powerUpSpawnChance",
  "minRowsForPowerUp",
  "slowDownDurationFactor",
  "slowDownMultiplier",
] as const satisfies ReadonlyArray<keyof EngineConfig>;

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function isNumber(x: unknown): x is number {
  return typeof x === "number" && Number.isFinite(x);
}

function isString(x: unknown): x is string {
  return typeof x === "string";
}

function coerceWeights(
  u: unknown,
): ReadonlyArray<{ value: number; weight: number }> | undefined {
  if (!Array.isArray(u)) return undefined;
  const out: Array<{ value: number; weight: number }> = [];
  for (const entry of u) {
    if (!isRecord(entry)) return undefined;
    const { value, weight } = entry;
    if (!isNumber(value) || !isNumber(weight)) return undefined;
    out.push({ value, weight });
  }
  return out.length > 0 ? out : undefined;
}

function coerceMultipliers(u: unknown): ReadonlyArray<number> | undefined {
  if (!Array.isArray(u) || u.length === 0) return undefined;
  const out: Array<number> = [];
  for (const v of u) {
    if (!isNumber(v)) return undefined;
    out.push(v);
  }
  return out;
}

export function parseSettings(raw: unknown): Partial<EngineConfig> {
  if (!isRecord(raw)) return {};
  const out: Overrides = {};

  for (const k of DURATION_KEYS) {
    const v = raw[k];
    if (isDurationMs(v)) out[k] = v;
  }
  for (const k of NUMBER_KEYS) {
    const v = raw[k];
    if (isNumber(v)) out[k] = v;
  }

  const seed = raw["rngSeed"];
  if (isString(seed) && seed.length > 0) out.rngSeed = seed;
  const weights = coerceWeights(raw["valueWeights"]);
  if (weights !== undefined) out.valueWeights = weights;
  const multipliers = coerceMultipliers(raw["rowMultipliers"]);
  if (multipliers !== undefined) out.rowMultipliers = multipliers;

  return out;
}

export function loadSettings(path: string): Partial<EngineConfig> {
  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (err) {
    debugLog("settings", `no settings at ${path}`, err);
    return {};
  }
  try {
    return parseSettings(JSON.parse(text));
  } catch (err) {
    debugLog("settings", `malformed settings at ${path}`, err);
    return {};
  }
}
