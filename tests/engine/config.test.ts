import {
  DEFAULT_CONFIG,
  type EngineConfig,
  createEngineConfig,
} from "@/engine/config";

import { ms } from "../test-helpers";

describe("@/engine/config — defaults and overrides", () => {
  test("no overrides gives the defaults", () => {
    expect(createEngineConfig()).toEqual(DEFAULT_CONFIG);
  });

  test("overrides replace single keys", () => {
    const cfg = createEngineConfig({ lockDelayMs: ms(250), width: 8 });
    expect(cfg.lockDelayMs).toBe(250);
    expect(cfg.width).toBe(8);
    expect(cfg.height).toBe(20);
  });

  test("standard board and timing", () => {
    expect(DEFAULT_CONFIG.width).toBe(10);
    expect(DEFAULT_CONFIG.height).toBe(20);
    expect(DEFAULT_CONFIG.lockDelayMs).toBe(500);
    expect(DEFAULT_CONFIG.baseDropIntervalMs).toBe(1000);
  });
});

describe("@/engine/config — validation", () => {
  const cases: Array<[Partial<EngineConfig>, string]> = [
    [{ width: 3 }, "width must be an integer >= 4, got 3"],
    [{ spawnX: 10 }, "spawn anchor must lie inside the board"],
    [{ valueWeights: [{ value: 3, weight: 1 }] }, "value 3 is not a power"],
    [
      { valueWeights: [{ value: 2, weight: 0 }] },
      "valueWeights needs at least one positive weight",
    ],
    [{ maxMergeIterations: 0 }, "maxMergeIterations must be an integer >= 1"],
    [{ rowMultipliers: [] }, "rowMultipliers is empty"],
    [{ powerUpSpawnChance: 2 }, "powerUpSpawnChance must be within [0, 1]"],
    [{ rngSeed: "" }, "rngSeed must not be empty"],
  ];

  test.each(cases)("rejects %j", (overrides, message) => {
    expect(() => createEngineConfig(overrides)).toThrow(
      `Invalid engine config: ${message}`,
    );
  });
});
