import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { loadSettings, parseSettings } from "@/app/settings";

describe("@/app/settings — parseSettings", () => {
  test("keeps known, well-typed keys", () => {
    expect(
      parseSettings({
        lockDelayMs: 300,
        rngSeed: "seed-a",
        rowMultipliers: [1, 2],
        valueWeights: [{ value: 2, weight: 1 }],
        width: 12,
      }),
    ).toEqual({
      lockDelayMs: 300,
      rngSeed: "seed-a",
      rowMultipliers: [1, 2],
      valueWeights: [{ value: 2, weight: 1 }],
      width: 12,
    });
  });

  test("skips unknown keys and mistyped values", () => {
    expect(
      parseSettings({
        bogus: true,
        height: "tall",
        mergePassDelayMs: -5,
        rngSeed: "",
        rowMultipliers: [],
        valueWeights: [{ value: 2 }],
      }),
    ).toEqual({});
  });

  test("non-objects yield no overrides", () => {
    expect(parseSettings(null)).toEqual({});
    expect(parseSettings([1, 2])).toEqual({});
    expect(parseSettings("lockDelayMs=3")).toEqual({});
  });
});

describe("@/app/settings — loadSettings", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "mergefall-settings-"));
  });

  afterEach(() => {
    rmSync(dir, { force: true, recursive: true });
  });

  test("reads a settings file", () => {
    const path = join(dir, "settings.json");
    writeFileSync(path, '{"softDropFactor": 20}', "utf8");
    expect(loadSettings(path)).toEqual({ softDropFactor: 20 });
  });

  test("a missing or malformed file gives no overrides", () => {
    const broken = join(dir, "broken.json");
    writeFileSync(broken, "{", "utf8");
    expect(loadSettings(broken)).toEqual({});
    expect(loadSettings(join(dir, "missing.json"))).toEqual({});
  });
});
