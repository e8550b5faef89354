import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import {
  FileHighScoreStore,
  MemoryHighScoreStore,
} from "@/runtime/high-score";

describe("@/runtime/high-score — memory store", () => {
  test("keeps the best score seen", () => {
    const store = new MemoryHighScoreStore(100);
    store.save(40);
    expect(store.load()).toBe(100);
    store.save(250);
    expect(store.load()).toBe(250);
  });
});

describe("@/runtime/high-score — file store", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "mergefall-"));
  });

  afterEach(() => {
    rmSync(dir, { force: true, recursive: true });
  });

  test("a missing file loads as zero", () => {
    expect(new FileHighScoreStore(join(dir, "none.json")).load()).toBe(0);
  });

  test("saves into nested directories and never lowers the value", () => {
    const path = join(dir, "nested", "highscore.json");
    const store = new FileHighScoreStore(path);
    store.save(120);
    store.save(50);
    expect(store.load()).toBe(120);
    expect(readFileSync(path, "utf8")).toBe('{"highScore":120}\n');
  });

  test("malformed or mistyped files load as zero", () => {
    const broken = join(dir, "broken.json");
    writeFileSync(broken, "{not json", "utf8");
    expect(new FileHighScoreStore(broken).load()).toBe(0);

    const mistyped = join(dir, "mistyped.json");
    writeFileSync(mistyped, '{"highScore":"lots"}', "utf8");
    expect(new FileHighScoreStore(mistyped).load()).toBe(0);
  });
});
