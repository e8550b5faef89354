import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";

import { debugLog } from "../utils/debug";

/** Where the best score survives between sessions. */
export type HighScoreStore = {
  load(): number;
  save(highScore: number): void;
};

export class MemoryHighScoreStore implements HighScoreStore {
  constructor(private highScore = 0) {}

  load(): number {
    return this.highScore;
  }

  save(highScore: number): void {
    this.highScore = Math.max(this.highScore, highScore);
  }
}

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null;
}

function isScore(x: unknown): x is number {
  return typeof x === "number" && Number.isFinite(x) && x >= 0;
}

/**
 * JSON file store: `{ "highScore": number }`. A missing or unreadable file
 * loads as 0; saving never lowers the stored value.
 */
export class FileHighScoreStore implements HighScoreStore {
  constructor(private readonly path: string) {}

  load(): number {
    if (!existsSync(this.path)) return 0;
    try {
      const parsed: unknown = JSON.parse(readFileSync(this.path, "utf8"));
      if (isRecord(parsed) && isScore(parsed["highScore"])) {
        return parsed["highScore"];
      }
    } catch (err) {
      debugLog("highscore", `unreadable high score file ${this.path}`, err);
    }
    return 0;
  }

  save(highScore: number): void {
    const best = Math.max(this.load(), highScore);
    mkdirSync(dirname(this.path), { recursive: true });
    const body = `${JSON.stringify({ highScore: best })}\n`;
    writeFileSync(this.path, body, "utf8");
  }
}
