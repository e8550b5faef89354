import { createEngineConfig } from "../engine/config";
import { init, step } from "../engine/index";
import { asTick } from "../engine/utils/tick";
import { createDurationMs } from "../types/brands";
import { debugLog } from "../utils/debug";

import { type HighScoreStore, MemoryHighScoreStore } from "./high-score";
import { LifecycleController, type LifecycleState } from "./lifecycle.machine";
import { FixedStepClock } from "./loop";

import type { Command } from "../engine/commands";
import type { DomainEvent } from "../engine/events";
import type { EngineConfig, GameState } from "../engine/types";

export type SessionOptions = {
  config?: Partial<EngineConfig>;
  store?: HighScoreStore;
  tickHz?: number;
  maxStepsPerAdvance?: number;
};

/**
 * Stateful host around the pure engine: queues input requests, runs fixed
 * steps from wall-clock deltas and persists the high score.
 * Requests are accepted only while the lifecycle allows them.
 */
export class GameSession {
  private engine: GameState;
  private pending: Array<Command> = [];
  private games = 0;
  private readonly cfg: EngineConfig;
  private readonly store: HighScoreStore;
  private readonly clock: FixedStepClock;
  private readonly lifecycleCtl: LifecycleController;

  constructor(opts: SessionOptions = {}) {
    this.cfg = createEngineConfig(opts.config);
    this.store = opts.store ?? new MemoryHighScoreStore();
    this.clock = FixedStepClock.fromHz(
      opts.tickHz ?? 60,
      opts.maxStepsPerAdvance,
    );
    this.engine = this.freshEngine(1);
    this.lifecycleCtl = new LifecycleController(() => {
      this.beginGame();
    });
  }

  get state(): GameState {
    return this.engine;
  }

  get lifecycle(): LifecycleState {
    return this.lifecycleCtl.state;
  }

  get gamesStarted(): number {
    return this.lifecycleCtl.gamesStarted;
  }

  start(): boolean {
    return this.lifecycleCtl.send({ type: "START" });
  }

  restart(): boolean {
    return this.lifecycleCtl.send({ type: "RESTART" });
  }

  requestMove(direction: "left" | "right"): boolean {
    return this.enqueue({
      kind: direction === "left" ? "MoveLeft" : "MoveRight",
    });
  }

  requestRotate(): boolean {
    return this.enqueue({ kind: "RotateCW" });
  }

  requestSoftDrop(enabled: boolean): boolean {
    return this.enqueue({ kind: enabled ? "SoftDropOn" : "SoftDropOff" });
  }

  requestHardDrop(): boolean {
    return this.enqueue({ kind: "HardDrop" });
  }

  requestPowerUp(): boolean {
    return this.enqueue({ kind: "ActivatePowerUp" });
  }

  requestPause(): boolean {
    if (!this.lifecycleCtl.send({ type: "PAUSE" })) return false;
    this.pending.push({ kind: "Pause" });
    return true;
  }

  requestResume(): boolean {
    if (!this.lifecycleCtl.send({ type: "RESUME" })) return false;
    this.pending.push({ kind: "Resume" });
    return true;
  }

  togglePause(): boolean {
    return this.lifecycle === "paused"
      ? this.requestResume()
      : this.requestPause();
  }

  /**
   * Feed wall-clock time. Queued requests go into the first step that runs;
   * a paused game still steps so a running cascade can settle.
   */
  advance(elapsedMs: number): ReadonlyArray<DomainEvent> {
    if (this.lifecycle !== "playing" && this.lifecycle !== "paused") return [];

    const steps = this.clock.advance(elapsedMs);
    const dtMs = createDurationMs(this.clock.stepMs);
    const events: Array<DomainEvent> = [];

    for (let i = 0; i < steps; i++) {
      const cmds = this.pending;
      this.pending = [];
      const r = step(this.engine, cmds, dtMs);
      this.engine = r.state;
      events.push(...r.events);

      if (this.engine.status === "gameOver") {
        this.store.save(this.engine.scoring.highScore);
        this.lifecycleCtl.send({ type: "GAME_OVER" });
        break;
      }
    }
    return events;
  }

  // Piece input only reaches the engine while the lifecycle is playing
  private enqueue(cmd: Command): boolean {
    if (this.lifecycle !== "playing") return false;
    this.pending.push(cmd);
    return true;
  }

  private beginGame(): void {
    this.store.save(this.engine.scoring.highScore);
    this.games++;
    this.engine = this.freshEngine(this.games);
    this.pending = [];
    this.clock.reset();
    debugLog("lifecycle", `game ${String(this.games)} started`);
  }

  // Game n > 1 derives its seed from the configured one
  private freshEngine(game: number): GameState {
    const rngSeed =
      game <= 1 ? this.cfg.rngSeed : `${this.cfg.rngSeed}#${String(game)}`;
    return init({ ...this.cfg, rngSeed }, asTick(0), {
      highScore: this.store.load(),
    }).state;
  }
}
