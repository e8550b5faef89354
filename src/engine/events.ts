import type { BlockValues, CellValue, Rot, Shape, Tick } from "./types";
import type { PowerUpKind } from "./powerups/types";

export type DomainEvent =
  | { kind: "PieceSpawned"; shape: Shape; values: BlockValues; tick: Tick }
  | {
      kind: "Moved";
      direction: "left" | "right";
      fromX: number;
      toX: number;
      tick: Tick;
    }
  | { kind: "Rotated"; rot: Rot; kick: number; tick: Tick }
  | { kind: "SoftDropToggled"; on: boolean; tick: Tick }
  | { kind: "HardDropped"; cells: number; tick: Tick }
  | { kind: "LockStarted"; tick: Tick }
  | { kind: "LockCancelled"; tick: Tick }
  | {
      kind: "Locked";
      shape: Shape;
      source: "ground" | "hardDrop";
      tick: Tick;
    }
  | {
      kind: "Merged";
      x: number;
      y: number;
      value: CellValue;
      combo: number;
      points: number;
      tick: Tick;
    }
  | { kind: "ComboEnded"; combo: number; bonus: number; tick: Tick }
  | { kind: "CascadeLimitReached"; iterations: number; tick: Tick }
  | {
      kind: "RowsCleared";
      rows: ReadonlyArray<number>;
      combo: number;
      points: number;
      tick: Tick;
    }
  | { kind: "ScoreChanged"; score: number; delta: number; tick: Tick }
  | { kind: "LevelChanged"; level: number; tick: Tick }
  | {
      kind: "LinesChanged";
      linesTowardLevel: number;
      totalLines: number;
      tick: Tick;
    }
  | { kind: "HighScoreChanged"; highScore: number; tick: Tick }
  | { kind: "PowerUpCollected"; powerUp: PowerUpKind; tick: Tick }
  | { kind: "PowerUpActivated"; powerUp: PowerUpKind; tick: Tick }
  | { kind: "PowerUpExpired"; powerUp: PowerUpKind; tick: Tick }
  | { kind: "Paused"; tick: Tick }
  | { kind: "Resumed"; tick: Tick }
  | {
      kind: "GameOver";
      reason: "topRow" | "spawnBlocked";
      score: number;
      tick: Tick;
    };

export type DomainEventKind = DomainEvent["kind"];
