export type Command =
  | { kind: "MoveLeft" }
  | { kind: "MoveRight" }
  | { kind: "RotateCW" }
  | { kind: "SoftDropOn" }
  | { kind: "SoftDropOff" }
  | { kind: "HardDrop" }
  | { kind: "Pause" }
  | { kind: "Resume" }
  | { kind: "ActivatePowerUp" };

export type CommandKind = Command["kind"];
