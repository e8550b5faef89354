/*
 * Session lifecycle state machine (robot3)
 *
 * ready ──START──▶ playing ◀──RESUME── paused
 *                    │  └────PAUSE────▶  │
 *                 GAME_OVER           GAME_OVER
 *                    ▼                   ▼
 *                 gameOver ──RESTART──▶ playing
 *
 * RESTART is also accepted from playing and paused. The context only counts
 * the games begun in this session.
 */

import {
  action,
  createMachine,
  interpret,
  reduce,
  state,
  transition,
} from "robot3";

import type { MachineState, MachineStates, Machine, Service } from "robot3";

export type LifecycleState = "ready" | "playing" | "paused" | "gameOver";

export type LifecycleContext = {
  gamesStarted: number;
};

export type LifecycleEvent =
  | { type: "START" }
  | { type: "PAUSE" }
  | { type: "RESUME" }
  | { type: "GAME_OVER" }
  | { type: "RESTART" };

type LifecycleEventType = LifecycleEvent["type"];
type LifecycleStatesObject = Record<
  LifecycleState,
  MachineState<LifecycleEventType>
>;
export type LifecycleMachine = Machine<
  LifecycleStatesObject,
  LifecycleContext,
  LifecycleState,
  LifecycleEventType
>;

// Reducer: a new game begins (START or RESTART)
export const countGame = (ctx: LifecycleContext): LifecycleContext => ({
  ...ctx,
  gamesStarted: ctx.gamesStarted + 1,
});

export const createLifecycleMachine = (
  onGameBegin?: () => void,
): LifecycleMachine => {
  const begin = (): void => {
    onGameBegin?.();
  };

  const ready: MachineState<LifecycleEventType> = state(
    transition("START", "playing", reduce(countGame), action(begin)),
  );
  const playing: MachineState<LifecycleEventType> = state(
    transition("PAUSE", "paused"),
    transition("GAME_OVER", "gameOver"),
    transition("RESTART", "playing", reduce(countGame), action(begin)),
  );
  const paused: MachineState<LifecycleEventType> = state(
    transition("RESUME", "playing"),
    transition("GAME_OVER", "gameOver"),
    transition("RESTART", "playing", reduce(countGame), action(begin)),
  );
  const gameOver: MachineState<LifecycleEventType> = state(
    transition("RESTART", "playing", reduce(countGame), action(begin)),
  );

  const states: LifecycleStatesObject = { gameOver, paused, playing, ready };

  // robot3 widens the event type to `string`; cast back to the typed machine
  return createMachine(
    "ready" as const,
    states as unknown as MachineStates<
      LifecycleStatesObject,
      LifecycleEventType
    >,
    (): LifecycleContext => ({ gamesStarted: 0 }),
  ) as unknown as LifecycleMachine;
};

type LifecycleService = Service<LifecycleMachine>;

/**
 * Thin wrapper around the robot3 service. `send` reports whether the event
 * was accepted (i.e. the machine moved or re-entered a state).
 */
export class LifecycleController {
  private service: LifecycleService;
  private currentStateName: LifecycleState = "ready";
  private changed = false;

  constructor(onGameBegin?: () => void) {
    const machine = createLifecycleMachine(onGameBegin);
    this.service = interpret(machine, (service) => {
      // onChange only fires for accepted transitions
      this.currentStateName = service.machine.state.name;
      this.changed = true;
    });
  }

  send(event: LifecycleEvent): boolean {
    this.changed = false;
    this.service.send(event);
    return this.changed;
  }

  get state(): LifecycleState {
    return this.currentStateName;
  }

  get gamesStarted(): number {
    return this.service.context.gamesStarted;
  }
}
