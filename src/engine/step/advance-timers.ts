import { tickEffects } from "../powerups/queue";
import { tickCombo } from "../scoring/combo";
import { addScore } from "../scoring/score";

import type { DomainEvent } from "../events";
import type { GameState } from "../types";

/**
 * Combo window and power-up durations. Both stand still while paused.
 */
export function advanceTimers(
  state: GameState,
  dtMs: number,
): { state: GameState; events: ReadonlyArray<DomainEvent> } {
  if (state.status !== "playing") return { events: [], state };
  const events: Array<DomainEvent> = [];
  let s = state;

  const c = tickCombo(s.combo, dtMs, s.cfg);
  s = { ...s, combo: c.combo };
  if (c.ended !== null) {
    events.push({
      bonus: c.bonus,
      combo: c.ended,
      kind: "ComboEnded",
      tick: s.tick,
    });
    const scored = addScore(s.scoring, c.bonus, s.tick);
    s = { ...s, scoring: scored.scoring };
    events.push(...scored.events);
  }

  const fx = tickEffects(s.powerUps, dtMs);
  s = { ...s, powerUps: fx.powerUps };
  for (const kind of fx.expired) {
    events.push({ kind: "PowerUpExpired", powerUp: kind, tick: s.tick });
  }

  return { events, state: s };
}
