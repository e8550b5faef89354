import type { ComboState, EngineConfig } from "../types";

// Points for a single merge producing `value` at combo count `combo`
export function mergePoints(
  value: number,
  combo: number,
  cfg: EngineConfig,
): number {
  return Math.round(value * (1 + combo * cfg.mergeComboFactor));
}

/**
 * Advance the combo timer. Once the window since the last merge is exceeded
 * the combo ends; chains longer than one merge earn a bonus.
 */
export function tickCombo(
  combo: ComboState,
  dtMs: number,
  cfg: EngineConfig,
): { combo: ComboState; ended: number | null; bonus: number } {
  const sinceLastMergeMs = combo.sinceLastMergeMs + dtMs;
  if (combo.count === 0 || sinceLastMergeMs <= cfg.comboWindowMs) {
    return { bonus: 0, combo: { ...combo, sinceLastMergeMs }, ended: null };
  }
  const bonus = combo.count > 1 ? combo.count * cfg.comboEndBonusPerMerge : 0;
  return {
    bonus,
    combo: { count: 0, sinceLastMergeMs },
    ended: combo.count > 1 ? combo.count : null,
  };
}
