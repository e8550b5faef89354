// Lightweight, opt-in debug logging utilities for the engine + tests

// Topics are enabled through the MERGEFALL_DEBUG environment variable:
// - "1", "true" or "on" enables every topic
// - a comma list enables just those, e.g. MERGEFALL_DEBUG=cascade,powerups

export const DEBUG_ENV_KEY = "MERGEFALL_DEBUG" as const;

function readEnvTopics(): ReadonlyArray<string> {
  const raw = process.env[DEBUG_ENV_KEY];
  if (raw === undefined) return [];
  const v = raw.trim().toLowerCase();
  if (v === "1" || v === "true" || v === "on") return ["*"];
  return v
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export function isDebugEnabled(topic?: string): boolean {
  const topics = readEnvTopics();
  if (topics.length === 0) return false;
  if (topics.includes("*")) return true;
  if (topic !== undefined) return topics.includes(topic);
  return true;
}

export function debugLog(topic: string, message: string, data?: unknown): void {
  if (!isDebugEnabled(topic)) return;
  if (data !== undefined) {
    console.warn(`[DBG:${topic}] ${message}`, data);
  } else {
    console.warn(`[DBG:${topic}] ${message}`);
  }
}

// Always written: conditions the engine recovers from but callers should see
export function warnLog(topic: string, message: string, data?: unknown): void {
  if (data !== undefined) {
    console.warn(`[WARN:${topic}] ${message}`, data);
  } else {
    console.warn(`[WARN:${topic}] ${message}`);
  }
}
