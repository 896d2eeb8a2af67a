// Lightweight, opt-in debug logging utilities for the engine and tests

// Topics can be enabled via:
// - the SWAPFALL_DEBUG environment variable with values "true", "1", "on", or a comma list of topics
//   e.g. SWAPFALL_DEBUG=match,chain,invariants npm test
// - setDebugTopics(["match"]) at runtime; setDebugTopics(null) defers to the environment again

const ENV_KEY = "SWAPFALL_DEBUG";

let topicOverride: ReadonlyArray<string> | null = null;

function parseTopics(raw: string | undefined): ReadonlyArray<string> {
  if (raw === undefined) return [];
  const v = raw.trim().toLowerCase();
  if (v === "1" || v === "true" || v === "on") return ["*"];
  return v
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function activeTopics(): ReadonlyArray<string> {
  if (topicOverride !== null) return topicOverride;
  return parseTopics(process.env[ENV_KEY]);
}

export function setDebugTopics(topics: ReadonlyArray<string> | null): void {
  topicOverride = topics === null ? null : topics.map((t) => t.toLowerCase());
}

export function isDebugEnabled(topic?: string): boolean {
  const topics = activeTopics();
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
