import { MAX_COLORS } from "./core/types";
import { asTickDelta } from "./utils/tick";

import type { EngineConfig, TickDelta } from "./types";

// Delays at 60 ticks per second
export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  chainMultipliers: [1, 2, 4, 8, 16, 32, 64],
  colorCount: 5,
  despawnTicksPerBlock: asTickDelta(18),
  fallTicksPerRow: asTickDelta(1),
  floatPrepareTicks: asTickDelta(12),
  floatTicks: asTickDelta(1),
  height: 12,
  matchedTicks: asTickDelta(45),
  rngSeed: 0,
  scorePerBlock: 10,
  settleTicks: asTickDelta(4),
  spawnTicks: asTickDelta(6),
  swapTicks: asTickDelta(3),
  width: 6,
};

const DELAY_KEYS = [
  "spawnTicks",
  "floatPrepareTicks",
  "floatTicks",
  "fallTicksPerRow",
  "settleTicks",
  "swapTicks",
  "matchedTicks",
  "despawnTicksPerBlock",
] as const;

type DelayKey = (typeof DELAY_KEYS)[number];

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null;
}

function isNumber(x: unknown): x is number {
  return typeof x === "number" && Number.isFinite(x);
}

function isPositiveInteger(x: number): boolean {
  return Number.isInteger(x) && x >= 1;
}

/** Lists every problem with a config; empty when it is usable. */
export function validateEngineConfig(cfg: EngineConfig): ReadonlyArray<string> {
  const problems: Array<string> = [];
  if (!Number.isInteger(cfg.width) || cfg.width < 2) {
    problems.push(`width must be an integer >= 2, got ${String(cfg.width)}`);
  }
  if (!Number.isInteger(cfg.height) || cfg.height < 1) {
    problems.push(`height must be an integer >= 1, got ${String(cfg.height)}`);
  }
  if (
    !Number.isInteger(cfg.colorCount) ||
    cfg.colorCount < 1 ||
    cfg.colorCount > MAX_COLORS
  ) {
    problems.push(
      `colorCount must be an integer from 1 to ${String(MAX_COLORS)}, got ${String(cfg.colorCount)}`,
    );
  }
  for (const key of DELAY_KEYS) {
    if (!isPositiveInteger(cfg[key])) {
      problems.push(`${key} must be an integer >= 1, got ${String(cfg[key])}`);
    }
  }
  if (!isNumber(cfg.scorePerBlock) || cfg.scorePerBlock < 0) {
    problems.push("scorePerBlock must be a non-negative number");
  }
  if (cfg.chainMultipliers.length === 0) {
    problems.push("chainMultipliers must not be empty");
  }
  cfg.chainMultipliers.forEach((m, i) => {
    const prev = cfg.chainMultipliers[i - 1];
    if (!isNumber(m) || m < 0) {
      problems.push(`chainMultipliers[${String(i)}] must be a non-negative number`);
    } else if (prev !== undefined && m < prev) {
      problems.push("chainMultipliers must be non-decreasing");
    }
  });
  if (!Number.isInteger(cfg.rngSeed)) {
    problems.push("rngSeed must be an integer");
  }
  return problems;
}

/**
 * Builds a config from defaults plus overrides. Throws listing every problem
 * when the result is invalid.
 */
export function createEngineConfig(
  overrides: Partial<EngineConfig> = {},
): EngineConfig {
  const cfg: EngineConfig = { ...DEFAULT_ENGINE_CONFIG, ...overrides };
  const problems = validateEngineConfig(cfg);
  if (problems.length > 0) {
    throw new Error(`Invalid engine config: ${problems.join("; ")}`);
  }
  return cfg;
}

function readDelays(
  rec: Record<string, unknown>,
): Partial<Record<DelayKey, TickDelta>> {
  const out: Partial<Record<DelayKey, TickDelta>> = {};
  for (const key of DELAY_KEYS) {
    const v = rec[key];
    if (isNumber(v)) out[key] = asTickDelta(v);
  }
  return out;
}

/**
 * Reads an untyped record such as parsed JSON. Ill-typed fields fall back to
 * defaults; well-typed but invalid values still throw.
 */
export function loadEngineConfig(raw: unknown): EngineConfig {
  if (!isRecord(raw)) return DEFAULT_ENGINE_CONFIG;

  const { chainMultipliers, colorCount, height, rngSeed, scorePerBlock, width } =
    raw;
  const overrides: Partial<EngineConfig> = {
    ...readDelays(raw),
    ...(isNumber(width) && { width }),
    ...(isNumber(height) && { height }),
    ...(isNumber(colorCount) && { colorCount }),
    ...(isNumber(scorePerBlock) && { scorePerBlock }),
    ...(isNumber(rngSeed) && { rngSeed }),
    ...(Array.isArray(chainMultipliers) &&
      chainMultipliers.every(isNumber) && { chainMultipliers }),
  };
  return createEngineConfig(overrides);
}
