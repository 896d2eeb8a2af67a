import { createSeededColorRng } from "../engine/core/rng/seeded";
import { addTicks, asTickDelta, isTickAfterOrEqual } from "../engine/utils/tick";
import { debugLog } from "../utils/debug";

import type { Command } from "../engine/commands";
import type { ColorRandomGenerator } from "../engine/core/rng/interface";
import type { DomainEvent } from "../engine/events";
import type { EngineConfig, Tick, TickDelta } from "../engine/types";

/**
 * Pure spawn planning: the spawner owns its RNG and schedule, and the
 * runtime feeds it the engine's events so that rejected requests retry.
 */

export type SpawnerConfig = Readonly<{
  intervalTicks: TickDelta;
  seed: string;
}>;

export const DEFAULT_SPAWNER_CONFIG: SpawnerConfig = {
  intervalTicks: asTickDelta(90),
  seed: "default",
};

export type SpawnRequest = Readonly<{ col: number; color: number }>;

export type SpawnerState = Readonly<{
  cfg: SpawnerConfig;
  rng: ColorRandomGenerator;
  nextSpawnTick: Tick;
  pending: SpawnRequest | null;
  // Set once the engine reports a top-out
  stopped: boolean;
}>;

export function createSpawner(
  engineCfg: Pick<EngineConfig, "colorCount">,
  startTick: Tick,
  cfg: SpawnerConfig = DEFAULT_SPAWNER_CONFIG,
  rng?: ColorRandomGenerator,
): SpawnerState {
  if (!Number.isInteger(cfg.intervalTicks) || cfg.intervalTicks < 1) {
    throw new Error("intervalTicks must be an integer >= 1");
  }
  return {
    cfg,
    nextSpawnTick: startTick,
    pending: null,
    rng: rng ?? createSeededColorRng(cfg.seed, engineCfg.colorCount),
    stopped: false,
  };
}

/**
 * Commands to send this tick: the pending request if one is waiting,
 * otherwise a freshly drawn one once the interval has elapsed.
 */
export function planSpawns(
  spawner: SpawnerState,
  tick: Tick,
  width: number,
): { commands: ReadonlyArray<Command>; next: SpawnerState } {
  let s = spawner;
  if (s.stopped) return { commands: [], next: s };
  if (s.pending === null) {
    if (!isTickAfterOrEqual(tick, s.nextSpawnTick)) {
      return { commands: [], next: s };
    }
    const col = s.rng.getNextIndex(width);
    const color = col.newRng.getNextColor();
    s = {
      ...s,
      nextSpawnTick: addTicks(tick, s.cfg.intervalTicks),
      pending: { col: col.index, color: color.color },
      rng: color.newRng,
    };
  }
  const request = s.pending;
  if (request === null) return { commands: [], next: s };
  return {
    commands: [{ col: request.col, color: request.color, kind: "Spawn" }],
    next: s,
  };
}

/**
 * Settles the pending request against the tick's events. An occupied column
 * keeps it pending for a retry next tick; other rejections drop it. A
 * top-out stops the spawner for good.
 */
export function acknowledgeSpawns(
  spawner: SpawnerState,
  events: ReadonlyArray<DomainEvent>,
): SpawnerState {
  if (events.some((e) => e.kind === "ToppedOut")) {
    debugLog("spawner", "stopped after top-out");
    return { ...spawner, pending: null, stopped: true };
  }
  const request = spawner.pending;
  if (request === null) return spawner;
  for (const e of events) {
    if (e.kind === "BlockSpawned" && e.col === request.col) {
      return { ...spawner, pending: null };
    }
    if (e.kind === "SpawnRejected" && e.col === request.col) {
      if (e.reason === "occupied") return spawner;
      debugLog("spawner", `dropping spawn request (${e.reason})`, request);
      return { ...spawner, pending: null };
    }
  }
  return spawner;
}
