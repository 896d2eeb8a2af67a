import { isDebugEnabled } from "../utils/debug";

import { assertGridInvariants } from "./invariants";
import { advancePhysics } from "./step/advance-physics";
import { applyCommands } from "./step/apply-commands";
import { resolveTransitions } from "./step/resolve-transitions";
import { mkInitialState } from "./types";
import { incrementTick } from "./utils/tick";

import type { Command } from "./commands";
import type { DomainEvent } from "./events";
import type { EngineConfig, GameState, Tick } from "./types";

/**
 * Initialize an empty playfield at the given starting tick.
 */
export function init(
  cfg: EngineConfig,
  startTick: Tick,
): { state: GameState; events: ReadonlyArray<DomainEvent> } {
  return { events: [], state: mkInitialState(cfg, startTick) };
}

/**
 * One deterministic tick. Applies commands, advances physics, resolves transitions.
 * Engine owns time - uses state.tick internally and increments it.
 */
export function step(
  state: GameState,
  cmds: ReadonlyArray<Command>,
): { state: GameState; events: ReadonlyArray<DomainEvent> } {
  const a = applyCommands(state, cmds);
  const b = advancePhysics(a.state);
  const c = resolveTransitions(b.state);
  const events = [...a.events, ...b.events, ...c.events];

  if (isDebugEnabled("invariants")) assertGridInvariants(c.state);

  const finalState = { ...c.state, tick: incrementTick(c.state.tick) };

  return { events, state: finalState };
}

/**
 * Advance multiple ticks with per-tick command buckets.
 */
export function stepN(
  state: GameState,
  byTick: ReadonlyArray<ReadonlyArray<Command>>,
): { state: GameState; events: ReadonlyArray<DomainEvent> } {
  let s = state;
  const all: Array<DomainEvent> = [];
  for (const cmds of byTick) {
    const r = step(s, cmds);
    s = r.state;
    all.push(...r.events);
  }
  return { events: all, state: s };
}
