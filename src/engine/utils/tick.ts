import type { Tick, TickDelta } from "../types";

/**
 * Type-safe utilities for working with branded Tick types.
 * These are the only allowed operations on Tick values so that ticks and
 * tick deltas never mix.
 */

/**
 * Adds a TickDelta to a Tick. Used at system boundaries where arithmetic is
 * necessary.
 */
export function addTicks(baseTick: Tick, deltaTicks: TickDelta): Tick {
  return (baseTick + deltaTicks) as Tick;
}

/** Increments a tick by 1. Used for advancing time in the engine. */
export function incrementTick(tick: Tick): Tick {
  return (tick + 1) as Tick;
}

/** Checks if tick is at or after the deadline. */
export function isTickAfterOrEqual(tick: Tick, deadline: Tick): boolean {
  return tick >= deadline;
}

/**
 * Converts a raw number to a Tick.
 * Should only be used at system boundaries (initialization, parsing).
 */
export function asTick(n: number): Tick {
  return n as Tick;
}

/** Create a TickDelta from a raw number at configuration boundaries. */
export function asTickDelta(ticks: number): TickDelta {
  return ticks as TickDelta;
}

/** Multiplies a delay, e.g. a per-block despawn time by the blocks cleared. */
export function scaleTicks(delta: TickDelta, factor: number): TickDelta {
  return (delta * factor) as TickDelta;
}
