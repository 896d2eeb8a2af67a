import {
  DEFAULT_CONTROL_CONFIG,
  controlStep,
  createControlState,
} from "../control";
import { init, step as engineStep } from "../engine";
import { withStartingStack } from "../engine/ops";
import { asTick } from "../engine/utils/tick";
import {
  DEFAULT_SPAWNER_CONFIG,
  acknowledgeSpawns,
  createSpawner,
  planSpawns,
} from "../spawner/spawn-service";

import type {
  ControlConfig,
  ControlEvent,
  ControlState,
  KeyEdge,
} from "../control/types";
import type { Command } from "../engine/commands";
import type { DomainEvent } from "../engine/events";
import type { EngineOp } from "../engine/ops";
import type { EngineConfig, GameState, Tick } from "../engine/types";
import type { SpawnerConfig, SpawnerState } from "../spawner/spawn-service";

/** Aggregate runtime state the host holds between ticks. */
export type RuntimeState = Readonly<{
  engine: GameState;
  control: ControlState;
  spawner: SpawnerState;
}>;

export type RuntimeTickOutput = Readonly<{
  /** Engine domain events produced this tick. */
  events: ReadonlyArray<DomainEvent>;
  /** Cursor and key telemetry from the control transducer. */
  telemetry: ReadonlyArray<ControlEvent>;
  /** Commands that actually hit the engine this tick (for debugging/recording). */
  commands: ReadonlyArray<Command>;
}>;

export type RuntimeOptions = Readonly<{
  engine: EngineConfig;
  control?: ControlConfig;
  spawner?: SpawnerConfig;
  startTick?: Tick;
  // Rows of triple-free blocks to start with
  startingRows?: number;
}>;

/** Helper to apply pure engine operations in sequence. */
function applyEngineOps(
  s: GameState,
  ops?: ReadonlyArray<EngineOp>,
): GameState {
  let cur = s;
  if (!ops) return cur;
  for (const op of ops) cur = op(cur);
  return cur;
}

export function createRuntime(opts: RuntimeOptions): RuntimeState {
  const startTick = opts.startTick ?? asTick(0);
  const { state } = init(opts.engine, startTick);
  const rows = opts.startingRows ?? 0;
  const engine = rows > 0 ? withStartingStack(rows)(state) : state;
  return {
    control: createControlState(
      { height: engine.grid.height, width: engine.grid.width },
      opts.control ?? DEFAULT_CONTROL_CONFIG,
    ),
    engine,
    spawner: createSpawner(
      opts.engine,
      startTick,
      opts.spawner ?? DEFAULT_SPAWNER_CONFIG,
    ),
  };
}

/**
 * One pure runtime tick:
 *  - consumes device key edges,
 *  - runs the cursor transducer to get Swap commands,
 *  - asks the spawner for Spawn commands (retries first),
 *  - applies optional engine ops, then steps the engine,
 *  - feeds the tick's events back to the spawner.
 *
 * Once the engine has topped out the runtime is halted: the state comes back
 * unchanged and nothing is produced.
 */
export function runtimeStep(
  rs: RuntimeState,
  keyEdgesThisTick: ReadonlyArray<KeyEdge>,
  engineOps?: ReadonlyArray<EngineOp>,
): { state: RuntimeState; out: RuntimeTickOutput } {
  if (rs.engine.toppedOut) {
    return { out: { commands: [], events: [], telemetry: [] }, state: rs };
  }
  // 1) Control transducer
  const c = controlStep(rs.control, rs.engine.tick, keyEdgesThisTick);
  // 2) Spawner
  const sp = planSpawns(rs.spawner, rs.engine.tick, rs.engine.grid.width);
  // 3) Engine ops (pre-step transforms)
  const engine0 = applyEngineOps(rs.engine, engineOps);
  // 4) Engine step, spawns before swaps
  const cmds = [...sp.commands, ...c.commands];
  const r = engineStep(engine0, cmds);
  // 5) Next runtime state
  const next: RuntimeState = {
    control: c.next,
    engine: r.state,
    spawner: acknowledgeSpawns(sp.next, r.events),
  };
  const out: RuntimeTickOutput = {
    commands: cmds,
    events: r.events,
    telemetry: c.telemetry,
  };
  return { out, state: next };
}
