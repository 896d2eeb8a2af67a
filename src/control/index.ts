import { addTicks, asTickDelta, isTickAfterOrEqual } from "../engine/utils/tick";

import type {
  ControlConfig,
  ControlEvent,
  ControlResult,
  ControlState,
  Cursor,
  CursorBounds,
  Direction,
  KeyEdge,
} from "./types";
import type { Command } from "../engine/commands";
import type { Tick } from "../engine/types";

export const DEFAULT_CONTROL_CONFIG: ControlConfig = {
  arrTicks: asTickDelta(4),
  dasTicks: asTickDelta(10),
};

const OFFSETS: Record<Direction, Readonly<{ dc: number; dr: number }>> = {
  Down: { dc: 0, dr: -1 },
  Left: { dc: -1, dr: 0 },
  Right: { dc: 1, dr: 0 },
  Up: { dc: 0, dr: 1 },
};

/** The cursor covers `col` and `col + 1`, so its column stops at width - 2. */
export function clampCursor(bounds: CursorBounds, cursor: Cursor): Cursor {
  return {
    col: Math.min(Math.max(cursor.col, 0), bounds.width - 2),
    row: Math.min(Math.max(cursor.row, 0), bounds.height - 1),
  };
}

export function createControlState(
  bounds: CursorBounds,
  cfg: ControlConfig = DEFAULT_CONTROL_CONFIG,
  cursor?: Cursor,
): ControlState {
  if (bounds.width < 2 || bounds.height < 1) {
    throw new Error(
      "Cursor bounds need a width of at least 2 and a height of at least 1",
    );
  }
  return {
    activeDir: null,
    bounds,
    cfg,
    cursor: clampCursor(
      bounds,
      cursor ?? { col: Math.floor(bounds.width / 2) - 1, row: 0 },
    ),
    dasDeadlineTick: null,
    held: [],
    nextRepeatTick: null,
  };
}

function moveCursor(
  state: ControlState,
  dir: Direction,
  tick: Tick,
  source: "tap" | "repeat" | "edge",
  telemetry: Array<ControlEvent>,
): void {
  const { dc, dr } = OFFSETS[dir];
  // An edge move travels the whole board and stops at the clamp
  const reach =
    source === "edge" ? Math.max(state.bounds.width, state.bounds.height) : 1;
  const from = state.cursor;
  const to = clampCursor(state.bounds, {
    col: from.col + dc * reach,
    row: from.row + dr * reach,
  });
  if (to.col === from.col && to.row === from.row) return;
  state.cursor = to;
  telemetry.push({ dir, from, kind: "CursorMoved", source, tick, to });
}

/**
 * Updates DAS/ARR timing based on current active direction
 */
function updateDasArrTiming(state: ControlState, tick: Tick): void {
  if (state.activeDir !== null) {
    state.dasDeadlineTick = addTicks(tick, state.cfg.dasTicks);
    state.nextRepeatTick =
      state.cfg.arrTicks > 0 ? addTicks(tick, state.cfg.dasTicks) : null;
  } else {
    state.dasDeadlineTick = null;
    state.nextRepeatTick = null;
  }
}

/**
 * Processes a direction key edge
 *
 * Contention semantics: "Last-pressed wins"
 * - A newly pressed direction becomes active and moves the cursor once
 * - Releasing the active direction hands over to the most recent one still held
 */
function processDirectionKey(
  state: ControlState,
  dir: Direction,
  type: "down" | "up",
  tick: Tick,
  telemetry: Array<ControlEvent>,
): void {
  telemetry.push({
    key: dir,
    kind: type === "down" ? "KeyDown" : "KeyUp",
    tick,
  });

  const others = state.held.filter((d) => d !== dir);
  if (type === "down") {
    state.held = [...others, dir];
    moveCursor(state, dir, tick, "tap", telemetry);
    telemetry.push({ dir, kind: "DasStart", tick });
    state.activeDir = dir;
    updateDasArrTiming(state, tick);
    return;
  }

  state.held = others;
  if (state.activeDir !== dir) return;
  const fallback = others[others.length - 1] ?? null;
  state.activeDir = fallback;
  if (fallback !== null) {
    telemetry.push({ dir: fallback, kind: "DasStart", tick });
  }
  updateDasArrTiming(state, tick);
}

function processSwapKey(
  state: ControlState,
  type: "down" | "up",
  tick: Tick,
  commands: Array<Command>,
  telemetry: Array<ControlEvent>,
): void {
  telemetry.push({
    key: "Swap",
    kind: type === "down" ? "KeyDown" : "KeyUp",
    tick,
  });
  if (type === "down") {
    const { col, row } = state.cursor;
    commands.push({ col, kind: "Swap", row });
  }
}

/**
 * Handles ARR=0: jump to the edge once after DAS, then stop
 */
function handleEdgeBehavior(
  state: ControlState,
  tick: Tick,
  telemetry: Array<ControlEvent>,
): void {
  if (
    state.dasDeadlineTick !== null &&
    state.activeDir !== null &&
    isTickAfterOrEqual(tick, state.dasDeadlineTick)
  ) {
    telemetry.push({ dir: state.activeDir, kind: "DasMature", tick });
    moveCursor(state, state.activeDir, tick, "edge", telemetry);
    // Clear deadline to prevent repeat firing
    state.dasDeadlineTick = null;
  }
}

/**
 * Handles ARR>0: one cursor step every arrTicks after DAS
 */
function handleRepeatingBehavior(
  state: ControlState,
  tick: Tick,
  telemetry: Array<ControlEvent>,
): void {
  if (
    state.nextRepeatTick !== null &&
    state.activeDir !== null &&
    isTickAfterOrEqual(tick, state.nextRepeatTick)
  ) {
    // On first repeat (when nextRepeatTick == dasDeadlineTick), emit DasMature
    if (
      state.dasDeadlineTick !== null &&
      state.nextRepeatTick === state.dasDeadlineTick
    ) {
      telemetry.push({ dir: state.activeDir, kind: "DasMature", tick });
    }
    telemetry.push({ dir: state.activeDir, kind: "ArrRepeat", tick });
    moveCursor(state, state.activeDir, tick, "repeat", telemetry);
    state.nextRepeatTick = addTicks(tick, state.cfg.arrTicks);
  }
}

/**
 * Pure cursor transducer.
 * - Moves the cursor once on a new direction press.
 * - Starts DAS; after DAS, ARR=0 jumps to the edge, otherwise repeats every arrTicks.
 * - Swap press emits a Swap command at the cursor.
 */
export function controlStep(
  state: ControlState,
  tick: Tick,
  edges: ReadonlyArray<KeyEdge>,
): ControlResult {
  const s = { ...state };
  const cmds: Array<Command> = [];
  const telemetry: Array<ControlEvent> = [];

  for (const edge of edges) {
    if (edge.key === "Swap") {
      processSwapKey(s, edge.type, tick, cmds, telemetry);
    } else {
      processDirectionKey(s, edge.key, edge.type, tick, telemetry);
    }
  }

  if (s.activeDir !== null) {
    if (s.cfg.arrTicks === 0) {
      handleEdgeBehavior(s, tick, telemetry);
    } else {
      handleRepeatingBehavior(s, tick, telemetry);
    }
  }

  return { commands: cmds, next: s, telemetry };
}
