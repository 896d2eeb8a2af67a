import type { Command } from "../engine/commands";
import type { Tick, TickDelta } from "../engine/types";

export type Direction = "Left" | "Right" | "Up" | "Down";
export type Key = Direction | "Swap";
export type KeyEdge = { key: Key; type: "down" | "up" };

export type ControlConfig = Readonly<{
  dasTicks: TickDelta;
  arrTicks: TickDelta;
}>;

/** Left cell of the two-wide swap cursor. */
export type Cursor = Readonly<{ col: number; row: number }>;

export type CursorBounds = Readonly<{ width: number; height: number }>;

export type ControlState = {
  // Held directions in press order, most recent last
  held: ReadonlyArray<Direction>;
  activeDir: Direction | null;
  dasDeadlineTick: Tick | null;
  nextRepeatTick: Tick | null;
  cursor: Cursor;
  bounds: CursorBounds;
  cfg: ControlConfig;
};

/**
 * Control telemetry events that describe input semantics.
 * These events tell apart taps, auto-repeat and jumps to the edge.
 */
export type ControlEvent =
  | { kind: "KeyDown"; key: Key; tick: Tick }
  | { kind: "KeyUp"; key: Key; tick: Tick }
  | {
      kind: "CursorMoved";
      dir: Direction;
      from: Cursor;
      to: Cursor;
      source: "tap" | "repeat" | "edge";
      tick: Tick;
    }
  | { kind: "DasStart"; dir: Direction; tick: Tick }
  | { kind: "DasMature"; dir: Direction; tick: Tick }
  | { kind: "ArrRepeat"; dir: Direction; tick: Tick };

export type ControlResult = {
  next: ControlState;
  commands: ReadonlyArray<Command>;
  telemetry: ReadonlyArray<ControlEvent>;
};
