import { describe, expect, test } from "@jest/globals";

import {
  DEFAULT_CONTROL_CONFIG,
  clampCursor,
  controlStep,
  createControlState,
} from "@/control";
import { asTick, asTickDelta } from "@/engine/utils/tick";

import type { ControlState, KeyEdge } from "@/control/types";

const BOUNDS = { height: 12, width: 6 };

function run(
  state: ControlState,
  script: Record<number, ReadonlyArray<KeyEdge>>,
  ticks: number,
): { state: ControlState; results: Array<ReturnType<typeof controlStep>> } {
  let s = state;
  const results: Array<ReturnType<typeof controlStep>> = [];
  for (let t = 0; t < ticks; t++) {
    const r = controlStep(s, asTick(t), script[t] ?? []);
    results.push(r);
    s = r.next;
  }
  return { results, state: s };
}

describe("cursor bounds", () => {
  test("the cursor starts left of centre on the floor", () => {
    expect(createControlState(BOUNDS).cursor).toEqual({ col: 2, row: 0 });
  });

  test("the cursor column stops one short of the right wall", () => {
    expect(clampCursor(BOUNDS, { col: 9, row: -3 })).toEqual({ col: 4, row: 0 });
    expect(createControlState(BOUNDS, DEFAULT_CONTROL_CONFIG, { col: 9, row: 20 }).cursor).toEqual({
      col: 4,
      row: 11,
    });
  });

  test("a board narrower than the cursor is refused", () => {
    expect(() => createControlState({ height: 12, width: 1 })).toThrow(
      "Cursor bounds need a width of at least 2 and a height of at least 1",
    );
  });
});

describe("controlStep()", () => {
  const cfg = { arrTicks: asTickDelta(2), dasTicks: asTickDelta(3) };

  test("a press moves once and starts DAS", () => {
    const r = controlStep(createControlState(BOUNDS, cfg), asTick(0), [
      { key: "Right", type: "down" },
    ]);
    expect(r.telemetry).toEqual([
      { key: "Right", kind: "KeyDown", tick: 0 },
      {
        dir: "Right",
        from: { col: 2, row: 0 },
        kind: "CursorMoved",
        source: "tap",
        tick: 0,
        to: { col: 3, row: 0 },
      },
      { dir: "Right", kind: "DasStart", tick: 0 },
    ]);
    expect(r.next.cursor).toEqual({ col: 3, row: 0 });
    expect(r.commands).toEqual([]);
  });

  test("holding repeats after DAS every ARR ticks until the wall", () => {
    const { results, state } = run(
      createControlState(BOUNDS, cfg),
      { 0: [{ key: "Right", type: "down" }] },
      6,
    );

    expect(results[1]?.telemetry).toEqual([]);
    expect(results[3]?.telemetry).toEqual([
      { dir: "Right", kind: "DasMature", tick: 3 },
      { dir: "Right", kind: "ArrRepeat", tick: 3 },
      {
        dir: "Right",
        from: { col: 3, row: 0 },
        kind: "CursorMoved",
        source: "repeat",
        tick: 3,
        to: { col: 4, row: 0 },
      },
    ]);
    expect(results[5]?.telemetry).toEqual([
      { dir: "Right", kind: "ArrRepeat", tick: 5 },
    ]);
    expect(state.cursor).toEqual({ col: 4, row: 0 });
  });

  test("ARR 0 jumps to the edge once DAS matures", () => {
    const { results, state } = run(
      createControlState(BOUNDS, { arrTicks: asTickDelta(0), dasTicks: asTickDelta(3) }),
      { 0: [{ key: "Up", type: "down" }] },
      5,
    );

    expect(results[3]?.telemetry).toEqual([
      { dir: "Up", kind: "DasMature", tick: 3 },
      {
        dir: "Up",
        from: { col: 2, row: 1 },
        kind: "CursorMoved",
        source: "edge",
        tick: 3,
        to: { col: 2, row: 11 },
      },
    ]);
    expect(results[4]?.telemetry).toEqual([]);
    expect(state.cursor).toEqual({ col: 2, row: 11 });
  });

  test("releasing the active direction hands over to the one still held", () => {
    const { results, state } = run(
      createControlState(BOUNDS, cfg),
      {
        0: [{ key: "Left", type: "down" }],
        1: [{ key: "Right", type: "down" }],
        2: [{ key: "Right", type: "up" }],
      },
      3,
    );

    expect(results[2]?.telemetry).toEqual([
      { key: "Right", kind: "KeyUp", tick: 2 },
      { dir: "Left", kind: "DasStart", tick: 2 },
    ]);
    expect(state.activeDir).toBe("Left");
    expect(state.dasDeadlineTick).toBe(5);
  });

  test("releasing a direction that is not active changes nothing", () => {
    const { results, state } = run(
      createControlState(BOUNDS, cfg),
      {
        0: [{ key: "Left", type: "down" }],
        1: [{ key: "Right", type: "down" }],
        2: [{ key: "Left", type: "up" }],
      },
      3,
    );
    expect(results[2]?.telemetry).toEqual([
      { key: "Left", kind: "KeyUp", tick: 2 },
    ]);
    expect(state.activeDir).toBe("Right");
    expect(state.held).toEqual(["Right"]);
  });

  test("releasing the last direction stops repeating", () => {
    const { results, state } = run(
      createControlState(BOUNDS, cfg),
      { 0: [{ key: "Left", type: "down" }], 1: [{ key: "Left", type: "up" }] },
      6,
    );
    expect(state.activeDir).toBeNull();
    expect(state.nextRepeatTick).toBeNull();
    expect(results.slice(2).every((r) => r.telemetry.length === 0)).toBe(true);
    expect(state.cursor).toEqual({ col: 1, row: 0 });
  });

  test("a swap press emits a Swap command at the cursor", () => {
    const start = createControlState(BOUNDS, cfg, { col: 3, row: 5 });
    const down = controlStep(start, asTick(7), [{ key: "Swap", type: "down" }]);
    const up = controlStep(down.next, asTick(8), [{ key: "Swap", type: "up" }]);

    expect(down.commands).toEqual([{ col: 3, kind: "Swap", row: 5 }]);
    expect(up.commands).toEqual([]);
    expect(up.telemetry).toEqual([{ key: "Swap", kind: "KeyUp", tick: 8 }]);
  });

  test("a move and a swap in the same tick swap at the new position", () => {
    const r = controlStep(createControlState(BOUNDS, cfg), asTick(0), [
      { key: "Down", type: "down" },
      { key: "Up", type: "down" },
      { key: "Swap", type: "down" },
    ]);
    expect(r.commands).toEqual([{ col: 2, kind: "Swap", row: 1 }]);
  });

  test("does not mutate the input state", () => {
    const start = createControlState(BOUNDS, cfg);
    controlStep(start, asTick(0), [{ key: "Left", type: "down" }]);
    expect(start.cursor).toEqual({ col: 2, row: 0 });
    expect(start.held).toEqual([]);
    expect(start.activeDir).toBeNull();
  });
});
