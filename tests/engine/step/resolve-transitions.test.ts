import { describe, expect, test } from "@jest/globals";

import { blockAt } from "@/engine/core/board";
import { resolveTransitions } from "@/engine/step/resolve-transitions";

import {
  createTestGameState,
  requireBlock,
  withBlock,
} from "../../test-helpers";

describe("@/engine/step/resolve-transitions: matches", () => {
  test("marks a run Matched, scores it and reports it", () => {
    const state = createTestGameState(["111..."]);
    const result = resolveTransitions(state);

    expect(result.events).toEqual([
      {
        blockIds: [0, 1, 2],
        chainCount: 0,
        color: 1,
        kind: "MatchOccurred",
        scoreDelta: 30,
        tick: 0,
      },
    ]);
    expect(result.state.score).toBe(30);
    for (const id of [0, 1, 2]) {
      expect(requireBlock(result.state, id)).toMatchObject({
        clearSize: 3,
        state: "Matched",
        timer: { remaining: 2, total: 2 },
      });
    }
  });

  test("groups found in one tick share the clear size", () => {
    const state = createTestGameState(["222...", "...111"]);
    const result = resolveTransitions(state);

    expect(result.events.map((e) => e.kind)).toEqual([
      "MatchOccurred",
      "MatchOccurred",
    ]);
    expect(requireBlock(result.state, 0).clearSize).toBe(6);
    expect(requireBlock(result.state, 5).clearSize).toBe(6);
    expect(result.state.score).toBe(60);
  });

  test("a flagged member advances the chain before scoring", () => {
    const state = withBlock(createTestGameState(["111..."]), 0, { chain: true });
    const result = resolveTransitions(state);

    expect(result.events).toEqual([
      { chainCount: 1, kind: "ChainIncremented", tick: 0 },
      {
        blockIds: [0, 1, 2],
        chainCount: 1,
        color: 1,
        kind: "MatchOccurred",
        scoreDelta: 60,
        tick: 0,
      },
    ]);
    expect(result.state.chainCount).toBe(1);
  });

  test("two flagged groups in one tick advance the chain once", () => {
    let state = createTestGameState(["222...", "...111"]);
    state = withBlock(state, 0, { chain: true });
    state = withBlock(state, 3, { chain: true });
    const result = resolveTransitions({ ...state, chainCount: 2 });

    expect(result.events.filter((e) => e.kind === "ChainIncremented")).toEqual([
      { chainCount: 3, kind: "ChainIncremented", tick: 0 },
    ]);
    // 3 blocks * 10 * multiplier 8 for chain 3, per group
    expect(result.state.score).toBe(480);
  });
});

describe("@/engine/step/resolve-transitions: chain reset", () => {
  test("ends the chain once the grid is at rest", () => {
    const state = { ...createTestGameState(["12...."]), chainCount: 2 };
    const result = resolveTransitions(state);

    expect(result.events).toEqual([
      { chainCount: 2, kind: "ChainEnded", tick: 0 },
    ]);
    expect(result.state.chainCount).toBe(0);
  });

  test("keeps the chain while anything is still pending", () => {
    const state = withBlock(
      { ...createTestGameState(["12...."]), chainCount: 2 },
      1,
      { state: "FixedPrepare", timer: { remaining: 1, total: 2 } },
    );
    const result = resolveTransitions(state);

    expect(result.events).toEqual([]);
    expect(result.state.chainCount).toBe(2);
  });

  test("nothing to end when no chain runs", () => {
    expect(resolveTransitions(createTestGameState(["12...."])).events).toEqual([]);
  });
});

describe("@/engine/step/resolve-transitions: cleanup", () => {
  test("removes only expired despawns", () => {
    let state = createTestGameState(["...2..", "...3..", "...1..", "...1.."]);
    state = withBlock(state, 0, {
      clearSize: 3,
      state: "Despawning",
      timer: { remaining: 0, total: 3 },
    });
    state = withBlock(state, 1, {
      clearSize: 3,
      state: "Despawning",
      timer: { remaining: 1, total: 3 },
    });

    const result = resolveTransitions(state);

    expect(result.events).toEqual([
      { blockId: 0, col: 3, kind: "BlockDespawned", row: 0, tick: 0 },
    ]);
    expect(blockAt(result.state, 3, 0)).toBeNull();
    // The stack stops at the block still despawning
    expect(requireBlock(result.state, 1).chain).toBe(false);
    expect(requireBlock(result.state, 2).chain).toBe(false);
  });

  test("flags every block resting on a vacated cell", () => {
    let state = createTestGameState(["..2...", "..3...", "..1..."]);
    state = withBlock(state, 0, {
      clearSize: 3,
      state: "Despawning",
      timer: { remaining: 0, total: 3 },
    });

    const result = resolveTransitions(state);

    expect(result.state.blocks.has(requireBlock(state, 0).id)).toBe(false);
    expect(requireBlock(result.state, 1).chain).toBe(true);
    expect(requireBlock(result.state, 2).chain).toBe(true);
  });

  test("clears stale flags on Fixed blocks", () => {
    let state = createTestGameState(["12...."]);
    state = withBlock(state, 0, { chain: true });
    state = withBlock(state, 1, {
      chain: true,
      state: "FixedPrepare",
      timer: { remaining: 1, total: 2 },
    });

    const result = resolveTransitions(state);

    expect(requireBlock(result.state, 0).chain).toBe(false);
    expect(requireBlock(result.state, 1).chain).toBe(true);
  });

  test("keeps the flag on a Fixed block with nothing under it", () => {
    const state = withBlock(createTestGameState(["1.....", "......"]), 0, {
      chain: true,
    });

    const result = resolveTransitions(state);

    expect(requireBlock(result.state, 0)).toMatchObject({
      chain: true,
      row: 1,
      state: "Fixed",
    });
  });
});
