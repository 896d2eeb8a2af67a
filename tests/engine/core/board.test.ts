import { describe, expect, test } from "@jest/globals";

import {
  blockAt,
  blockIdAt,
  closeDraft,
  hasSupport,
  isInBounds,
  moveBlock,
  openDraft,
  placeBlock,
  removeBlock,
  swapCells,
  updateBlock,
} from "@/engine/core/board";
import { createBlockId, createGrid } from "@/engine/core/types";

import { createTestGameState, requireBlock } from "../../test-helpers";

describe("board reads", () => {
  const grid = createGrid(6, 12);

  test("isInBounds covers the playfield and nothing else", () => {
    expect(isInBounds(grid, 0, 0)).toBe(true);
    expect(isInBounds(grid, 5, 11)).toBe(true);
    expect(isInBounds(grid, 6, 0)).toBe(false);
    expect(isInBounds(grid, 0, 12)).toBe(false);
    expect(isInBounds(grid, -1, 3)).toBe(false);
    expect(isInBounds(grid, 1.5, 3)).toBe(false);
  });

  test("blockIdAt returns null outside the grid", () => {
    expect(blockIdAt(grid, 7, 0)).toBeNull();
    expect(blockIdAt(grid, 0, 0)).toBeNull();
  });

  test("blockAt finds the occupant", () => {
    const state = createTestGameState(["..1...", "2....."]);
    expect(blockAt(state, 0, 0)?.color).toBe(2);
    expect(blockAt(state, 2, 1)?.id).toBe(1);
    expect(blockAt(state, 1, 0)).toBeNull();
  });

  test("row 0 is supported even when empty", () => {
    const state = createTestGameState();
    expect(hasSupport(state, 3, 0)).toBe(true);
  });

  test("support depends on the state of the block below", () => {
    const state = createTestGameState(["1.....", "2....."]);
    expect(hasSupport(state, 0, 1)).toBe(true);
    expect(hasSupport(state, 1, 1)).toBe(false);

    const blocks = new Map(state.blocks);
    const below = requireBlock(state, 0);
    blocks.set(below.id, {
      ...below,
      state: "Fall",
      timer: { remaining: 1, total: 1 },
    });
    expect(hasSupport({ ...state, blocks }, 0, 1)).toBe(false);

    blocks.set(below.id, {
      ...below,
      state: "Despawning",
      timer: { remaining: 1, total: 1 },
    });
    expect(hasSupport({ ...state, blocks }, 0, 1)).toBe(true);
  });
});

describe("board drafts", () => {
  test("drafts leave the source untouched", () => {
    const state = createTestGameState(["1....."]);
    const draft = openDraft(state);
    removeBlock(draft, createBlockId(0));

    expect(blockAt(state, 0, 0)?.id).toBe(0);
    expect(blockAt(closeDraft(draft), 0, 0)).toBeNull();
  });

  test("placeBlock refuses an occupied cell", () => {
    const state = createTestGameState(["1....."]);
    const draft = openDraft(state);
    const intruder = { ...requireBlock(state, 0), id: createBlockId(9) };
    expect(() => placeBlock(draft, intruder)).toThrow(
      "Unexpected: cell (0,0) already holds block 0",
    );
  });

  test("placeBlock refuses a duplicate id", () => {
    const state = createTestGameState(["1....."]);
    const draft = openDraft(state);
    expect(() =>
      placeBlock(draft, { ...requireBlock(state, 0), col: 3 }),
    ).toThrow("Unexpected: block 0 already placed");
  });

  test("updateBlock cannot move a block", () => {
    const state = createTestGameState(["1....."]);
    const draft = openDraft(state);
    expect(() =>
      updateBlock(draft, { ...requireBlock(state, 0), row: 1 }),
    ).toThrow("Unexpected: updateBlock cannot move block 0");
  });

  test("moveBlock keeps grid and arena in agreement", () => {
    const state = createTestGameState(["1....."]);
    const draft = openDraft(state);
    const moved = moveBlock(draft, createBlockId(0), 4, 2);
    const view = closeDraft(draft);

    expect(moved).toMatchObject({ col: 4, row: 2 });
    expect(blockIdAt(view.grid, 0, 0)).toBeNull();
    expect(blockAt(view, 4, 2)?.id).toBe(0);
  });

  test("moveBlock refuses an occupied destination", () => {
    const state = createTestGameState(["12...."]);
    const draft = openDraft(state);
    expect(() => moveBlock(draft, createBlockId(0), 1, 0)).toThrow(
      "Unexpected: cell (1,0) already holds block 1",
    );
  });

  test("swapCells exchanges two blocks", () => {
    const state = createTestGameState(["12...."]);
    const draft = openDraft(state);
    swapCells(draft, { col: 0, row: 0 }, { col: 1, row: 0 });
    const view = closeDraft(draft);

    expect(blockAt(view, 0, 0)?.id).toBe(1);
    expect(blockAt(view, 1, 0)?.id).toBe(0);
  });

  test("swapCells moves a block into an empty cell", () => {
    const state = createTestGameState(["1....."]);
    const draft = openDraft(state);
    swapCells(draft, { col: 0, row: 0 }, { col: 1, row: 0 });
    const view = closeDraft(draft);

    expect(blockAt(view, 0, 0)).toBeNull();
    expect(blockAt(view, 1, 0)).toMatchObject({ col: 1, id: 0, row: 0 });
  });

  test("removeBlock drops the record and frees the cell", () => {
    const state = createTestGameState(["1....."]);
    const draft = openDraft(state);
    const removed = removeBlock(draft, createBlockId(0));

    expect(removed.id).toBe(0);
    expect(draft.blocks.size).toBe(0);
    expect(draft.grid.cells.every((c) => c === null)).toBe(true);
    expect(() => removeBlock(draft, createBlockId(0))).toThrow(
      "Unexpected: block 0 missing from arena",
    );
  });
});
