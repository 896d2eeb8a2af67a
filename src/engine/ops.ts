import { closeDraft, openDraft, placeBlock } from "./core/board";
import { createSeededColorRng } from "./core/rng/seeded";
import {
  type Block,
  type BlockColor,
  type BlockId,
  createBlockColor,
  createGrid,
  nextBlockId,
} from "./core/types";

import type { ColorRandomGenerator } from "./core/rng/interface";
import type { GameState } from "./types";

/**
 * Pure helpers that transform GameState between ticks, for scenarios,
 * starting boards and tests. They never run inside a step and do not mutate
 * their input.
 */

export type EngineOp = (s: GameState) => GameState;

function fixedBlock(
  id: BlockId,
  color: BlockColor,
  col: number,
  row: number,
): Block {
  return {
    chain: false,
    clearSize: 0,
    col,
    color,
    id,
    moveFromCol: null,
    row,
    state: "Fixed",
    timer: null,
  };
}

/**
 * Replace the board with Fixed blocks drawn as text. Rows are listed top
 * down, so the last string is row 0; "." is empty and a digit is a palette
 * index. Ids are assigned from row 0 upwards, left to right.
 */
export function withLayout(rows: ReadonlyArray<string>): EngineOp {
  return (s) => {
    const { height, width } = s.grid;
    if (rows.length > height) {
      throw new Error(
        `Layout has ${String(rows.length)} rows, board holds ${String(height)}`,
      );
    }
    const draft = openDraft({
      blocks: new Map(),
      grid: createGrid(width, height),
    });
    let id = s.nextBlockId;

    for (let row = 0; row < rows.length; row++) {
      const line = rows[rows.length - 1 - row] ?? "";
      if (line.length !== width) {
        throw new Error(
          `Layout row ${String(row)} has ${String(line.length)} cells, expected ${String(width)}`,
        );
      }
      for (let col = 0; col < width; col++) {
        const ch = line.charAt(col);
        if (ch === ".") continue;
        const value = Number.parseInt(ch, 10);
        if (Number.isNaN(value) || value >= s.cfg.colorCount) {
          throw new Error(
            `Layout cell (${String(col)},${String(row)}) has invalid color "${ch}"`,
          );
        }
        placeBlock(draft, fixedBlock(id, createBlockColor(value), col, row));
        id = nextBlockId(id);
      }
    }

    return {
      ...s,
      ...closeDraft(draft),
      chainCount: 0,
      nextBlockId: id,
      toppedOut: false,
    };
  };
}

/**
 * Fill the bottom `rowCount` rows with Fixed blocks, choosing each color so
 * that no horizontal or vertical triple exists. Colors come from the config
 * seed unless a generator is given.
 */
export function withStartingStack(
  rowCount: number,
  rng?: ColorRandomGenerator,
): EngineOp {
  return (s) => {
    const { colorCount, rngSeed } = s.cfg;
    const { height, width } = s.grid;
    if (!Number.isInteger(rowCount) || rowCount < 0 || rowCount > height) {
      throw new Error(`rowCount must be from 0 to ${String(height)}`);
    }
    if (colorCount < 3) {
      throw new Error("A triple-free stack needs at least 3 colors");
    }

    let gen = rng ?? createSeededColorRng(String(rngSeed), colorCount);
    const colors: Array<Array<number>> = [];
    for (let row = 0; row < rowCount; row++) {
      const line: Array<number> = [];
      for (let col = 0; col < width; col++) {
        const banned = new Set<number>();
        const l1 = line[col - 1];
        if (l1 !== undefined && l1 === line[col - 2]) banned.add(l1);
        const d1 = colors[row - 1]?.[col];
        if (d1 !== undefined && d1 === colors[row - 2]?.[col]) banned.add(d1);

        const pool: Array<number> = [];
        for (let c = 0; c < colorCount; c++) {
          if (!banned.has(c)) pool.push(c);
        }
        const r = gen.getNextIndex(pool.length);
        gen = r.newRng;
        const chosen = pool[r.index];
        if (chosen === undefined) {
          throw new Error("Unexpected: empty color pool");
        }
        line.push(chosen);
      }
      colors.push(line);
    }

    const rows = colors.map((line) => line.join("")).reverse();
    return withLayout(rows)(s);
  };
}
