import { idx } from "./core/board";

import type { BlockId, BlockState } from "./core/types";
import type { GameState } from "./types";

const TIMED_STATES: ReadonlySet<BlockState> = new Set<BlockState>([
  "Spawning",
  "FloatingPrepare",
  "Floating",
  "Fall",
  "FixedPrepare",
  "Moving",
  "Matched",
  "Despawning",
]);

/**
 * Lists every disagreement between grid and arena, plus per-state record
 * problems. An empty list means the state is consistent.
 */
export function checkGridInvariants(state: GameState): ReadonlyArray<string> {
  const { blocks, grid } = state;
  const problems: Array<string> = [];

  if (grid.cells.length !== grid.width * grid.height) {
    problems.push(
      `grid has ${String(grid.cells.length)} cells, expected ${String(grid.width * grid.height)}`,
    );
  }

  const seen = new Map<BlockId, number>();
  grid.cells.forEach((id, i) => {
    if (id === null) return;
    seen.set(id, (seen.get(id) ?? 0) + 1);
    const block = blocks.get(id);
    if (block === undefined) {
      problems.push(`cell ${String(i)} holds unknown block ${String(id)}`);
    } else if (idx(grid, block.col, block.row) !== i) {
      problems.push(
        `block ${String(id)} records (${String(block.col)},${String(block.row)}) but sits in cell ${String(i)}`,
      );
    }
  });

  for (const [id, block] of blocks) {
    const count = seen.get(id) ?? 0;
    if (count !== 1) {
      problems.push(`block ${String(id)} occupies ${String(count)} cells`);
    }
    if (id >= state.nextBlockId) {
      problems.push(`block ${String(id)} is not below nextBlockId`);
    }
    if (TIMED_STATES.has(block.state) && block.timer === null) {
      problems.push(`block ${String(id)} in ${block.state} has no timer`);
    }
    const moving = block.state === "Move" || block.state === "Moving";
    if (moving !== (block.moveFromCol !== null)) {
      problems.push(`block ${String(id)} in ${block.state} has moveFromCol mismatch`);
    }
  }

  if (!Number.isInteger(state.chainCount) || state.chainCount < 0) {
    problems.push(`chainCount ${String(state.chainCount)} is invalid`);
  }
  return problems;
}

export function assertGridInvariants(state: GameState): void {
  const problems = checkGridInvariants(state);
  if (problems.length > 0) {
    throw new Error(
      `Grid invariant violated at tick ${String(state.tick)}: ${problems.join("; ")}`,
    );
  }
}
