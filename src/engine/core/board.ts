import {
  type Block,
  type BlockId,
  type BlockState,
  type BoardView,
  type Grid,
} from "./types";

// States whose occupant holds up the block above it
export const SUPPORTING_STATES: ReadonlySet<BlockState> = new Set<BlockState>([
  "Fixed",
  "FixedPrepare",
  "Matched",
  "Despawning",
]);

export function isInBounds(grid: Grid, col: number, row: number): boolean {
  return (
    Number.isInteger(col) &&
    Number.isInteger(row) &&
    col >= 0 &&
    col < grid.width &&
    row >= 0 &&
    row < grid.height
  );
}

export function idx(grid: Grid, col: number, row: number): number {
  return row * grid.width + col;
}

export function blockIdAt(grid: Grid, col: number, row: number): BlockId | null {
  if (!isInBounds(grid, col, row)) return null;
  return grid.cells[idx(grid, col, row)] ?? null;
}

export function getBlock(board: BoardView, id: BlockId): Block {
  const block = board.blocks.get(id);
  if (block === undefined) {
    throw new Error(`Unexpected: block ${String(id)} missing from arena`);
  }
  return block;
}

export function blockAt(board: BoardView, col: number, row: number): Block | null {
  const id = blockIdAt(board.grid, col, row);
  return id === null ? null : getBlock(board, id);
}

/** Row 0 is always supported; elsewhere the cell below must hold a supporting block. */
export function hasSupport(board: BoardView, col: number, row: number): boolean {
  if (row === 0) return true;
  const below = blockAt(board, col, row - 1);
  return below !== null && SUPPORTING_STATES.has(below.state);
}

/**
 * Mutable working copy used inside a single phase. Every mutation keeps
 * grid and arena in agreement and throws instead of overwriting a cell.
 */
export type BoardDraft = {
  grid: Readonly<{
    width: number;
    height: number;
    cells: Array<BlockId | null>;
  }>;
  blocks: Map<BlockId, Block>;
};

export function openDraft(board: BoardView): BoardDraft {
  return {
    blocks: new Map(board.blocks),
    grid: {
      cells: [...board.grid.cells],
      height: board.grid.height,
      width: board.grid.width,
    },
  };
}

export function closeDraft(draft: BoardDraft): BoardView {
  return {
    blocks: new Map(draft.blocks),
    grid: { ...draft.grid, cells: [...draft.grid.cells] },
  };
}

function claimCell(draft: BoardDraft, id: BlockId, col: number, row: number): void {
  if (!isInBounds(draft.grid, col, row)) {
    throw new Error(
      `Unexpected: cell (${String(col)},${String(row)}) is out of bounds`,
    );
  }
  const i = idx(draft.grid, col, row);
  const occupant = draft.grid.cells[i] ?? null;
  if (occupant !== null && occupant !== id) {
    throw new Error(
      `Unexpected: cell (${String(col)},${String(row)}) already holds block ${String(occupant)}`,
    );
  }
  draft.grid.cells[i] = id;
}

function vacateCell(draft: BoardDraft, block: Block): void {
  const i = idx(draft.grid, block.col, block.row);
  if (draft.grid.cells[i] !== block.id) {
    throw new Error(
      `Unexpected: block ${String(block.id)} is not at (${String(block.col)},${String(block.row)})`,
    );
  }
  draft.grid.cells[i] = null;
}

export function placeBlock(draft: BoardDraft, block: Block): void {
  if (draft.blocks.has(block.id)) {
    throw new Error(`Unexpected: block ${String(block.id)} already placed`);
  }
  claimCell(draft, block.id, block.col, block.row);
  draft.blocks.set(block.id, block);
}

/** Replaces a block record in place. Position changes go through moveBlock. */
export function updateBlock(draft: BoardDraft, block: Block): void {
  const current = getBlock(draft, block.id);
  if (current.col !== block.col || current.row !== block.row) {
    throw new Error(
      `Unexpected: updateBlock cannot move block ${String(block.id)}`,
    );
  }
  draft.blocks.set(block.id, block);
}

export function moveBlock(
  draft: BoardDraft,
  id: BlockId,
  col: number,
  row: number,
): Block {
  const current = getBlock(draft, id);
  vacateCell(draft, current);
  claimCell(draft, id, col, row);
  const moved: Block = { ...current, col, row };
  draft.blocks.set(id, moved);
  return moved;
}

/** Exchanges two blocks, or a block and an empty cell, without a transient overlap. */
export function swapCells(
  draft: BoardDraft,
  a: { col: number; row: number },
  b: { col: number; row: number },
): void {
  const first = blockAt(draft, a.col, a.row);
  const second = blockAt(draft, b.col, b.row);
  if (first !== null) vacateCell(draft, first);
  if (second !== null) vacateCell(draft, second);
  if (first !== null) {
    claimCell(draft, first.id, b.col, b.row);
    draft.blocks.set(first.id, { ...first, col: b.col, row: b.row });
  }
  if (second !== null) {
    claimCell(draft, second.id, a.col, a.row);
    draft.blocks.set(second.id, { ...second, col: a.col, row: a.row });
  }
}

export function removeBlock(draft: BoardDraft, id: BlockId): Block {
  const current = getBlock(draft, id);
  vacateCell(draft, current);
  draft.blocks.delete(id);
  return current;
}
