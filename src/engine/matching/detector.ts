import { blockAt, idx } from "../core/board";

import type { BlockColor, BlockId, BoardView } from "../core/types";

export const MIN_RUN = 3;

export type MatchGroup = Readonly<{
  color: BlockColor;
  // Ordered by cell index
  blockIds: ReadonlyArray<BlockId>;
}>;

/** Disjoint-set over cell indices with path halving. */
class CellUnion {
  private readonly parent: Array<number>;

  constructor(size: number) {
    this.parent = Array.from({ length: size }, (_, i) => i);
  }

  find(i: number): number {
    let x = i;
    for (;;) {
      const p = this.parent[x] ?? x;
      if (p === x) return x;
      const gp = this.parent[p] ?? p;
      this.parent[x] = gp;
      x = gp;
    }
  }

  union(a: number, b: number): void {
    const ra = this.find(a);
    const rb = this.find(b);
    if (ra === rb) return;
    // Smaller index becomes the root
    if (ra < rb) this.parent[rb] = ra;
    else this.parent[ra] = rb;
  }
}

type Line = ReadonlyArray<{ col: number; row: number }>;

function lines(width: number, height: number): ReadonlyArray<Line> {
  const out: Array<Line> = [];
  for (let row = 0; row < height; row++) {
    out.push(Array.from({ length: width }, (_, col) => ({ col, row })));
  }
  for (let col = 0; col < width; col++) {
    out.push(Array.from({ length: height }, (_, row) => ({ col, row })));
  }
  return out;
}

/**
 * Scans the whole grid for runs of at least three same-colored Fixed blocks,
 * horizontal and vertical, and merges runs that share a block. Blocks in any
 * other state never take part, even when their color would complete a run.
 */
export function findMatchGroups(board: BoardView): ReadonlyArray<MatchGroup> {
  const { height, width } = board.grid;
  const union = new CellUnion(width * height);
  const matched = new Set<number>();

  // Color of the Fixed occupant, or null
  const fixedColor = (col: number, row: number): BlockColor | null => {
    const b = blockAt(board, col, row);
    return b !== null && b.state === "Fixed" ? b.color : null;
  };

  for (const line of lines(width, height)) {
    let start = 0;
    while (start < line.length) {
      const first = line[start];
      const color = first === undefined ? null : fixedColor(first.col, first.row);
      let end = start + 1;
      if (color !== null) {
        for (; end < line.length; end++) {
          const cell = line[end];
          if (cell === undefined || fixedColor(cell.col, cell.row) !== color) {
            break;
          }
        }
        if (end - start >= MIN_RUN) {
          const run = line
            .slice(start, end)
            .map((c) => idx(board.grid, c.col, c.row));
          for (const i of run) matched.add(i);
          for (const i of run.slice(1)) union.union(run[0] ?? i, i);
        }
      }
      start = end;
    }
  }

  // Members arrive in cell order, so groups are keyed in order of their lowest cell
  const groups = new Map<number, Array<number>>();
  for (const i of [...matched].sort((a, b) => a - b)) {
    const root = union.find(i);
    const members = groups.get(root) ?? [];
    members.push(i);
    groups.set(root, members);
  }

  const result: Array<MatchGroup> = [];
  for (const cells of groups.values()) {
    const blocks = cells.map((i) => {
      const b = blockAt(board, i % width, Math.floor(i / width));
      if (b === null) {
        throw new Error(`Unexpected: matched cell ${String(i)} is empty`);
      }
      return b;
    });
    const color = blocks[0]?.color;
    if (color === undefined) continue;
    result.push({ blockIds: blocks.map((b) => b.id), color });
  }
  return result;
}
