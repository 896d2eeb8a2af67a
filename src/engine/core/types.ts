// Palette order matters: a BlockColor is an index into it, and a config's
// colorCount selects a prefix.
export const BLOCK_PALETTE = [
  "red",
  "green",
  "blue",
  "yellow",
  "purple",
  "indigo",
] as const;
export const MAX_COLORS = BLOCK_PALETTE.length;
export type PaletteName = (typeof BLOCK_PALETTE)[number];

// Block ids are assigned monotonically and never reused
declare const BlockIdBrand: unique symbol;
export type BlockId = number & { readonly [BlockIdBrand]: true };

declare const BlockColorBrand: unique symbol;
export type BlockColor = number & { readonly [BlockColorBrand]: true };

export function createBlockId(value: number): BlockId {
  if (!Number.isInteger(value) || value < 0) {
    throw new Error("BlockId must be a non-negative integer");
  }
  return value as BlockId;
}

export function nextBlockId(id: BlockId): BlockId {
  return (id + 1) as BlockId;
}

export function createBlockColor(value: number): BlockColor {
  if (!isBlockColor(value)) {
    throw new Error(
      `BlockColor must be an integer from 0 to ${String(MAX_COLORS - 1)}`,
    );
  }
  return value;
}

export function isBlockColor(n: unknown): n is BlockColor {
  return (
    typeof n === "number" && Number.isInteger(n) && n >= 0 && n < MAX_COLORS
  );
}

export function paletteName(color: BlockColor): PaletteName {
  const name = BLOCK_PALETTE[color];
  if (name === undefined) {
    throw new Error(`Unexpected: color ${String(color)} outside the palette`);
  }
  return name;
}

export type BlockState =
  | "Spawning"
  | "Fixed"
  | "FloatingPrepare"
  | "Floating"
  | "Fall"
  | "FixedPrepare"
  | "Move"
  | "Moving"
  | "Matched"
  | "Despawning";

export const BLOCK_STATES: ReadonlyArray<BlockState> = [
  "Spawning",
  "Fixed",
  "FloatingPrepare",
  "Floating",
  "Fall",
  "FixedPrepare",
  "Move",
  "Moving",
  "Matched",
  "Despawning",
];

/** Countdown in ticks; `remaining` reaching 0 means the delay has elapsed. */
export type DelayTimer = Readonly<{
  remaining: number;
  total: number;
}>;

export type Block = Readonly<{
  id: BlockId;
  color: BlockColor;
  state: BlockState;
  col: number;
  row: number;
  timer: DelayTimer | null;
  // Source column of a swap while in Move/Moving
  moveFromCol: number | null;
  // Lost support because a block below it despawned
  chain: boolean;
  // Blocks cleared in the tick that matched this one
  clearSize: number;
}>;

export type BlockArena = ReadonlyMap<BlockId, Block>;

/**
 * Occupancy index over the playfield. `cells` is row-major with
 * index `row * width + col`; row 0 is the floor.
 */
export type Grid = Readonly<{
  width: number;
  height: number;
  cells: ReadonlyArray<BlockId | null>;
}>;

/** Anything carrying a grid and the block arena it indexes, GameState included. */
export type BoardView = Readonly<{
  grid: Grid;
  blocks: BlockArena;
}>;

export function createGrid(width: number, height: number): Grid {
  if (!Number.isInteger(width) || width < 2) {
    throw new Error("Grid width must be an integer of at least 2");
  }
  if (!Number.isInteger(height) || height < 1) {
    throw new Error("Grid height must be a positive integer");
  }
  return {
    cells: Array.from({ length: width * height }, () => null),
    height,
    width,
  };
}
