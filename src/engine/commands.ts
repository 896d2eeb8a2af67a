// Color is a raw palette index; the engine rejects values outside the
// configured color count.
export type Command =
  | { kind: "Spawn"; col: number; color: number }
  | { kind: "Swap"; col: number; row: number };
