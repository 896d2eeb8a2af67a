import type { BlockColor, BlockId, Tick } from "./types";

export type SpawnRejectReason =
  | "out-of-bounds"
  | "invalid-color"
  | "occupied"
  | "topped-out";

export type SwapRejectReason =
  | "out-of-bounds"
  | "empty"
  | "not-swappable"
  | "blocked-from-above";

export type DomainEvent =
  | {
      kind: "BlockSpawned";
      blockId: BlockId;
      col: number;
      color: BlockColor;
      tick: Tick;
    }
  | { kind: "SpawnRejected"; col: number; reason: SpawnRejectReason; tick: Tick }
  | {
      kind: "SwapStarted";
      col: number;
      row: number;
      blockIds: ReadonlyArray<BlockId>;
      tick: Tick;
    }
  | {
      kind: "SwapRejected";
      col: number;
      row: number;
      reason: SwapRejectReason;
      tick: Tick;
    }
  | { kind: "BlockLanded"; blockId: BlockId; col: number; row: number; tick: Tick }
  | {
      kind: "MatchOccurred";
      blockIds: ReadonlyArray<BlockId>;
      color: BlockColor;
      chainCount: number;
      scoreDelta: number;
      tick: Tick;
    }
  | { kind: "ChainIncremented"; chainCount: number; tick: Tick }
  | { kind: "ChainEnded"; chainCount: number; tick: Tick }
  // The stack reached the top row; no further spawns are accepted
  | { kind: "ToppedOut"; blockId: BlockId; col: number; tick: Tick }
  | {
      kind: "BlockDespawned";
      blockId: BlockId;
      col: number;
      row: number;
      tick: Tick;
    };
