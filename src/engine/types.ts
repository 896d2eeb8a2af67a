import {
  type BlockArena,
  type BlockId,
  type Grid,
  createBlockId,
  createGrid,
} from "./core/types";

export * from "./core/types";
export type Tick = number & { readonly brand: "Tick" };
export type TickDelta = number & { readonly brand: "TickDelta" };

export type EngineConfig = Readonly<{
  width: number;
  height: number;
  colorCount: number;
  spawnTicks: TickDelta;
  floatPrepareTicks: TickDelta;
  floatTicks: TickDelta;
  fallTicksPerRow: TickDelta;
  settleTicks: TickDelta;
  swapTicks: TickDelta;
  matchedTicks: TickDelta;
  despawnTicksPerBlock: TickDelta;
  scorePerBlock: number;
  // Indexed by chain count, last entry repeats
  chainMultipliers: ReadonlyArray<number>;
  rngSeed: number;
}>;

export type GameState = {
  readonly cfg: EngineConfig;
  readonly grid: Grid;
  readonly blocks: BlockArena;
  readonly nextBlockId: BlockId;
  readonly chainCount: number;
  readonly score: number;
  readonly tick: Tick;
  readonly toppedOut: boolean;
};

export function mkInitialState(cfg: EngineConfig, startTick: Tick): GameState {
  return {
    blocks: new Map(),
    cfg,
    chainCount: 0,
    grid: createGrid(cfg.width, cfg.height),
    nextBlockId: createBlockId(0),
    score: 0,
    tick: startTick,
    toppedOut: false,
  };
}
