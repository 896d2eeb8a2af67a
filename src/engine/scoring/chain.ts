import type { MatchGroup } from "../matching/detector";
import type { BlockArena, BlockState } from "../core/types";
import type { EngineConfig } from "../types";

// States a block may be in while the grid counts as at rest
const AT_REST: ReadonlySet<BlockState> = new Set<BlockState>([
  "Fixed",
  "Spawning",
]);

/** Multiplier for a chain count; counts past the table reuse its last entry. */
export function chainMultiplier(cfg: EngineConfig, chainCount: number): number {
  const table = cfg.chainMultipliers;
  return table[Math.min(chainCount, table.length - 1)] ?? 1;
}

export function scoreGroup(
  cfg: EngineConfig,
  size: number,
  chainCount: number,
): number {
  return size * cfg.scorePerBlock * chainMultiplier(cfg, chainCount);
}

/** A tick continues a chain when any matched block carries the chain flag. */
export function isChainTriggered(
  groups: ReadonlyArray<MatchGroup>,
  blocks: BlockArena,
): boolean {
  return groups.some((g) =>
    g.blockIds.some((id) => blocks.get(id)?.chain === true),
  );
}

/** No block is falling, moving, matched or despawning. */
export function isAtRest(blocks: BlockArena): boolean {
  for (const b of blocks.values()) {
    if (!AT_REST.has(b.state)) return false;
  }
  return true;
}
