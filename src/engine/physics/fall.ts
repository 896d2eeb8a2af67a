import { blockAt, hasSupport } from "../core/board";
import { transitionBlock } from "../lifecycle/transition";
import { countDown, isElapsed, startTimer } from "../utils/timer";

import { requireTimer } from "./gravity";

import type { Block, BoardView } from "../core/types";
import type { EngineConfig } from "../types";

/**
 * One tick of a falling block. Lands on support; otherwise counts down while
 * the cell below is empty or falling too, and drops one row at expiry when
 * that cell is free. A falling column therefore moves in lockstep.
 *
 * The returned block may carry a new row; the caller commits the move.
 */
export function fallStep(
  board: BoardView,
  block: Block,
  cfg: EngineConfig,
): Block {
  const { col, row } = block;
  if (hasSupport(board, col, row)) {
    return transitionBlock(block, "LANDED", {
      timer: startTimer(cfg.settleTicks),
    });
  }

  const below = blockAt(board, col, row - 1);
  if (below !== null && below.state !== "Fall") return block;

  const timer = countDown(requireTimer(block));
  if (!isElapsed(timer) || below !== null) return { ...block, timer };

  return { ...block, row: row - 1, timer: startTimer(cfg.fallTicksPerRow) };
}
