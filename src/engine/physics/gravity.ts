import { hasSupport } from "../core/board";
import { transitionBlock } from "../lifecycle/transition";
import { countDown, isElapsed, startTimer } from "../utils/timer";

import type { Block, BoardView, DelayTimer } from "../core/types";
import type { EngineConfig } from "../types";

export function requireTimer(block: Block): DelayTimer {
  if (block.timer === null) {
    throw new Error(
      `Unexpected: block ${String(block.id)} in ${block.state} has no timer`,
    );
  }
  return block.timer;
}

/**
 * Gravity check for a Fixed block. Runs inside the bottom-to-top sweep, so a
 * block below that already lost support this tick no longer supports this
 * one and a whole stack starts to float together.
 */
export function gravityCheck(
  board: BoardView,
  block: Block,
  cfg: EngineConfig,
): Block {
  if (hasSupport(board, block.col, block.row)) return block;
  return transitionBlock(block, "SUPPORT_LOST", {
    timer: startTimer(cfg.floatPrepareTicks),
  });
}

/** FloatingPrepare: cancels back to Fixed when support returns, else counts down. */
export function prepareFloat(
  board: BoardView,
  block: Block,
  cfg: EngineConfig,
): Block {
  if (hasSupport(board, block.col, block.row)) {
    return transitionBlock(block, "SUPPORT_RETURNED");
  }
  const timer = countDown(requireTimer(block));
  if (!isElapsed(timer)) return { ...block, timer };
  return transitionBlock(block, "PREPARE_ELAPSED", {
    timer: startTimer(cfg.floatTicks),
  });
}
