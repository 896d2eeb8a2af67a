import {
  blockIdAt,
  closeDraft,
  getBlock,
  moveBlock,
  openDraft,
  updateBlock,
} from "../core/board";
import { transitionBlock } from "../lifecycle/transition";
import { fallStep } from "../physics/fall";
import { gravityCheck, prepareFloat, requireTimer } from "../physics/gravity";
import { countDown, isElapsed, startTimer } from "../utils/timer";
import { scaleTicks } from "../utils/tick";

import type { Block, BlockId, BoardView } from "../core/types";
import type { BoardDraft } from "../core/board";
import type { DomainEvent } from "../events";
import type { EngineConfig, GameState } from "../types";

/**
 * Counts a timed state down and fires `onElapsed` at zero. Used by every
 * state whose exit depends only on time.
 */
function countdown(block: Block, onElapsed: (b: Block) => Block): Block {
  const timer = countDown(requireTimer(block));
  const next = { ...block, timer };
  return isElapsed(timer) ? onElapsed(next) : next;
}

/** Next record for one block; exactly one call per block per tick. */
export function advanceBlock(
  board: BoardView,
  block: Block,
  cfg: EngineConfig,
): Block {
  switch (block.state) {
    case "Spawning":
      return countdown(block, (b) => transitionBlock(b, "SPAWN_SETTLED"));
    case "Fixed":
      return gravityCheck(board, block, cfg);
    case "FloatingPrepare":
      return prepareFloat(board, block, cfg);
    case "Floating":
      return countdown(block, (b) =>
        transitionBlock(b, "HOVER_ELAPSED", {
          timer: startTimer(cfg.fallTicksPerRow),
        }),
      );
    case "Fall":
      return fallStep(board, block, cfg);
    case "FixedPrepare":
      return countdown(block, (b) => transitionBlock(b, "SETTLED"));
    case "Move":
      return transitionBlock(block, "SWAP_STARTED", {
        moveFromCol: block.moveFromCol,
        timer: startTimer(cfg.swapTicks),
      });
    case "Moving":
      return countdown(block, (b) => transitionBlock(b, "SWAP_FINISHED"));
    case "Matched":
      return countdown(block, (b) =>
        transitionBlock(b, "TELEGRAPH_ELAPSED", {
          clearSize: b.clearSize,
          timer: startTimer(
            scaleTicks(cfg.despawnTicksPerBlock, Math.max(1, b.clearSize)),
          ),
        }),
      );
    case "Despawning":
      // Leaves the arena in the cleanup phase once the timer reads zero
      return countdown(block, (b) => b);
  }
}

function commit(draft: BoardDraft, prev: Block, next: Block): void {
  if (next.col !== prev.col || next.row !== prev.row) {
    moveBlock(draft, next.id, next.col, next.row);
  }
  updateBlock(draft, next);
}

/**
 * Single sweep, column by column and bottom to top within a column. Each
 * block is advanced once; a block that drops a row lands in a cell the sweep
 * has already passed.
 */
export function advancePhysics(state: GameState): {
  state: GameState;
  events: ReadonlyArray<DomainEvent>;
} {
  const draft = openDraft(state);
  const events: Array<DomainEvent> = [];
  const advanced = new Set<BlockId>();
  const { height, width } = state.grid;

  for (let col = 0; col < width; col++) {
    for (let row = 0; row < height; row++) {
      const id = blockIdAt(draft.grid, col, row);
      if (id === null || advanced.has(id)) continue;
      advanced.add(id);

      const prev = getBlock(draft, id);
      const next = advanceBlock(draft, prev, state.cfg);
      if (next === prev) continue;
      commit(draft, prev, next);

      if (prev.state === "Fall" && next.state === "FixedPrepare") {
        events.push({
          blockId: id,
          col: next.col,
          kind: "BlockLanded",
          row: next.row,
          tick: state.tick,
        });
      }
    }
  }

  return { events, state: { ...state, ...closeDraft(draft) } };
}
