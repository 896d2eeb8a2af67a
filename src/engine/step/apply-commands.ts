import { debugLog } from "../../utils/debug";
import {
  blockAt,
  closeDraft,
  isInBounds,
  openDraft,
  placeBlock,
  swapCells,
  updateBlock,
} from "../core/board";
import { createBlockColor, nextBlockId } from "../core/types";
import { transitionBlock } from "../lifecycle/transition";
import { startTimer } from "../utils/timer";

import type { Command } from "../commands";
import type { Block, BlockId } from "../core/types";
import type { DomainEvent, SpawnRejectReason, SwapRejectReason } from "../events";
import type { GameState } from "../types";

type CommandResult = {
  state: GameState;
  events: ReadonlyArray<DomainEvent>;
};

function validateSpawn(
  state: GameState,
  col: number,
  color: number,
): SpawnRejectReason | null {
  const row = state.grid.height - 1;
  if (state.toppedOut) return "topped-out";
  if (!isInBounds(state.grid, col, row)) return "out-of-bounds";
  if (!Number.isInteger(color) || color < 0 || color >= state.cfg.colorCount) {
    return "invalid-color";
  }
  if (blockAt(state, col, row) !== null) return "occupied";
  return null;
}

/**
 * A spawn refused by a Fixed block in the top row means the stack has
 * reached the top: the game is over.
 */
function handleTopOut(
  state: GameState,
  col: number,
  rejected: DomainEvent,
): CommandResult {
  const top = blockAt(state, col, state.grid.height - 1);
  if (top === null || top.state !== "Fixed") {
    return { events: [rejected], state };
  }
  debugLog("commands", `topped out at column ${String(col)}`);
  return {
    events: [
      rejected,
      { blockId: top.id, col, kind: "ToppedOut", tick: state.tick },
    ],
    state: { ...state, toppedOut: true },
  };
}

/**
 * Handles Spawn: inserts a Spawning block in the top row.
 */
function handleSpawn(
  state: GameState,
  cmd: Extract<Command, { kind: "Spawn" }>,
): CommandResult {
  const reason = validateSpawn(state, cmd.col, cmd.color);
  if (reason !== null) {
    debugLog("commands", `spawn rejected (${reason})`, cmd);
    const rejected: DomainEvent = {
      col: cmd.col,
      kind: "SpawnRejected",
      reason,
      tick: state.tick,
    };
    return reason === "occupied"
      ? handleTopOut(state, cmd.col, rejected)
      : { events: [rejected], state };
  }

  const block: Block = {
    chain: false,
    clearSize: 0,
    col: cmd.col,
    color: createBlockColor(cmd.color),
    id: state.nextBlockId,
    moveFromCol: null,
    row: state.grid.height - 1,
    state: "Spawning",
    timer: startTimer(state.cfg.spawnTicks),
  };
  const draft = openDraft(state);
  placeBlock(draft, block);

  return {
    events: [
      {
        blockId: block.id,
        col: block.col,
        color: block.color,
        kind: "BlockSpawned",
        tick: state.tick,
      },
    ],
    state: {
      ...state,
      ...closeDraft(draft),
      nextBlockId: nextBlockId(state.nextBlockId),
    },
  };
}

function validateSwap(
  state: GameState,
  col: number,
  row: number,
): SwapRejectReason | null {
  if (!isInBounds(state.grid, col, row) || !isInBounds(state.grid, col + 1, row)) {
    return "out-of-bounds";
  }
  const cells = [col, col + 1].map((c) => ({ block: blockAt(state, c, row), c }));
  if (cells.every(({ block }) => block === null)) return "empty";
  if (cells.some(({ block }) => block !== null && block.state !== "Fixed")) {
    return "not-swappable";
  }
  // A block falling into an empty target cell would collide with the swap
  const fallingAbove = cells.some(({ block, c }) => {
    if (block !== null) return false;
    return blockAt(state, c, row + 1)?.state === "Fall";
  });
  return fallingAbove ? "blocked-from-above" : null;
}

/**
 * Handles Swap: exchanges (col,row) and (col+1,row). Blocks change cells
 * immediately and animate in Move/Moving with their source column.
 */
function handleSwap(
  state: GameState,
  cmd: Extract<Command, { kind: "Swap" }>,
): CommandResult {
  const reason = validateSwap(state, cmd.col, cmd.row);
  if (reason !== null) {
    debugLog("commands", `swap rejected (${reason})`, cmd);
    return {
      events: [
        {
          col: cmd.col,
          kind: "SwapRejected",
          reason,
          row: cmd.row,
          tick: state.tick,
        },
      ],
      state,
    };
  }

  const draft = openDraft(state);
  const a = { col: cmd.col, row: cmd.row };
  const b = { col: cmd.col + 1, row: cmd.row };
  swapCells(draft, a, b);

  const blockIds: Array<BlockId> = [];
  for (const target of [a, b]) {
    const moved = blockAt(draft, target.col, target.row);
    if (moved === null) continue;
    const source = target === a ? b.col : a.col;
    updateBlock(
      draft,
      transitionBlock(moved, "SWAP_REQUESTED", { moveFromCol: source }),
    );
    blockIds.push(moved.id);
  }

  return {
    events: [
      {
        blockIds,
        col: cmd.col,
        kind: "SwapStarted",
        row: cmd.row,
        tick: state.tick,
      },
    ],
    state: { ...state, ...closeDraft(draft) },
  };
}

export function applyCommands(
  state: GameState,
  cmds: ReadonlyArray<Command>,
): { state: GameState; events: ReadonlyArray<DomainEvent> } {
  let s = state;
  const events: Array<DomainEvent> = [];
  for (const cmd of cmds) {
    const r = cmd.kind === "Spawn" ? handleSpawn(s, cmd) : handleSwap(s, cmd);
    s = r.state;
    events.push(...r.events);
  }
  return { events, state: s };
}
