import { debugLog } from "../../utils/debug";
import {
  blockAt,
  closeDraft,
  getBlock,
  hasSupport,
  idx,
  openDraft,
  removeBlock,
  updateBlock,
} from "../core/board";
import { exitLifecycle, transitionBlock } from "../lifecycle/transition";
import { findMatchGroups } from "../matching/detector";
import { isAtRest, isChainTriggered, scoreGroup } from "../scoring/chain";
import { isElapsed, startTimer } from "../utils/timer";

import type { Block } from "../core/types";
import type { DomainEvent } from "../events";
import type { MatchGroup } from "../matching/detector";
import type { GameState } from "../types";

type PhaseResult = { state: GameState; events: Array<DomainEvent> };

/**
 * Marks every member of every group Matched, bumps the chain counter once
 * when a chain-flagged block took part and scores each group.
 */
function handleMatches(
  state: GameState,
  groups: ReadonlyArray<MatchGroup>,
): PhaseResult {
  const events: Array<DomainEvent> = [];
  if (groups.length === 0) return { events, state };

  const { cfg, tick } = state;
  let chainCount = state.chainCount;
  if (isChainTriggered(groups, state.blocks)) {
    chainCount += 1;
    debugLog("chain", `chain ${String(chainCount)}`);
    events.push({ chainCount, kind: "ChainIncremented", tick });
  }

  const clearSize = groups.reduce((n, g) => n + g.blockIds.length, 0);
  const draft = openDraft(state);
  let score = state.score;

  for (const group of groups) {
    debugLog("match", `group of ${String(group.blockIds.length)}`, group);
    for (const id of group.blockIds) {
      updateBlock(
        draft,
        transitionBlock(getBlock(draft, id), "MATCHED", {
          clearSize,
          timer: startTimer(cfg.matchedTicks),
        }),
      );
    }
    const scoreDelta = scoreGroup(cfg, group.blockIds.length, chainCount);
    score += scoreDelta;
    events.push({
      blockIds: group.blockIds,
      chainCount,
      color: group.color,
      kind: "MatchOccurred",
      scoreDelta,
      tick,
    });
  }

  return {
    events,
    state: { ...state, ...closeDraft(draft), chainCount, score },
  };
}

/** Resets a running chain once nothing is pending anywhere on the grid. */
function handleChainReset(
  state: GameState,
  groups: ReadonlyArray<MatchGroup>,
): PhaseResult {
  if (groups.length > 0 || state.chainCount === 0 || !isAtRest(state.blocks)) {
    return { events: [], state };
  }
  debugLog("chain", `chain ended at ${String(state.chainCount)}`);
  return {
    events: [
      { chainCount: state.chainCount, kind: "ChainEnded", tick: state.tick },
    ],
    state: { ...state, chainCount: 0 },
  };
}

function isExpiredDespawn(b: Block): boolean {
  return b.state === "Despawning" && b.timer !== null && isElapsed(b.timer);
}

/**
 * Clears chain flags on supported Fixed blocks, removes Despawning blocks whose timer
 * ran out and flags the stack resting on each vacated cell.
 */
function handleCleanup(state: GameState): PhaseResult {
  const draft = openDraft(state);
  const events: Array<DomainEvent> = [];

  // An unsupported Fixed block is about to fall and keeps its flag
  for (const b of [...draft.blocks.values()]) {
    if (b.state === "Fixed" && b.chain && hasSupport(draft, b.col, b.row)) {
      updateBlock(draft, { ...b, chain: false });
    }
  }

  const expired = [...draft.blocks.values()]
    .filter(isExpiredDespawn)
    .sort(
      (a, b) => idx(state.grid, a.col, a.row) - idx(state.grid, b.col, b.row),
    );

  for (const b of expired) {
    exitLifecycle(b);
    removeBlock(draft, b.id);
    events.push({
      blockId: b.id,
      col: b.col,
      kind: "BlockDespawned",
      row: b.row,
      tick: state.tick,
    });
  }

  for (const b of expired) {
    for (let row = b.row + 1; row < state.grid.height; row++) {
      const above = blockAt(draft, b.col, row);
      if (
        above === null ||
        above.state === "Matched" ||
        above.state === "Despawning"
      ) {
        break;
      }
      updateBlock(draft, { ...above, chain: true });
    }
  }

  return { events, state: { ...state, ...closeDraft(draft) } };
}

export function resolveTransitions(state: GameState): {
  state: GameState;
  events: ReadonlyArray<DomainEvent>;
} {
  const groups = findMatchGroups(state);
  const matched = handleMatches(state, groups);
  const reset = handleChainReset(matched.state, groups);
  const cleaned = handleCleanup(reset.state);
  return {
    events: [...matched.events, ...reset.events, ...cleaned.events],
    state: cleaned.state,
  };
}
