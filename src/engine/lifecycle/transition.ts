import { nextLifecycleState } from "./block-lifecycle.machine";

import type { LifecycleEvent } from "./block-lifecycle.machine";
import type { Block } from "../core/types";

export type TransitionPatch = Partial<
  Pick<Block, "clearSize" | "moveFromCol" | "timer">
>;

/**
 * Moves a block to the state the lifecycle machine assigns for `event`.
 * Timer and swap source are cleared unless the patch sets them.
 */
export function transitionBlock(
  block: Block,
  event: LifecycleEvent,
  patch: TransitionPatch = {},
): Block {
  const to = nextLifecycleState(block.state, event);
  if (to === "Destroyed") {
    throw new Error(
      `Unexpected: ${event} destroys block ${String(block.id)}; use exitLifecycle`,
    );
  }
  return { ...block, moveFromCol: null, timer: null, ...patch, state: to };
}

/** Confirms the block may leave the arena. Throws unless it is Despawning. */
export function exitLifecycle(block: Block): void {
  const to = nextLifecycleState(block.state, "DESPAWN_ELAPSED");
  if (to !== "Destroyed") {
    throw new Error(
      `Unexpected: block ${String(block.id)} reached ${to} instead of leaving`,
    );
  }
}
