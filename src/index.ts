export { init, step, stepN } from "./engine";
export {
  DEFAULT_ENGINE_CONFIG,
  createEngineConfig,
  loadEngineConfig,
  validateEngineConfig,
} from "./engine/config";
export { checkGridInvariants, assertGridInvariants } from "./engine/invariants";
export { withLayout, withStartingStack } from "./engine/ops";
export { findMatchGroups } from "./engine/matching/detector";
export { nextLifecycleState } from "./engine/lifecycle/block-lifecycle.machine";
export { selectBoardRenderModel } from "./engine/selectors/board-render";
export { selectAudioCues } from "./engine/selectors/audio-cues";
export { selectScoreUpdates } from "./engine/selectors/score";
export { createSeededColorRng } from "./engine/core/rng/seeded";
export { asTick, asTickDelta } from "./engine/utils/tick";
export { BLOCK_PALETTE, createBlockColor } from "./engine/core/types";
export {
  DEFAULT_CONTROL_CONFIG,
  clampCursor,
  controlStep,
  createControlState,
} from "./control";
export {
  DEFAULT_SPAWNER_CONFIG,
  acknowledgeSpawns,
  createSpawner,
  planSpawns,
} from "./spawner/spawn-service";
export { createRuntime, runtimeStep } from "./runtime/loop";
export { debugLog, isDebugEnabled, setDebugTopics } from "./utils/debug";

export type * from "./engine/types";
export type { Command } from "./engine/commands";
export type { DomainEvent, SpawnRejectReason, SwapRejectReason } from "./engine/events";
export type { EngineOp } from "./engine/ops";
export type { MatchGroup } from "./engine/matching/detector";
export type {
  LifecycleEvent,
  LifecycleState,
} from "./engine/lifecycle/block-lifecycle.machine";
export type { BlockRenderModel, BoardRenderModel } from "./engine/selectors/board-render";
export type { AudioCue, AudioCueKind } from "./engine/selectors/audio-cues";
export type { ScoreUpdate } from "./engine/selectors/score";
export type { ColorRandomGenerator } from "./engine/core/rng/interface";
export type * from "./control/types";
export type { SpawnerConfig, SpawnerState, SpawnRequest } from "./spawner/spawn-service";
export type { RuntimeOptions, RuntimeState, RuntimeTickOutput } from "./runtime/loop";
