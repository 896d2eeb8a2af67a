import type { DomainEvent } from "../events";
import type { Tick } from "../types";

export type ScoreUpdate = Readonly<{
  scoreDelta: number;
  chainCount: number;
  blocksCleared: number;
  tick: Tick;
}>;

export function selectScoreUpdates(
  events: ReadonlyArray<DomainEvent>,
): ReadonlyArray<ScoreUpdate> {
  return events.flatMap((e) =>
    e.kind === "MatchOccurred"
      ? [
          {
            blocksCleared: e.blockIds.length,
            chainCount: e.chainCount,
            scoreDelta: e.scoreDelta,
            tick: e.tick,
          },
        ]
      : [],
  );
}
