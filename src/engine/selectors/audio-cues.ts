import type { DomainEvent } from "../events";
import type { Tick } from "../types";

export type AudioCueKind =
  | "match_occurred"
  | "chain_incremented"
  | "block_despawned";

export type AudioCue = Readonly<{ cue: AudioCueKind; tick: Tick }>;

/** Sound triggers for the events of one or more ticks, in event order. */
export function selectAudioCues(
  events: ReadonlyArray<DomainEvent>,
): ReadonlyArray<AudioCue> {
  const cues: Array<AudioCue> = [];
  for (const e of events) {
    switch (e.kind) {
      case "MatchOccurred":
        cues.push({ cue: "match_occurred", tick: e.tick });
        break;
      case "ChainIncremented":
        cues.push({ cue: "chain_incremented", tick: e.tick });
        break;
      case "BlockDespawned":
        cues.push({ cue: "block_despawned", tick: e.tick });
        break;
      default:
        break;
    }
  }
  return cues;
}
