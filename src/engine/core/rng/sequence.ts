import { type ColorRandomGenerator } from "./interface";
import { type BlockColor } from "../types";

/**
 * RNG that yields fixed sequences and then repeats them.
 * Each call returns a new RNG instance with advanced indices (immutable style).
 */
export class SequenceRng implements ColorRandomGenerator {
  constructor(
    private readonly colors: ReadonlyArray<BlockColor>,
    private readonly indices: ReadonlyArray<number> = [0],
    private readonly colorAt = 0,
    private readonly indexAt = 0,
  ) {
    if (colors.length === 0) throw new Error("Sequence must not be empty");
    if (indices.length === 0) throw new Error("Index sequence must not be empty");
  }

  getNextColor(): { color: BlockColor; newRng: ColorRandomGenerator } {
    const color = this.colors[this.colorAt];
    if (color === undefined) throw new Error("Sequence index out of bounds");
    const next = (this.colorAt + 1) % this.colors.length;
    return {
      color,
      newRng: new SequenceRng(this.colors, this.indices, next, this.indexAt),
    };
  }

  getNextIndex(bound: number): { index: number; newRng: ColorRandomGenerator } {
    const raw = this.indices[this.indexAt];
    if (raw === undefined) throw new Error("Sequence index out of bounds");
    const next = (this.indexAt + 1) % this.indices.length;
    return {
      index: raw % bound,
      newRng: new SequenceRng(this.colors, this.indices, this.colorAt, next),
    };
  }
}
