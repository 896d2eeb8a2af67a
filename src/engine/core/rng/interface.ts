import { type BlockColor } from "../types";

/**
 * Interface for color random generators.
 * Production code uses a seeded generator; tests use a fixed sequence.
 */
export type ColorRandomGenerator = {
  /**
   * Next block color and a new generator state (immutable pattern)
   */
  getNextColor(): {
    color: BlockColor;
    newRng: ColorRandomGenerator;
  };

  /** Uniform integer in [0, bound) and a new generator state */
  getNextIndex(bound: number): {
    index: number;
    newRng: ColorRandomGenerator;
  };
};
