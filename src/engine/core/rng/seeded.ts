import { type ColorRandomGenerator } from "./interface";
import { type BlockColor, MAX_COLORS, createBlockColor } from "../types";

// Simple seedable RNG state
export type SeededColorRng = {
  seed: string;
  colorCount: number;
  internalSeed: number;
  // Excluded from the next draw so the same color never comes twice in a row
  lastColor: BlockColor | null;
};

// Create initial RNG state
export function createRng(
  seed = "default",
  colorCount: number = MAX_COLORS,
): SeededColorRng {
  if (!Number.isInteger(colorCount) || colorCount < 1 || colorCount > MAX_COLORS) {
    throw new Error(`colorCount must be from 1 to ${String(MAX_COLORS)}`);
  }
  return {
    colorCount,
    internalSeed: hashString(seed),
    lastColor: null,
    seed,
  };
}

// Simple string hash (FNV-1a, 32-bit) for stable seeds
function hashString(str: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < str.length; i++) {
    h ^= str.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0; // unsigned 32-bit
}

// Simple PRNG (Linear Congruential Generator)
function nextRandom(seed: number): number {
  return (seed * 1664525 + 1013904223) % 2 ** 32;
}

// Scale by the high bits; the low bits of an LCG cycle quickly
function pick(seed: number, bound: number): number {
  return Math.floor((seed / 2 ** 32) * bound);
}

export function getNextIndex(
  rng: SeededColorRng,
  bound: number,
): { index: number; newRng: SeededColorRng } {
  if (!Number.isInteger(bound) || bound < 1) {
    throw new Error("bound must be a positive integer");
  }
  const internalSeed = nextRandom(rng.internalSeed);
  return { index: pick(internalSeed, bound), newRng: { ...rng, internalSeed } };
}

// Next color from the palette prefix, never repeating the previous one
export function getNextColor(rng: SeededColorRng): {
  color: BlockColor;
  newRng: SeededColorRng;
} {
  const pool: Array<number> = [];
  for (let c = 0; c < rng.colorCount; c++) {
    if (rng.colorCount === 1 || c !== rng.lastColor) pool.push(c);
  }
  const r = getNextIndex(rng, pool.length);
  const value = pool[r.index];
  if (value === undefined) {
    throw new Error("Color pool is empty or corrupted");
  }
  const color = createBlockColor(value);
  return { color, newRng: { ...r.newRng, lastColor: color } };
}

/**
 * Wrapper class that implements ColorRandomGenerator for SeededColorRng
 */
export class SeededColorRngImpl implements ColorRandomGenerator {
  constructor(private readonly state: SeededColorRng) {}

  getNextColor(): { color: BlockColor; newRng: ColorRandomGenerator } {
    const result = getNextColor(this.state);
    return {
      color: result.color,
      newRng: new SeededColorRngImpl(result.newRng),
    };
  }

  getNextIndex(bound: number): { index: number; newRng: ColorRandomGenerator } {
    const result = getNextIndex(this.state, bound);
    return {
      index: result.index,
      newRng: new SeededColorRngImpl(result.newRng),
    };
  }
}

/**
 * Create a new seeded color generator with the interface
 */
export function createSeededColorRng(
  seed = "default",
  colorCount: number = MAX_COLORS,
): ColorRandomGenerator {
  return new SeededColorRngImpl(createRng(seed, colorCount));
}
