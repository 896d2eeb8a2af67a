import { describe, expect, test } from "@jest/globals";

import {
  createRng,
  createSeededColorRng,
  getNextColor,
  getNextIndex,
} from "@/engine/core/rng/seeded";

import type { ColorRandomGenerator } from "@/engine/core/rng/interface";

function drawColors(rng: ColorRandomGenerator, n: number): Array<number> {
  const out: Array<number> = [];
  let cur = rng;
  for (let i = 0; i < n; i++) {
    const r = cur.getNextColor();
    out.push(r.color);
    cur = r.newRng;
  }
  return out;
}

describe("seeded color rng", () => {
  test("same seed gives the same sequence", () => {
    const a = drawColors(createSeededColorRng("test-seed", 5), 40);
    const b = drawColors(createSeededColorRng("test-seed", 5), 40);
    expect(a).toEqual(b);
  });

  test("different seeds diverge", () => {
    const a = drawColors(createSeededColorRng("seed-a", 6), 40);
    const b = drawColors(createSeededColorRng("seed-b", 6), 40);
    expect(a).not.toEqual(b);
  });

  test("colors stay inside the configured prefix", () => {
    const colors = drawColors(createSeededColorRng("prefix", 3), 200);
    expect(colors.every((c) => c >= 0 && c < 3)).toBe(true);
    expect(new Set(colors).size).toBe(3);
  });

  test("the same color never comes twice in a row", () => {
    const colors = drawColors(createSeededColorRng("no-repeat", 4), 200);
    for (let i = 1; i < colors.length; i++) {
      expect(colors[i]).not.toBe(colors[i - 1]);
    }
  });

  test("a single color repeats", () => {
    expect(drawColors(createSeededColorRng("mono", 1), 5)).toEqual([
      0, 0, 0, 0, 0,
    ]);
  });

  test("drawing does not mutate the generator", () => {
    const rng = createRng("pure", 5);
    const first = getNextColor(rng);
    const again = getNextColor(rng);
    expect(again.color).toBe(first.color);
    expect(rng.lastColor).toBeNull();
    expect(first.newRng.lastColor).toBe(first.color);
  });

  test("indices stay below the bound", () => {
    let rng = createRng("index", 5);
    for (let i = 0; i < 100; i++) {
      const r = getNextIndex(rng, 6);
      expect(r.index).toBeGreaterThanOrEqual(0);
      expect(r.index).toBeLessThan(6);
      rng = r.newRng;
    }
  });

  test("rejects bad bounds and color counts", () => {
    expect(() => getNextIndex(createRng("x", 5), 0)).toThrow(
      "bound must be a positive integer",
    );
    expect(() => createRng("x", 7)).toThrow("colorCount must be from 1 to 6");
  });
});
