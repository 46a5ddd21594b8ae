import { describe, expect, it } from "vitest";
import { shrinkToFit, totalWidth } from "./shrink.js";

describe("shrinkToFit", () => {
  it("clamps wide columns to their share of what is left", () => {
    const widths = new Map([
      ["kc1", 7],
      ["kc2", 41],
      ["count", 84],
    ]);
    const shrunk = shrinkToFit(widths, ["kc1", "kc2", "count"], 60, 3);
    expect([...shrunk]).toEqual([
      ["kc1", 7],
      ["kc2", 26],
      ["count", 27],
    ]);
  });

  it("passes unused share on to later columns", () => {
    const widths = new Map([
      ["a", 2],
      ["b", 50],
    ]);
    // a keeps 2 of its 10, b takes the remaining 18
    expect([...shrinkToFit(widths, ["a", "b"], 20, 2)]).toEqual([
      ["a", 2],
      ["b", 18],
    ]);
  });

  it("depends on column order", () => {
    const widths = new Map([
      ["a", 2],
      ["b", 50],
    ]);
    expect([...shrinkToFit(widths, ["b", "a"], 20, 2)]).toEqual([
      ["b", 10],
      ["a", 2],
    ]);
  });

  it("divides by the tracked column count, leaving budget unused", () => {
    const widths = new Map([
      ["kc1", 7],
      ["kc2", 41],
      ["count", 84],
    ]);
    const shrunk = shrinkToFit(widths, ["kc1", "kc2", "count"], 60, 5);
    expect([...shrunk]).toEqual([
      ["kc1", 7],
      ["kc2", 13],
      ["count", 13],
    ]);
  });

  it("keeps only the ordered columns", () => {
    const widths = new Map([
      ["stale", 30],
      ["a", 40],
    ]);
    const shrunk = shrinkToFit(widths, ["a"], 20, 2);
    expect([...shrunk.keys()]).toEqual(["a"]);
    expect(shrunk.get("a")).toBe(10);
  });

  it("never exceeds the budget", () => {
    let seed = 7;
    const next = (max: number): number => {
      seed = (seed * 48271) % 2147483647;
      return seed % max;
    };
    for (let round = 0; round < 200; round++) {
      const count = 1 + next(8);
      const stale = next(4);
      const ordering = Array.from({ length: count }, (_, i) => `c${i}`);
      const widths = new Map(ordering.map((c) => [c, next(120)]));
      const budget = 1 + next(200);
      const shrunk = shrinkToFit(widths, ordering, budget, count + stale);
      expect(totalWidth(shrunk)).toBeLessThanOrEqual(budget);
    }
  });
});

describe("totalWidth", () => {
  it("sums all widths", () => {
    expect(totalWidth(new Map([["a", 3], ["b", 4]]))).toBe(7);
    expect(totalWidth(new Map())).toBe(0);
  });
});
