import { SeededRandom } from "@gridsight/contracts";
import { describe, expect, it } from "vitest";
import {
  BresenhamLine,
  bresenham,
  chebyshevDistance,
  fromOctant0,
  linePoints,
  type Octant,
  manhattanDistance,
  octantOf,
  squaredDistance,
  toOctant0,
} from "../src/core/geometry";

const pts = (...coords: Array<[number, number]>) => coords.map(([x, y]) => ({ x, y }));

describe("BresenhamLine", () => {
  it("rasterizes the textbook example", () => {
    const line = new BresenhamLine({ x: 0, y: 1 }, { x: 6, y: 4 });

    expect(line.length).toBe(7);
    expect(Array.from(line)).toEqual(pts([0, 1], [1, 1], [2, 2], [3, 2], [4, 3], [5, 3], [6, 4]));
  });

  it("walks the same segment backwards", () => {
    expect(linePoints({ x: 6, y: 4 }, { x: 0, y: 1 })).toEqual(
      pts([6, 4], [5, 4], [4, 3], [3, 3], [2, 2], [1, 2], [0, 1]),
    );
  });

  it("handles straight horizontal and vertical lines", () => {
    expect(linePoints({ x: 2, y: 3 }, { x: 5, y: 3 })).toEqual(pts([2, 3], [3, 3], [4, 3], [5, 3]));
    expect(linePoints({ x: 2, y: 3 }, { x: 2, y: 6 })).toEqual(pts([2, 3], [2, 4], [2, 5], [2, 6]));
  });

  it("supports negative coordinates", () => {
    expect(linePoints({ x: 0, y: 0 }, { x: -3, y: -7 })).toEqual(
      pts([0, 0], [0, -1], [0, -2], [-1, -3], [-1, -4], [-2, -5], [-2, -6], [-3, -7]),
    );
  });

  it("yields a single point when start equals end", () => {
    const line = new BresenhamLine({ x: 4, y: 4 }, { x: 4, y: 4 });

    expect(line.length).toBe(1);
    expect(Array.from(line)).toEqual(pts([4, 4]));
  });

  it("is exhausted after one pass", () => {
    const line = new BresenhamLine({ x: 0, y: 0 }, { x: 3, y: 1 });

    expect(Array.from(line)).toHaveLength(4);
    expect(Array.from(line)).toEqual([]);
    expect(line.next().done).toBe(true);
  });

  it("starts at start, ends at end, and moves one king step at a time", () => {
    const rng = new SeededRandom(2024);

    for (let i = 0; i < 2000; i++) {
      const start = { x: rng.range(-20, 20), y: rng.range(-20, 20) };
      const end = { x: rng.range(-20, 20), y: rng.range(-20, 20) };
      const points = linePoints(start, end);

      expect(points[0]).toEqual(start);
      expect(points[points.length - 1]).toEqual(end);
      expect(points).toHaveLength(
        Math.max(Math.abs(end.x - start.x), Math.abs(end.y - start.y)) + 1,
      );
      for (let k = 1; k < points.length; k++) {
        const a = points[k - 1];
        const b = points[k];
        if (!a || !b) throw new Error("missing point");
        expect(Math.max(Math.abs(a.x - b.x), Math.abs(a.y - b.y))).toBe(1);
      }
    }
  });
});

describe("octant transforms", () => {
  it("classifies one direction per octant", () => {
    const origin = { x: 0, y: 0 };

    expect(octantOf(origin, { x: 5, y: 2 })).toBe(0);
    expect(octantOf(origin, { x: 2, y: 5 })).toBe(1);
    expect(octantOf(origin, { x: -2, y: 5 })).toBe(2);
    expect(octantOf(origin, { x: -5, y: 2 })).toBe(3);
    expect(octantOf(origin, { x: -5, y: -2 })).toBe(4);
    expect(octantOf(origin, { x: -2, y: -5 })).toBe(5);
    expect(octantOf(origin, { x: 2, y: -5 })).toBe(6);
    expect(octantOf(origin, { x: 5, y: -2 })).toBe(7);
  });

  it("maps every direction into dx >= dy >= 0", () => {
    const origin = { x: 0, y: 0 };
    const targets = pts([5, 2], [2, 5], [-2, 5], [-5, 2], [-5, -2], [-2, -5], [2, -5], [5, -2]);

    for (const target of targets) {
      const canonical = toOctant0(octantOf(origin, target), target);
      expect(canonical.x).toBeGreaterThanOrEqual(canonical.y);
      expect(canonical.y).toBeGreaterThanOrEqual(0);
    }
  });

  it("inverts toOctant0 with fromOctant0", () => {
    const octants: Octant[] = [0, 1, 2, 3, 4, 5, 6, 7];
    const p = { x: 3, y: -8 };

    for (const octant of octants) {
      expect(fromOctant0(octant, toOctant0(octant, p))).toEqual(p);
    }
  });
});

describe("distances", () => {
  const a = { x: 1, y: 2 };
  const b = { x: 4, y: -2 };

  it("measures grid distances", () => {
    expect(manhattanDistance(a, b)).toBe(7);
    expect(chebyshevDistance(a, b)).toBe(4);
    expect(squaredDistance(a, b)).toBe(25);
  });

  it("matches the line length to the Chebyshev distance", () => {
    expect(bresenham(a, b).length).toBe(chebyshevDistance(a, b) + 1);
  });
});
