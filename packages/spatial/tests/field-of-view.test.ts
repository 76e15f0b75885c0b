import { type Point, SeededRandom, SpatialError } from "@gridsight/contracts";
import { describe, expect, it } from "vitest";
import { TileMap } from "../src/core/grid";
import { fieldOfView } from "../src/fov";
import { renderVision } from "../src/utils/ascii-renderer";

const key = (p: Point) => `${p.x},${p.y}`;
const has = (points: readonly Point[], x: number, y: number) =>
  points.some((p) => p.x === x && p.y === y);

/** 10x10 with a wall along y = 3 (x >= 1) and down the right edge. */
function corridorMap(): TileMap {
  const map = new TileMap(10, 10);
  map.buildWall({ x: 1, y: 3 }, { x: 9, y: 3 });
  map.buildWall({ x: 9, y: 0 }, { x: 9, y: 9 });
  return map;
}

describe("fieldOfView", () => {
  it("stops at walls and shows them", () => {
    const map = corridorMap();
    const visible = fieldOfView(map, 3, 2, 10, true);

    expect(visible).toHaveLength(40);
    expect(renderVision(map, visible, { origin: { x: 3, y: 2 } })).toBe(
      [
        "+----------+",
        "|         □|",
        "|         □|",
        "|   *     □|",
        "| □□□□□□□□□|",
        "|??????????|",
        "|??????????|",
        "|??????????|",
        "|??????????|",
        "|??????????|",
        "|??????????|",
        "+----------+",
      ].join("\n"),
    );
  });

  it("drops opaque cells when includeWalls is false", () => {
    const visible = fieldOfView(corridorMap(), 3, 2, 10, false);

    expect(visible).toHaveLength(28);
    expect(has(visible, 9, 0)).toBe(false);
    expect(has(visible, 0, 3)).toBe(true);
  });

  it("clips an open map to a disc in row-major order", () => {
    const visible = fieldOfView(new TileMap(7, 7), 3, 3, 2, true);

    expect(visible).toEqual([
      { x: 3, y: 1 },
      { x: 2, y: 2 },
      { x: 3, y: 2 },
      { x: 4, y: 2 },
      { x: 1, y: 3 },
      { x: 2, y: 3 },
      { x: 3, y: 3 },
      { x: 4, y: 3 },
      { x: 5, y: 3 },
      { x: 2, y: 4 },
      { x: 3, y: 4 },
      { x: 4, y: 4 },
      { x: 3, y: 5 },
    ]);
  });

  it("uses squared distance for the radius check", () => {
    const visible = fieldOfView(new TileMap(45, 45), 22, 22, 5, true);

    expect(visible).toHaveLength(81);
    expect(has(visible, 27, 22)).toBe(true);
    expect(has(visible, 26, 25)).toBe(true);
    expect(has(visible, 26, 26)).toBe(false);
  });

  it("returns one connected region on an open map", () => {
    const visible = fieldOfView(new TileMap(45, 45), 22, 22, 24, true);
    expect(visible).toHaveLength(1737);

    const inView = new Set(visible.map(key));
    const reached = new Set(["22,22"]);
    const stack: Point[] = [{ x: 22, y: 22 }];
    for (let p = stack.pop(); p; p = stack.pop()) {
      for (const q of [
        { x: p.x + 1, y: p.y },
        { x: p.x - 1, y: p.y },
        { x: p.x, y: p.y + 1 },
        { x: p.x, y: p.y - 1 },
      ]) {
        if (inView.has(key(q)) && !reached.has(key(q))) {
          reached.add(key(q));
          stack.push(q);
        }
      }
    }
    expect(reached.size).toBe(1737);
  });

  it("sees the face of a pillar but not behind it", () => {
    const map = new TileMap(9, 9);
    map.setTransparent(4, 3, false);
    const visible = fieldOfView(map, 2, 3, 6, true);

    expect(has(visible, 4, 3)).toBe(true);
    expect(has(visible, 5, 3)).toBe(false);
    expect(has(visible, 6, 3)).toBe(false);
    expect(has(visible, 7, 3)).toBe(false);
  });

  it("reveals wall corners that no ray reaches", () => {
    const map = TileMap.fromAscii([
      "############",
      "#..........#",
      "#....#.....#",
      "#....##....#",
      "#..........#",
      "#..........#",
      "#..........#",
      "############",
    ]);
    const visible = fieldOfView(map, 2, 4, 10, true);

    expect(visible).toHaveLength(80);
    expect(has(visible, 6, 3)).toBe(true);
    expect(renderVision(map, visible, { origin: { x: 2, y: 4 } })).toBe(
      [
        "+------------+",
        "|□□□□□□□?????|",
        "|□     ??????|",
        "|□    □?????□|",
        "|□    □□    □|",
        "|□ *        □|",
        "|□          □|",
        "|□          □|",
        "|□□□□□□□□□□□□|",
        "+------------+",
      ].join("\n"),
    );
  });

  it("returns only the origin when the radius is not positive", () => {
    const map = new TileMap(5, 5);
    expect(fieldOfView(map, 2, 2, 0, true)).toEqual([{ x: 2, y: 2 }]);
    expect(fieldOfView(map, 2, 2, -3, true)).toEqual([{ x: 2, y: 2 }]);
  });

  it("handles origins on the map edge", () => {
    expect(fieldOfView(new TileMap(5, 5), 0, 0, 1, true)).toEqual([
      { x: 0, y: 0 },
      { x: 1, y: 0 },
      { x: 0, y: 1 },
    ]);
  });

  it("rejects fractional and NaN radii", () => {
    const map = new TileMap(7, 7);

    expect(() => fieldOfView(map, 3, 3, 2.5, true)).toThrow("Radius should be an integer, got 2.5");
    expect(() => fieldOfView(map, 3, 3, Number.NaN, true)).toThrow(SpatialError);
  });

  it("treats an infinite radius as unlimited", () => {
    expect(fieldOfView(new TileMap(7, 7), 3, 3, Infinity, true)).toHaveLength(49);
  });

  it("rejects fractional origins", () => {
    expect(() => fieldOfView(new TileMap(7, 7), 3.5, 3, 2, true)).toThrow(
      "(x, y) should be between (0, 0) and (7, 7), got (3.5, 3)",
    );
  });

  it("returns nothing when the clipped window has no width", () => {
    expect(fieldOfView(new TileMap(1, 5), 0, 2, 3, true)).toEqual([]);
  });

  it("throws OUT_OF_BOUNDS for an origin outside the map", () => {
    const map = new TileMap(5, 5);
    expect(() => fieldOfView(map, 5, 0, 3, true)).toThrow(SpatialError);
    expect(() => fieldOfView(map, -1, 2, 3, true)).toThrow(
      "(x, y) should be between (0, 0) and (5, 5), got (-1, 2)",
    );
  });

  it("keeps its invariants on random maps", () => {
    const rng = new SeededRandom(7);

    for (let round = 0; round < 40; round++) {
      const width = rng.range(8, 30);
      const height = rng.range(8, 30);
      const map = new TileMap(width, height);
      const walls = rng.range(0, Math.floor((width * height) / 4));
      for (let i = 0; i < walls; i++) {
        map.setTransparent(rng.range(0, width - 1), rng.range(0, height - 1), false);
      }
      const ox = rng.range(0, width - 1);
      const oy = rng.range(0, height - 1);
      const radius = rng.range(1, 15);

      const visible = fieldOfView(map, ox, oy, radius, true);
      const inView = new Set(visible.map(key));

      expect(inView.size).toBe(visible.length);
      expect(inView.has(`${ox},${oy}`)).toBe(true);

      for (const p of visible) {
        expect(map.isInBounds(p.x, p.y)).toBe(true);
        const dx = p.x - ox;
        const dy = p.y - oy;
        const inRange = dx * dx + dy * dy <= radius * radius;
        const revealedWall =
          map.isOpaque(p.x, p.y) &&
          [
            [1, 0],
            [-1, 0],
            [0, 1],
            [0, -1],
          ].some(([sx = 0, sy = 0]) => {
            const n = { x: p.x + sx, y: p.y + sy };
            return inView.has(key(n)) && map.isTransparent(n.x, n.y);
          });
        expect(inRange || revealedWall).toBe(true);
      }

      const floorOnly = fieldOfView(map, ox, oy, radius, false);
      expect(floorOnly.every((p) => !map.isOpaque(p.x, p.y))).toBe(true);
      expect(floorOnly).toEqual(visible.filter((p) => !map.isOpaque(p.x, p.y)));
    }
  });
});
