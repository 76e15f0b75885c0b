/**
 * Bresenham line rasterization.
 *
 * The direction vector is classified into one of eight octants, both
 * endpoints are mapped into octant 0 (dx >= dy >= 0), a single integer
 * stepping loop runs there, and every point is mapped back before it is
 * yielded.
 *
 * @see https://en.wikipedia.org/wiki/Bresenham%27s_line_algorithm
 *
 * @example
 * ```typescript
 * for (const p of new BresenhamLine({ x: 0, y: 1 }, { x: 6, y: 4 })) {
 *   // (0,1) (1,1) (2,2) (3,2) (4,3) (5,3) (6,4)
 * }
 * ```
 */

import type { Point } from "@gridsight/contracts";

/**
 * Octant index in [0, 8).
 */
export type Octant = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7;

/**
 * Classify the direction from `start` to `end`.
 */
export function octantOf(start: Point, end: Point): Octant {
  let dx = end.x - start.x;
  let dy = end.y - start.y;
  let octant = 0;

  if (dy < 0) {
    dx = -dx;
    dy = -dy;
    octant += 4;
  }

  if (dx < 0) {
    const tmp = dx;
    dx = dy;
    dy = -tmp;
    octant += 2;
  }

  if (dx < dy) {
    octant += 1;
  }

  return toOctant(octant);
}

const OCTANTS: readonly Octant[] = [0, 1, 2, 3, 4, 5, 6, 7];

function toOctant(value: number): Octant {
  const octant = OCTANTS[value];
  if (octant === undefined) {
    throw new RangeError(`Octant out of range: ${value}`);
  }
  return octant;
}

/**
 * Map a point from `octant` into octant 0.
 */
export function toOctant0(octant: Octant, p: Point): Point {
  switch (octant) {
    case 0:
      return { x: p.x, y: p.y };
    case 1:
      return { x: p.y, y: p.x };
    case 2:
      return { x: p.y, y: -p.x };
    case 3:
      return { x: -p.x, y: p.y };
    case 4:
      return { x: -p.x, y: -p.y };
    case 5:
      return { x: -p.y, y: -p.x };
    case 6:
      return { x: -p.y, y: p.x };
    case 7:
      return { x: p.x, y: -p.y };
  }
}

/**
 * Inverse of {@link toOctant0}.
 */
export function fromOctant0(octant: Octant, p: Point): Point {
  switch (octant) {
    case 0:
      return { x: p.x, y: p.y };
    case 1:
      return { x: p.y, y: p.x };
    case 2:
      return { x: -p.y, y: p.x };
    case 3:
      return { x: -p.x, y: p.y };
    case 4:
      return { x: -p.x, y: -p.y };
    case 5:
      return { x: -p.y, y: -p.x };
    case 6:
      return { x: p.y, y: -p.x };
    case 7:
      return { x: p.x, y: -p.y };
  }
}

/**
 * Lazy iterator over the cells of a line, `start` and `end` included.
 *
 * Single pass: once exhausted it stays exhausted.
 */
export class BresenhamLine implements IterableIterator<Point> {
  /** Number of points the iterator yields in total. */
  readonly length: number;

  private readonly octant: Octant;
  private readonly dx: number;
  private readonly dy: number;
  private readonly endX: number;
  private readonly endY: number;
  private x: number;
  private y: number;
  private diff: number;

  constructor(start: Point, end: Point) {
    this.octant = octantOf(start, end);

    const from = toOctant0(this.octant, start);
    const to = toOctant0(this.octant, end);

    this.dx = to.x - from.x;
    this.dy = to.y - from.y;
    this.x = from.x;
    this.y = from.y;
    this.endX = to.x;
    this.endY = to.y;
    this.diff = this.dy - this.dx;
    this.length = this.dx + 1;
  }

  next(): IteratorResult<Point> {
    if (this.x === this.endX) {
      this.x++;
      return {
        done: false,
        value: fromOctant0(this.octant, { x: this.endX, y: this.endY }),
      };
    }

    if (this.x > this.endX) {
      return { done: true, value: undefined };
    }

    const point = fromOctant0(this.octant, { x: this.x, y: this.y });

    if (this.diff >= 0) {
      this.y++;
      this.diff -= this.dx;
    }
    this.diff += this.dy;
    this.x++;

    return { done: false, value: point };
  }

  [Symbol.iterator](): IterableIterator<Point> {
    return this;
  }
}

export function bresenham(start: Point, end: Point): BresenhamLine {
  return new BresenhamLine(start, end);
}

/**
 * Collect every point of the line into an array.
 */
export function linePoints(start: Point, end: Point): Point[] {
  return Array.from(new BresenhamLine(start, end));
}
