/**
 * 2D point with integer coordinates. Compared by value only.
 */
export interface Point {
  readonly x: number;
  readonly y: number;
}

/**
 * Grid dimensions, both strictly positive.
 */
export interface Dimensions {
  readonly width: number;
  readonly height: number;
}

export function pointsEqual(a: Point, b: Point): boolean {
  return a.x === b.x && a.y === b.y;
}

/**
 * Only integer coordinates are ever in bounds.
 */
export function isInBounds(dimensions: Dimensions, x: number, y: number): boolean {
  return (
    Number.isInteger(x) &&
    Number.isInteger(y) &&
    x >= 0 &&
    y >= 0 &&
    x < dimensions.width &&
    y < dimensions.height
  );
}
