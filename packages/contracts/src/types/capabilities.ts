/**
 * Capability interfaces consumed by the spatial algorithms.
 *
 * Any grid representation (dense array, sparse map, procedural) can satisfy
 * them. The algorithms only read through these methods and never keep a
 * reference past the call.
 */

import type { Dimensions, Point } from "./geometry";

/**
 * Opacity source for field-of-view queries.
 *
 * @example
 * ```typescript
 * const open: GridMap = {
 *   dimensions: () => ({ width: 45, height: 45 }),
 *   isOpaque: () => false,
 * };
 * ```
 */
export interface GridMap {
  dimensions(): Dimensions;
  /** Only called with in-bounds coordinates. */
  isOpaque(x: number, y: number): boolean;
}

/**
 * Walkability source wrapped by the four-way grid graph.
 */
export interface WalkableMap {
  dimensions(): Dimensions;
  /** Only called with in-bounds coordinates. */
  isWalkable(x: number, y: number): boolean;
}

/**
 * Weighted graph over grid cells, searched by A*.
 *
 * `heuristic` must never overestimate the remaining `costBetween` sum for the
 * search to return a shortest path.
 */
export interface Graph extends WalkableMap {
  costBetween(from: Point, to: Point): number;
  heuristic(from: Point, to: Point): number;
  /** Walkable, in-bounds cells reachable from `point` in one step. */
  neighbors(point: Point): Point[];
}
