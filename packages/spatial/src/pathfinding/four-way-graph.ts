/**
 * Four-directional grid graph.
 *
 * Wraps any walkability source as a {@link Graph} with unit step costs,
 * a Manhattan heuristic, and a 0.001 parity nudge that makes equal-length
 * routes alternate between horizontal and vertical steps instead of
 * producing one long L.
 *
 * @see https://www.redblobgames.com/pathfinding/a-star/implementation.html#troubleshooting-ugly-path
 */

import {
  type Dimensions,
  type Graph,
  isInBounds,
  type Point,
  type WalkableMap,
} from "@gridsight/contracts";
import { manhattanDistance } from "../core/geometry/types";

export const STEP_COST = 1;
export const TIE_BREAK_NUDGE = 0.001;

function isEvenCell(x: number, y: number): boolean {
  return ((x + y) & 1) === 0;
}

export class FourWayGridGraph implements Graph {
  constructor(private readonly map: WalkableMap) {}

  dimensions(): Dimensions {
    return this.map.dimensions();
  }

  isWalkable(x: number, y: number): boolean {
    return this.map.isWalkable(x, y);
  }

  /**
   * Even cells are charged the nudge for horizontal steps, odd cells for
   * vertical ones.
   */
  costBetween(from: Point, to: Point): number {
    const even = isEvenCell(from.x, from.y);
    const nudged = even ? to.x !== from.x : to.y !== from.y;
    return STEP_COST + (nudged ? TIE_BREAK_NUDGE : 0);
  }

  heuristic(from: Point, to: Point): number {
    return manhattanDistance(from, to);
  }

  /**
   * Even cells list S, N, W, E; odd cells E, W, N, S.
   */
  neighbors(point: Point): Point[] {
    const { x, y } = point;
    const candidates: readonly Point[] = isEvenCell(x, y)
      ? [
          { x, y: y + 1 },
          { x, y: y - 1 },
          { x: x - 1, y },
          { x: x + 1, y },
        ]
      : [
          { x: x + 1, y },
          { x: x - 1, y },
          { x, y: y - 1 },
          { x, y: y + 1 },
        ];

    const dimensions = this.map.dimensions();
    const result: Point[] = [];
    for (const candidate of candidates) {
      if (
        isInBounds(dimensions, candidate.x, candidate.y) &&
        this.map.isWalkable(candidate.x, candidate.y)
      ) {
        result.push(candidate);
      }
    }
    return result;
  }
}
