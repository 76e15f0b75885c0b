/**
 * A* Pathfinding
 *
 * Best-first search over any {@link Graph}, ordered by f = g + heuristic.
 * Cost-so-far and predecessors live in flat typed arrays indexed by
 * `x + y * width`; the search stops as soon as the destination is popped.
 *
 * @see https://www.redblobgames.com/pathfinding/a-star/implementation.html
 */

import {
  type Graph,
  isInBounds,
  type Point,
  pointsEqual,
  SpatialError,
  type WalkableMap,
} from "@gridsight/contracts";
import { chebyshevDistance } from "../core/geometry/types";
import { FourWayGridGraph } from "./four-way-graph";
import { Frontier } from "./frontier";

const NO_PARENT = -1;

/**
 * Find a shortest path from `from` to `to`.
 *
 * @returns The cells to walk through, `from` and `to` included, or null
 *          when `to` cannot be reached
 * @throws {SpatialError} OUT_OF_BOUNDS when either endpoint is outside the graph
 *
 * @example
 * ```typescript
 * const path = astarPath(graph, monster, player);
 * if (path && path.length > 1) {
 *   moveTo(path[1]);
 * }
 * ```
 */
export function astarPath(graph: Graph, from: Point, to: Point): Point[] | null {
  const dimensions = graph.dimensions();
  if (!isInBounds(dimensions, from.x, from.y)) {
    throw SpatialError.outOfBounds(from, dimensions);
  }
  if (!isInBounds(dimensions, to.x, to.y)) {
    throw SpatialError.outOfBounds(to, dimensions);
  }

  if (pointsEqual(from, to)) {
    return [{ x: from.x, y: from.y }];
  }

  const { width, height } = dimensions;
  const costSoFar = new Float64Array(width * height).fill(Infinity);
  const cameFrom = new Int32Array(width * height).fill(NO_PARENT);

  const distance = chebyshevDistance(from, to);
  const frontier = new Frontier(Math.min(distance * distance, width * height));

  const fromIndex = from.x + from.y * width;
  const toIndex = to.x + to.y * width;
  costSoFar[fromIndex] = 0;
  frontier.push(fromIndex, 0);

  let reached = false;

  while (!frontier.isEmpty) {
    const currentIndex = frontier.pop();
    if (currentIndex === toIndex) {
      reached = true;
      break;
    }

    const current = indexToPoint(currentIndex, width);
    const currentCost = costSoFar[currentIndex] ?? Infinity;

    for (const next of graph.neighbors(current)) {
      const nextIndex = next.x + next.y * width;
      const newCost = currentCost + graph.costBetween(current, next);

      if (newCost < (costSoFar[nextIndex] ?? Infinity)) {
        costSoFar[nextIndex] = newCost;
        cameFrom[nextIndex] = currentIndex;
        frontier.push(nextIndex, newCost + graph.heuristic(next, to));
      }
    }
  }

  if (!reached) {
    return null;
  }

  return reconstructPath(cameFrom, fromIndex, toIndex, width);
}

/**
 * Convenience wrapper searching a walkability map with {@link FourWayGridGraph}.
 */
export function astarPathFourWayGrid(
  map: WalkableMap,
  from: Point,
  to: Point,
): Point[] | null {
  return astarPath(new FourWayGridGraph(map), from, to);
}

function indexToPoint(index: number, width: number): Point {
  const x = index % width;
  return { x, y: (index - x) / width };
}

function reconstructPath(
  cameFrom: Int32Array,
  fromIndex: number,
  toIndex: number,
  width: number,
): Point[] | null {
  const path: Point[] = [];
  let current = toIndex;

  while (current !== fromIndex) {
    if (current === NO_PARENT) {
      return null;
    }
    path.push(indexToPoint(current, width));
    current = cameFrom[current] ?? NO_PARENT;
  }
  path.push(indexToPoint(fromIndex, width));

  return path.reverse();
}
