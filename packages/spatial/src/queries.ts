/**
 * Query descriptors
 *
 * Entry points for queries that arrive as untrusted data (network messages,
 * saved replays). The descriptor is validated and the endpoints are bounds
 * checked up front, so every failure comes back as an Err instead of a
 * throw.
 */

import {
  type Dimensions,
  type Graph,
  type GridMap,
  isInBounds,
  parseFovQuery,
  parsePathQuery,
  type Point,
  Result,
  SpatialError,
} from "@gridsight/contracts";
import { fieldOfView } from "./fov/field-of-view";
import { astarPath } from "./pathfinding/astar";

function checkBounds(
  dimensions: Dimensions,
  point: Point,
): Result<Point, SpatialError> {
  return isInBounds(dimensions, point.x, point.y)
    ? Result.ok(point)
    : Result.err(SpatialError.outOfBounds(point, dimensions));
}

/**
 * Run a field-of-view query described by `{ origin, radius, includeWalls? }`.
 */
export function runFovQuery(
  map: GridMap,
  input: unknown,
): Result<Point[], SpatialError> {
  return parseFovQuery(input).flatMap((query) =>
    checkBounds(map.dimensions(), query.origin).map((origin) =>
      fieldOfView(map, origin.x, origin.y, query.radius, query.includeWalls),
    ),
  );
}

/**
 * Run a path query described by `{ from, to }`. An unreachable destination
 * is an Ok holding null.
 */
export function runPathQuery(
  graph: Graph,
  input: unknown,
): Result<Point[] | null, SpatialError> {
  const dimensions = graph.dimensions();
  return parsePathQuery(input).flatMap((query) =>
    checkBounds(dimensions, query.from).flatMap((from) =>
      checkBounds(dimensions, query.to).map((to) => astarPath(graph, from, to)),
    ),
  );
}
