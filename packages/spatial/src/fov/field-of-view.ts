/**
 * Field of View
 *
 * Rays are cast from the origin to every cell on the perimeter of the
 * square window around it, then a four-quadrant pass reveals the faces of
 * walls the discrete rays skipped (diagonal corner peeking).
 *
 * The window is a square, not a circle: the radius only clips cells by
 * squared distance along each ray. This makes the corners of the window
 * slightly asymmetric, and the asymmetry is reproducible.
 *
 * @see https://sites.google.com/site/jicenospam/visibilitydetermination
 * @see http://www.roguebasin.com/index.php?title=Comparative_study_of_field_of_view_algorithms_for_2D_grid_based_worlds
 */

import { type GridMap, isInBounds, type Point, SpatialError } from "@gridsight/contracts";
import { BresenhamLine } from "../core/geometry/line";
import { squaredDistance } from "../core/geometry/types";

/**
 * Clipped query window with a visibility buffer in local coordinates.
 */
interface FovWindow {
  readonly map: GridMap;
  readonly offsetX: number;
  readonly offsetY: number;
  readonly width: number;
  /** Origin in local coordinates. */
  readonly origin: Point;
  readonly radiusSquare: number;
  readonly visible: Uint8Array;
}

/**
 * Compute the cells visible from `(x, y)`.
 *
 * - `radius < 1` yields only the origin.
 * - A window that clips to a single row or column yields nothing.
 * - Opaque cells stop rays but are themselves visible; pass
 *   `includeWalls = false` to drop them from the result.
 *
 * @returns Unique in-bounds points, row-major within the window
 * @throws {SpatialError} OUT_OF_BOUNDS when the origin is outside the map
 * @throws {SpatialError} INVALID_RADIUS when the radius is fractional or NaN
 *
 * @example
 * ```typescript
 * for (const { x, y } of fieldOfView(map, player.x, player.y, 8, true)) {
 *   explored.set(x, y, true);
 * }
 * ```
 */
export function fieldOfView(
  map: GridMap,
  x: number,
  y: number,
  radius: number,
  includeWalls: boolean,
): Point[] {
  const dimensions = map.dimensions();
  if (!isInBounds(dimensions, x, y)) {
    throw SpatialError.outOfBounds({ x, y }, dimensions);
  }
  if (Number.isNaN(radius) || (Number.isFinite(radius) && !Number.isInteger(radius))) {
    throw SpatialError.invalidRadius(radius);
  }

  if (radius < 1) {
    return [{ x, y }];
  }

  const minX = Math.max(x - radius, 0);
  const minY = Math.max(y - radius, 0);
  const maxX = Math.min(x + radius, dimensions.width - 1);
  const maxY = Math.min(y + radius, dimensions.height - 1);

  if (maxX - minX === 0 || maxY - minY === 0) {
    // No area to check.
    return [];
  }

  const width = maxX - minX + 1;
  const height = maxY - minY + 1;
  const window: FovWindow = {
    map,
    offsetX: minX,
    offsetY: minY,
    width,
    origin: { x: x - minX, y: y - minY },
    radiusSquare: radius * radius,
    visible: new Uint8Array(width * height),
  };

  window.visible[window.origin.x + window.origin.y * width] = 1;

  const right = width - 1;
  const bottom = height - 1;

  for (let lx = 0; lx <= right; lx++) {
    castRay(window, lx, 0);
    castRay(window, lx, bottom);
  }
  for (let ly = 1; ly < bottom; ly++) {
    castRay(window, 0, ly);
    castRay(window, right, ly);
  }

  const { x: ox, y: oy } = window.origin;
  revealCorners(window, ox + 1, oy + 1, right, bottom, -1, -1); // SE
  revealCorners(window, 0, oy + 1, ox - 1, bottom, 1, -1); // SW
  revealCorners(window, 0, 0, ox - 1, oy - 1, 1, 1); // NW
  revealCorners(window, ox + 1, 0, right, oy - 1, -1, 1); // NE

  return collectVisible(window, includeWalls);
}

function isOpaqueLocal(window: FovWindow, lx: number, ly: number): boolean {
  return window.map.isOpaque(lx + window.offsetX, ly + window.offsetY);
}

/**
 * Walk the line from the origin towards a perimeter cell, marking cells in
 * range, until an opaque cell has been marked.
 */
function castRay(window: FovWindow, targetX: number, targetY: number): void {
  const { origin, radiusSquare, visible, width } = window;
  const line = new BresenhamLine(origin, { x: targetX, y: targetY });
  line.next(); // origin

  for (const p of line) {
    // radiusSquare of 0 means unlimited
    if (squaredDistance(p, origin) <= radiusSquare || radiusSquare === 0) {
      visible[p.x + p.y * width] = 1;
    }

    if (isOpaqueLocal(window, p.x, p.y)) {
      return;
    }
  }
}

/**
 * Reveal hidden opaque cells in one quadrant whose neighbour one step back
 * towards the origin (`dx` along x, `dy` along y) is transparent and visible.
 */
function revealCorners(
  window: FovWindow,
  minX: number,
  minY: number,
  maxX: number,
  maxY: number,
  dx: number,
  dy: number,
): void {
  const { visible, width } = window;

  for (let lx = minX; lx <= maxX; lx++) {
    for (let ly = minY; ly <= maxY; ly++) {
      const index = lx + ly * width;
      if (visible[index] === 1 || !isOpaqueLocal(window, lx, ly)) {
        continue;
      }

      const nx = lx + dx;
      const ny = ly + dy;
      const alongX = !isOpaqueLocal(window, nx, ly) && visible[nx + ly * width] === 1;
      const alongY = !isOpaqueLocal(window, lx, ny) && visible[lx + ny * width] === 1;

      if (alongX || alongY) {
        visible[index] = 1;
      }
    }
  }
}

function collectVisible(window: FovWindow, includeWalls: boolean): Point[] {
  const { visible, width, offsetX, offsetY } = window;
  const points: Point[] = [];

  for (let index = 0; index < visible.length; index++) {
    if (visible[index] !== 1) continue;

    const lx = index % width;
    const x = lx + offsetX;
    const y = (index - lx) / width + offsetY;
    if (!includeWalls && window.map.isOpaque(x, y)) continue;

    points.push({ x, y });
  }

  return points;
}
