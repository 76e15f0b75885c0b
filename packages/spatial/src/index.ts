/**
 * Spatial queries for 2D grid maps: line rasterization, field of view and
 * A* pathfinding.
 *
 * @example
 * ```typescript
 * import { TileMap, astarPathFourWayGrid, fieldOfView } from "@gridsight/spatial";
 *
 * const map = new TileMap(10, 10);
 * map.buildWall({ x: 3, y: 3 }, { x: 3, y: 6 });
 *
 * const visible = fieldOfView(map, 1, 1, 8, true);
 * const path = astarPathFourWayGrid(map, { x: 0, y: 4 }, { x: 5, y: 4 });
 * ```
 */

export * from "./core/geometry";
export * from "./core/grid";
export * from "./fov";
export * from "./pathfinding";
export { runFovQuery, runPathQuery } from "./queries";
export {
  type AsciiCharset,
  DEFAULT_CHARSET,
  type RenderOptions,
  renderPath,
  renderVision,
  SIMPLE_CHARSET,
} from "./utils/ascii-renderer";
