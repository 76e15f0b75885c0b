/**
 * Geometry - points, distances and line rasterization
 */

export {
  BresenhamLine,
  bresenham,
  fromOctant0,
  linePoints,
  type Octant,
  octantOf,
  toOctant0,
} from "./line";
export * from "./types";
