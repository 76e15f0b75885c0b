/**
 * Vision Map
 *
 * Keeps the most recent field of view of a map as a bit layer so callers
 * can ask "is this cell in view?" in O(1). Every call recomputes from
 * scratch; there is no dirty tracking.
 */

import type { Dimensions, GridMap, Point } from "@gridsight/contracts";
import { BitGrid } from "../core/grid/bit-grid";
import { fieldOfView } from "./field-of-view";

export interface VisionOptions {
  /** Keep opaque cells in the visible set (default: true) */
  readonly includeWalls?: boolean;
}

const DEFAULT_OPTIONS: Required<VisionOptions> = {
  includeWalls: true,
};

export class VisionMap {
  private readonly vision: BitGrid;
  private readonly options: Required<VisionOptions>;
  private origin: Point | null = null;
  private count = 0;

  constructor(
    private readonly map: GridMap,
    options: VisionOptions = {},
  ) {
    const { width, height } = map.dimensions();
    this.vision = new BitGrid(width, height);
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  dimensions(): Dimensions {
    return this.map.dimensions();
  }

  /**
   * Replace the stored view with the one seen from `(x, y)`.
   *
   * @returns The visible points, as {@link fieldOfView} returns them
   * @throws {SpatialError} OUT_OF_BOUNDS when the origin is outside the map
   */
  calculateFov(x: number, y: number, radius: number): Point[] {
    const visible = fieldOfView(this.map, x, y, radius, this.options.includeWalls);

    this.vision.clear();
    for (const p of visible) {
      this.vision.set(p.x, p.y, true);
    }
    this.origin = { x, y };
    this.count = visible.length;

    return visible;
  }

  /**
   * Out-of-bounds cells are never in view.
   */
  isInFov(x: number, y: number): boolean {
    return this.vision.get(x, y);
  }

  get visibleCount(): number {
    return this.count;
  }

  /**
   * Origin of the last computation, or null if none has run since the
   * last clear.
   */
  get lastOrigin(): Point | null {
    return this.origin;
  }

  clear(): void {
    this.vision.clear();
    this.origin = null;
    this.count = 0;
  }
}
