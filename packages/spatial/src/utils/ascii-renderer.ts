/**
 * ASCII Renderer
 *
 * Draws field-of-view and path results as text for debugging and tests.
 *
 * @example
 * ```typescript
 * const visible = fieldOfView(map, 3, 2, 10, true);
 * console.log(renderVision(map, visible, { origin: { x: 3, y: 2 } }));
 * ```
 */

import type { GridMap, Point, WalkableMap } from "@gridsight/contracts";

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface AsciiCharset {
  readonly origin: string;
  /** Visible transparent cell / open cell on a path map. */
  readonly floor: string;
  /** Visible opaque cell / blocked cell on a path map. */
  readonly wall: string;
  readonly unseen: string;
  readonly path: string;
  readonly corner: string;
  readonly horizontal: string;
  readonly vertical: string;
}

export const DEFAULT_CHARSET: AsciiCharset = {
  origin: "*",
  floor: " ",
  wall: "□",
  unseen: "?",
  path: "o",
  corner: "+",
  horizontal: "-",
  vertical: "|",
};

/**
 * Charset for terminals without unicode support
 */
export const SIMPLE_CHARSET: AsciiCharset = {
  origin: "@",
  floor: ".",
  wall: "#",
  unseen: " ",
  path: "*",
  corner: "+",
  horizontal: "-",
  vertical: "|",
};

export interface RenderOptions {
  readonly charset?: AsciiCharset;
  /** Cell drawn with `charset.origin` */
  readonly origin?: Point;
  /** Surround the map with a frame (default: true) */
  readonly border?: boolean;
}

// =============================================================================
// RENDERING
// =============================================================================

/**
 * Render the visible cells of `map`. Cells not in `visible` are drawn as
 * unseen whatever they contain.
 */
export function renderVision(
  map: GridMap,
  visible: readonly Point[],
  options: RenderOptions = {},
): string {
  const charset = options.charset ?? DEFAULT_CHARSET;
  const { width, height } = map.dimensions();
  const seen = new Uint8Array(width * height);
  for (const p of visible) {
    seen[p.x + p.y * width] = 1;
  }

  const rows: string[] = [];
  for (let y = 0; y < height; y++) {
    let row = "";
    for (let x = 0; x < width; x++) {
      if (options.origin && options.origin.x === x && options.origin.y === y) {
        row += charset.origin;
      } else if (seen[x + y * width] !== 1) {
        row += charset.unseen;
      } else {
        row += map.isOpaque(x, y) ? charset.wall : charset.floor;
      }
    }
    rows.push(row);
  }

  return frame(rows, width, charset, options.border ?? true);
}

/**
 * Render walkability with `path` overlaid; the first path cell is drawn as
 * the origin.
 */
export function renderPath(
  map: WalkableMap,
  path: readonly Point[],
  options: RenderOptions = {},
): string {
  const charset = options.charset ?? SIMPLE_CHARSET;
  const { width, height } = map.dimensions();
  const onPath = new Uint8Array(width * height);
  for (const p of path) {
    onPath[p.x + p.y * width] = 1;
  }
  const origin = options.origin ?? path[0];

  const rows: string[] = [];
  for (let y = 0; y < height; y++) {
    let row = "";
    for (let x = 0; x < width; x++) {
      if (origin && origin.x === x && origin.y === y) {
        row += charset.origin;
      } else if (onPath[x + y * width] === 1) {
        row += charset.path;
      } else {
        row += map.isWalkable(x, y) ? charset.floor : charset.wall;
      }
    }
    rows.push(row);
  }

  return frame(rows, width, charset, options.border ?? true);
}

function frame(
  rows: readonly string[],
  width: number,
  charset: AsciiCharset,
  border: boolean,
): string {
  if (!border) {
    return rows.join("\n");
  }
  const edge = charset.corner + charset.horizontal.repeat(width) + charset.corner;
  return [edge, ...rows.map((row) => charset.vertical + row + charset.vertical), edge].join("\n");
}
