/**
 * Dense tile map backed by two bit layers.
 *
 * Satisfies both capabilities the engines consume: `GridMap` for field of
 * view and `WalkableMap` for the four-way path graph. Every cell starts
 * transparent and walkable.
 */

import {
  bitPack01,
  bitUnpack01,
  type Dimensions,
  fromBase64Url,
  type GridMap,
  type GridSnapshot,
  GridSnapshotSchema,
  parseWith,
  type Point,
  Result,
  SpatialError,
  toBase64Url,
  type WalkableMap,
} from "@gridsight/contracts";
import { BresenhamLine } from "../geometry/line";
import { BitGrid } from "./bit-grid";

export interface Tile {
  readonly opaque: boolean;
  readonly walkable: boolean;
}

export const TILES = {
  FLOOR: { opaque: false, walkable: true },
  WALL: { opaque: true, walkable: false },
  /** See-through but impassable (windows, chasms). */
  GLASS: { opaque: false, walkable: false },
  /** Blocks sight but can be walked through (curtains, tall grass). */
  CURTAIN: { opaque: true, walkable: true },
} as const satisfies Record<string, Tile>;

/**
 * Characters understood by {@link TileMap.fromAscii}.
 */
export const ASCII_LEGEND: Readonly<Record<string, Tile>> = {
  ".": TILES.FLOOR,
  "#": TILES.WALL,
  "=": TILES.GLASS,
  "%": TILES.CURTAIN,
};

export class TileMap implements GridMap, WalkableMap {
  readonly width: number;
  readonly height: number;
  private readonly opaque: BitGrid;
  private readonly blocked: BitGrid;

  constructor(width: number, height: number) {
    this.opaque = new BitGrid(width, height);
    this.blocked = new BitGrid(width, height);
    this.width = width;
    this.height = height;
  }

  /**
   * Parse a map drawn as rows of {@link ASCII_LEGEND} characters.
   *
   * @example
   * ```typescript
   * const map = TileMap.fromAscii([
   *   "#####",
   *   "#..=#",
   *   "#####",
   * ]);
   * ```
   */
  static fromAscii(
    rows: readonly string[],
    legend: Readonly<Record<string, Tile>> = ASCII_LEGEND,
  ): TileMap {
    const height = rows.length;
    const width = rows[0]?.length ?? 0;
    const map = new TileMap(width, height);

    rows.forEach((row, y) => {
      if (row.length !== width) {
        throw SpatialError.snapshotInvalid(
          `Row ${y} has ${row.length} cells, expected ${width}`,
          { row: y },
        );
      }
      for (let x = 0; x < width; x++) {
        const char = row.charAt(x);
        const tile = legend[char];
        if (!tile) {
          throw SpatialError.snapshotInvalid(`Unknown tile '${char}' at (${x}, ${y})`, {
            x,
            y,
            char,
          });
        }
        map.setTile(x, y, tile);
      }
    });

    return map;
  }

  /**
   * Decode a serialized map. Validation and decoding failures come back as
   * an Err rather than a throw.
   */
  static fromSnapshot(input: unknown): Result<TileMap, SpatialError> {
    return parseWith(GridSnapshotSchema, input, "SNAPSHOT_INVALID").flatMap(
      (snapshot) =>
        Result.fromThrowable(
          () => {
            const total = snapshot.width * snapshot.height;
            const opaque = bitUnpack01(decodeLayer(snapshot.opaque), total);
            const blocked = bitUnpack01(decodeLayer(snapshot.blocked), total);

            const map = new TileMap(snapshot.width, snapshot.height);
            for (let i = 0; i < total; i++) {
              const x = i % snapshot.width;
              const y = (i - x) / snapshot.width;
              map.setTile(x, y, {
                opaque: opaque[i] === 1,
                walkable: blocked[i] !== 1,
              });
            }
            return map;
          },
          (e) =>
            SpatialError.snapshotDecodeFailed(
              e instanceof Error ? e.message : String(e),
              { width: snapshot.width, height: snapshot.height },
            ),
        ),
    );
  }

  dimensions(): Dimensions {
    return { width: this.width, height: this.height };
  }

  isInBounds(x: number, y: number): boolean {
    return this.opaque.isInBounds(x, y);
  }

  isOpaque(x: number, y: number): boolean {
    return this.opaque.get(x, y);
  }

  isTransparent(x: number, y: number): boolean {
    return this.isInBounds(x, y) && !this.opaque.get(x, y);
  }

  isWalkable(x: number, y: number): boolean {
    return this.isInBounds(x, y) && !this.blocked.get(x, y);
  }

  getTile(x: number, y: number): Tile {
    if (!this.isInBounds(x, y)) {
      throw SpatialError.outOfBounds({ x, y }, this);
    }
    return { opaque: this.opaque.get(x, y), walkable: !this.blocked.get(x, y) };
  }

  setTile(x: number, y: number, tile: Tile): void {
    this.opaque.set(x, y, tile.opaque);
    this.blocked.set(x, y, !tile.walkable);
  }

  setTransparent(x: number, y: number, transparent: boolean): void {
    this.opaque.set(x, y, !transparent);
  }

  setWalkable(x: number, y: number, walkable: boolean): void {
    this.blocked.set(x, y, !walkable);
  }

  /**
   * Fill every cell of the line from `from` to `to` with `tile`.
   */
  buildWall(from: Point, to: Point, tile: Tile = TILES.WALL): void {
    for (const p of new BresenhamLine(from, to)) {
      this.setTile(p.x, p.y, tile);
    }
  }

  toSnapshot(encoding: "raw" | "base64url" = "base64url"): GridSnapshot {
    const opaque = bitPack01(this.opaque.toBytes01());
    const blocked = bitPack01(this.blocked.toBytes01());
    return {
      width: this.width,
      height: this.height,
      opaque: encoding === "raw" ? opaque : toBase64Url(opaque),
      blocked: encoding === "raw" ? blocked : toBase64Url(blocked),
      encoding,
    };
  }
}

function decodeLayer(layer: Uint8Array | string): Uint8Array {
  return typeof layer === "string" ? fromBase64Url(layer) : layer;
}
