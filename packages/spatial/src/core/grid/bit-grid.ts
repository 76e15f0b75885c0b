/**
 * BitGrid - Memory-efficient boolean grid using bit packing.
 * Uses 32 cells per Uint32 element.
 */

import { type Point, SpatialError } from "@gridsight/contracts";

/**
 * Fast popcount for a 32-bit word using SWAR bit tricks.
 */
function popcount32(value: number): number {
  let n = value >>> 0;
  n = n - ((n >>> 1) & 0x55555555);
  n = (n & 0x33333333) + ((n >>> 2) & 0x33333333);
  return ((((n + (n >>> 4)) & 0x0f0f0f0f) * 0x01010101) >>> 24) >>> 0;
}

/**
 * Boolean layer of a grid: opacity, walkability, computed vision.
 */
export class BitGrid {
  readonly width: number;
  readonly height: number;
  private readonly data: Uint32Array;

  constructor(width: number, height: number) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw SpatialError.invalidDimensions(width, height);
    }

    this.width = width;
    this.height = height;
    this.data = new Uint32Array(Math.ceil((width * height) / 32));
  }

  /**
   * Build from a row-major 0/1 byte stream of exactly width * height cells.
   */
  static fromBytes01(width: number, height: number, cells: Uint8Array): BitGrid {
    const grid = new BitGrid(width, height);
    if (cells.length !== width * height) {
      throw new RangeError(
        `Expected ${width * height} cells for a ${width}x${height} grid, got ${cells.length}`,
      );
    }
    for (let i = 0; i < cells.length; i++) {
      if ((cells[i] ?? 0) & 1) {
        grid.setIndex(i, true);
      }
    }
    return grid;
  }

  isInBounds(x: number, y: number): boolean {
    if (!Number.isInteger(x) || !Number.isInteger(y)) return false;
    return x >= 0 && x < this.width && y >= 0 && y < this.height;
  }

  /**
   * Get bit value at coordinates. Out of bounds reads as false.
   */
  get(x: number, y: number): boolean {
    if (!this.isInBounds(x, y)) return false;
    return this.getIndex(y * this.width + x);
  }

  /**
   * Set bit value at coordinates.
   * @throws {SpatialError} OUT_OF_BOUNDS
   */
  set(x: number, y: number, value: boolean): void {
    if (!this.isInBounds(x, y)) {
      throw SpatialError.outOfBounds({ x, y }, this);
    }
    this.setIndex(y * this.width + x, value);
  }

  /**
   * Clear all bits to false
   */
  clear(): void {
    this.data.fill(0);
  }

  /**
   * Set all bits to true
   */
  fill(): void {
    this.data.fill(0xffffffff);
  }

  /**
   * Count number of set bits (only valid cells, not padding)
   */
  count(): number {
    let count = 0;
    const totalCells = this.width * this.height;

    const fullElements = Math.floor(totalCells / 32);
    for (let i = 0; i < fullElements; i++) {
      count += popcount32(this.data[i] ?? 0);
    }

    const remainingBits = totalCells % 32;
    if (remainingBits > 0) {
      const lastElement = this.data[fullElements] ?? 0;
      const mask = 0xffffffff >>> (32 - remainingBits);
      count += popcount32(lastElement & mask);
    }

    return count;
  }

  clone(): BitGrid {
    const result = new BitGrid(this.width, this.height);
    result.data.set(this.data);
    return result;
  }

  /**
   * Row-major 0/1 byte per cell, the layout snapshots are packed from.
   */
  toBytes01(): Uint8Array {
    const out = new Uint8Array(this.width * this.height);
    for (let i = 0; i < out.length; i++) {
      out[i] = this.getIndex(i) ? 1 : 0;
    }
    return out;
  }

  /**
   * Find all coordinates that are set, in row-major order.
   */
  findSet(): Point[] {
    const points: Point[] = [];
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        if (this.getIndex(y * this.width + x)) {
          points.push({ x, y });
        }
      }
    }
    return points;
  }

  private getIndex(index: number): boolean {
    const word = this.data[index >>> 5];
    if (word === undefined) return false;
    return (word & (1 << (index & 31))) !== 0;
  }

  private setIndex(index: number, value: boolean): void {
    const arrayIndex = index >>> 5;
    const current = this.data[arrayIndex] ?? 0;
    const bit = 1 << (index & 31);
    this.data[arrayIndex] = value ? current | bit : current & ~bit;
  }
}
