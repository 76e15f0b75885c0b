import { SpatialError } from "@gridsight/contracts";
import { describe, expect, it } from "vitest";
import { BitGrid } from "../src/core/grid";

describe("BitGrid", () => {
  it("starts cleared", () => {
    const grid = new BitGrid(10, 10);
    expect(grid.count()).toBe(0);
    expect(grid.get(5, 5)).toBe(false);
  });

  it("sets and clears single bits", () => {
    const grid = new BitGrid(40, 3);
    grid.set(33, 1, true);
    grid.set(0, 0, true);

    expect(grid.get(33, 1)).toBe(true);
    expect(grid.get(32, 1)).toBe(false);
    expect(grid.count()).toBe(2);

    grid.set(33, 1, false);
    expect(grid.get(33, 1)).toBe(false);
    expect(grid.count()).toBe(1);
  });

  it("reads out of bounds as false and refuses to write there", () => {
    const grid = new BitGrid(4, 4);
    expect(grid.get(-1, 0)).toBe(false);
    expect(grid.get(4, 0)).toBe(false);
    expect(() => grid.set(0, 4, true)).toThrow(SpatialError);
  });

  it("rejects invalid dimensions", () => {
    expect(() => new BitGrid(0, 5)).toThrow("Width and height should be > 0, got (0, 5)");
    expect(() => new BitGrid(2.5, 5)).toThrow(SpatialError);
  });

  it("ignores padding bits when counting a filled grid", () => {
    const grid = new BitGrid(33, 1);
    grid.fill();
    expect(grid.count()).toBe(33);

    grid.clear();
    expect(grid.count()).toBe(0);
  });

  it("clones independently", () => {
    const grid = new BitGrid(3, 3);
    grid.set(1, 1, true);
    const copy = grid.clone();
    copy.set(2, 2, true);

    expect(grid.get(2, 2)).toBe(false);
    expect(copy.get(1, 1)).toBe(true);
  });

  it("lists set cells in row-major order", () => {
    const grid = new BitGrid(3, 3);
    grid.set(2, 0, true);
    grid.set(0, 2, true);
    grid.set(1, 1, true);

    expect(grid.findSet()).toEqual([
      { x: 2, y: 0 },
      { x: 1, y: 1 },
      { x: 0, y: 2 },
    ]);
  });

  it("converts to and from 0/1 bytes", () => {
    const bytes = new Uint8Array([1, 0, 0, 0, 1, 1]);
    const grid = BitGrid.fromBytes01(3, 2, bytes);

    expect(grid.get(0, 0)).toBe(true);
    expect(grid.get(1, 1)).toBe(true);
    expect(grid.toBytes01()).toEqual(bytes);
  });

  it("rejects byte streams of the wrong length", () => {
    expect(() => BitGrid.fromBytes01(3, 2, new Uint8Array(5))).toThrow(
      "Expected 6 cells for a 3x2 grid, got 5",
    );
  });
});
