import { describe, expect, it } from "vitest";
import { SpatialError } from "../src/types/error";

describe("SpatialError", () => {
  it("formats out-of-bounds points with the grid size", () => {
    const error = SpatialError.outOfBounds({ x: -10, y: 15 }, { width: 10, height: 10 });

    expect(error.code).toBe("OUT_OF_BOUNDS");
    expect(error.message).toBe(
      "(x, y) should be between (0, 0) and (10, 10), got (-10, 15)",
    );
    expect(error.details).toEqual({ x: -10, y: 15, width: 10, height: 10 });
  });

  it("formats invalid dimensions", () => {
    const error = SpatialError.invalidDimensions(0, 0);

    expect(error.code).toBe("INVALID_DIMENSIONS");
    expect(error.message).toBe("Width and height should be > 0, got (0, 0)");
  });

  it("is recognised by the type guard", () => {
    expect(SpatialError.isSpatialError(SpatialError.configInvalid("x"))).toBe(true);
    expect(SpatialError.isSpatialError(new Error("x"))).toBe(false);
    expect(SpatialError.configInvalid("x")).toBeInstanceOf(Error);
  });

  it("serializes without empty details", () => {
    expect(SpatialError.snapshotDecodeFailed("truncated").toJSON()).toEqual({
      name: "SpatialError",
      code: "SNAPSHOT_DECODE_FAILED",
      message: "truncated",
    });
    expect(SpatialError.snapshotInvalid("bad", { row: 2 }).toJSON()).toEqual({
      name: "SpatialError",
      code: "SNAPSHOT_INVALID",
      message: "bad",
      details: { row: 2 },
    });
  });
});
