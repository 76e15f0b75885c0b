/**
 * Error codes for spatial query operations.
 * Using discriminated union for type-safe error handling.
 */
export type SpatialErrorCode =
  | "OUT_OF_BOUNDS"
  | "INVALID_DIMENSIONS"
  | "INVALID_RADIUS"
  | "SNAPSHOT_INVALID"
  | "SNAPSHOT_DECODE_FAILED"
  | "CONFIG_INVALID";

/**
 * Unified error type for grid queries, snapshots and configuration.
 *
 * Out-of-bounds origins and invalid dimensions are thrown: they are caller
 * bugs. Snapshot and config failures travel inside a `Result`.
 *
 * @example
 * ```typescript
 * throw SpatialError.outOfBounds({ x: 12, y: 3 }, { width: 10, height: 10 });
 * ```
 */
export class SpatialError extends Error {
  readonly name = "SpatialError";

  constructor(
    public readonly code: SpatialErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    // Maintains proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SpatialError);
    }
  }

  static create(
    code: SpatialErrorCode,
    message: string,
    details?: Record<string, unknown>,
  ): SpatialError {
    return new SpatialError(code, message, details);
  }

  /**
   * Create an error for a point that lies outside the queried grid.
   */
  static outOfBounds(
    point: { readonly x: number; readonly y: number },
    dimensions: { readonly width: number; readonly height: number },
  ): SpatialError {
    return new SpatialError(
      "OUT_OF_BOUNDS",
      `(x, y) should be between (0, 0) and (${dimensions.width}, ${dimensions.height}), got (${point.x}, ${point.y})`,
      {
        x: point.x,
        y: point.y,
        width: dimensions.width,
        height: dimensions.height,
      },
    );
  }

  static invalidDimensions(width: number, height: number): SpatialError {
    return new SpatialError(
      "INVALID_DIMENSIONS",
      `Width and height should be > 0, got (${width}, ${height})`,
      { width, height },
    );
  }

  /**
   * Radii must be integers; an infinite radius means unlimited.
   */
  static invalidRadius(radius: number): SpatialError {
    return new SpatialError(
      "INVALID_RADIUS",
      `Radius should be an integer, got ${radius}`,
      { radius },
    );
  }

  static snapshotInvalid(
    message: string,
    details?: Record<string, unknown>,
  ): SpatialError {
    return new SpatialError("SNAPSHOT_INVALID", message, details);
  }

  static snapshotDecodeFailed(
    message: string,
    details?: Record<string, unknown>,
  ): SpatialError {
    return new SpatialError("SNAPSHOT_DECODE_FAILED", message, details);
  }

  static configInvalid(
    message: string,
    details?: Record<string, unknown>,
  ): SpatialError {
    return new SpatialError("CONFIG_INVALID", message, details);
  }

  /**
   * Check if an unknown error is a SpatialError.
   */
  static isSpatialError(error: unknown): error is SpatialError {
    return error instanceof SpatialError;
  }

  /**
   * Convert to a plain object for serialization.
   */
  toJSON(): {
    name: string;
    code: SpatialErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}
