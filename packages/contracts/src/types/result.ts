/**
 * A Result type for explicit, type-safe error handling.
 *
 * Snapshot decoding and config parsing return a Result; out-of-bounds
 * queries throw instead.
 *
 * @example
 * ```typescript
 * const map = TileMap.fromSnapshot(json)
 *   .map((tiles) => new VisionMap(tiles))
 *   .getOrThrow();
 * ```
 */

type ResultState<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export class Result<T, E> {
  private constructor(private readonly state: ResultState<T, E>) {}

  /**
   * Create a successful Result containing a value.
   */
  static ok<T, E = never>(value: T): Result<T, E> {
    return new Result<T, E>({ ok: true, value });
  }

  /**
   * Create a failed Result containing an error.
   */
  static err<T = never, E = unknown>(error: E): Result<T, E> {
    return new Result<T, E>({ ok: false, error });
  }

  /**
   * Create a Result from a nullable value.
   */
  static fromNullable<T, E>(
    value: T | null | undefined,
    error: E,
  ): Result<T, E> {
    return value != null ? Result.ok(value) : Result.err(error);
  }

  /**
   * Create a Result from a function that might throw.
   */
  static fromThrowable<T, E>(
    fn: () => T,
    onError: (e: unknown) => E,
  ): Result<T, E> {
    try {
      return Result.ok(fn());
    } catch (e) {
      return Result.err(onError(e));
    }
  }

  isOk(): boolean {
    return this.state.ok;
  }

  isErr(): boolean {
    return !this.state.ok;
  }

  map<U>(fn: (value: T) => U): Result<U, E> {
    const state = this.state;
    return state.ok ? Result.ok(fn(state.value)) : Result.err(state.error);
  }

  mapErr<F>(fn: (error: E) => F): Result<T, F> {
    const state = this.state;
    return state.ok ? Result.ok(state.value) : Result.err(fn(state.error));
  }

  flatMap<U>(fn: (value: T) => Result<U, E>): Result<U, E> {
    const state = this.state;
    return state.ok ? fn(state.value) : Result.err(state.error);
  }

  getOrElse(defaultValue: T): T {
    const state = this.state;
    return state.ok ? state.value : defaultValue;
  }

  getOrThrow(): T {
    const state = this.state;
    if (state.ok) {
      return state.value;
    }
    throw state.error;
  }

  match<U>(onOk: (value: T) => U, onErr: (error: E) => U): U {
    const state = this.state;
    return state.ok ? onOk(state.value) : onErr(state.error);
  }

  tapErr(fn: (error: E) => void): Result<T, E> {
    const state = this.state;
    if (!state.ok) {
      fn(state.error);
    }
    return this;
  }

  toJSON(): { success: true; value: T } | { success: false; error: E } {
    const state = this.state;
    return state.ok
      ? { success: true, value: state.value }
      : { success: false, error: state.error };
  }

  get value(): T {
    const state = this.state;
    if (!state.ok) {
      throw new Error("Cannot access value of Err Result");
    }
    return state.value;
  }

  get error(): E {
    const state = this.state;
    if (state.ok) {
      throw new Error("Cannot access error of Ok Result");
    }
    return state.error;
  }
}

export const Ok = Result.ok;
export const Err = Result.err;
