/**
 * Outcome of a fallible operation that reports failure as a value.
 *
 * @example
 * ```typescript
 * const config = parseWalkConfig(input)
 *   .map((config) => ({ ...config, walkSteps: config.walkSteps * 2 }))
 *   .getOrThrow();
 * ```
 */

type Outcome<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export class Result<T, E> {
  private constructor(private readonly outcome: Outcome<T, E>) {}

  static ok<T, E = never>(value: T): Result<T, E> {
    return new Result<T, E>({ ok: true, value });
  }

  static err<T = never, E = unknown>(error: E): Result<T, E> {
    return new Result<T, E>({ ok: false, error });
  }

  /**
   * Run `fn`, turning anything it throws into the error side via `onError`.
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
    return this.outcome.ok;
  }

  isErr(): boolean {
    return !this.outcome.ok;
  }

  get success(): boolean {
    return this.outcome.ok;
  }

  get value(): T {
    if (!this.outcome.ok) {
      throw new Error("Cannot access value of Err Result");
    }
    return this.outcome.value;
  }

  get error(): E {
    if (this.outcome.ok) {
      throw new Error("Cannot access error of Ok Result");
    }
    return this.outcome.error;
  }

  match<U>(onOk: (value: T) => U, onErr: (error: E) => U): U {
    const o = this.outcome;
    return o.ok ? onOk(o.value) : onErr(o.error);
  }

  map<U>(fn: (value: T) => U): Result<U, E> {
    return this.match(
      (value) => Result.ok<U, E>(fn(value)),
      (error) => Result.err<U, E>(error),
    );
  }

  mapErr<F>(fn: (error: E) => F): Result<T, F> {
    return this.match(
      (value) => Result.ok<T, F>(value),
      (error) => Result.err<T, F>(fn(error)),
    );
  }

  flatMap<U>(fn: (value: T) => Result<U, E>): Result<U, E> {
    return this.match(fn, (error) => Result.err<U, E>(error));
  }

  getOrElse(fallback: T): T {
    return this.match(
      (value) => value,
      () => fallback,
    );
  }

  getOrThrow(): T {
    const o = this.outcome;
    if (!o.ok) throw o.error;
    return o.value;
  }

  toJSON(): { success: true; value: T } | { success: false; error: E } {
    const o = this.outcome;
    return o.ok
      ? { success: true, value: o.value }
      : { success: false, error: o.error };
  }
}

export const Ok = Result.ok;
export const Err = Result.err;
