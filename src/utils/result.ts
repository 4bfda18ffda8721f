/**
 * Typed outcome for operations that can fail.
 *
 * Stores, lock managers, world services and the engine facade return a
 * `Result` instead of throwing; the error type defaults to `Error` and the
 * world layer narrows it to `WorldError`.
 *
 * ```ts
 * const res = await store.get("citizens", id);
 * if (res.isErr()) return ErrResult(res.error);
 * const citizen = res.unwrap();
 * ```
 */
export type Result<T, E = Error> = Ok<T, E> | Err<T, E>;

export class Ok<T, E> {
  constructor(public readonly value: T) {}

  isOk(): this is Ok<T, E> {
    return true;
  }

  isErr(): this is Err<T, E> {
    return false;
  }

  unwrap(): T {
    return this.value;
  }
}

export class Err<T, E> {
  constructor(public readonly error: E) {}

  isOk(): this is Ok<T, E> {
    return false;
  }

  isErr(): this is Err<T, E> {
    return true;
  }

  /**
   * Does not throw. Warns and returns `undefined`, so only call it after
   * checking `isOk()`.
   */
  unwrap(): T {
    console.warn("Result.unwrap called on Err; returning undefined fallback.", this.error);
    return undefined as unknown as T;
  }
}

export const OkResult = <T, E = Error>(value: T): Result<T, E> => new Ok(value);

export const ErrResult = <T, E = Error>(error: E): Result<T, E> => new Err(error);
