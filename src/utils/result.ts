/**
 * Typed result for operations that can fail without throwing.
 *
 * Role in system:
 * - Returned by parsers (namespaced keys, env settings) so callers can branch
 *   on `isErr()` instead of wrapping every call in try/catch.
 *
 * Gotchas:
 * - `Err.unwrap()` throws the contained error. Check `isOk()` first unless a
 *   throw is what you want.
 */
export type Result<T, E = Error> = Ok<T, E> | Err<T, E>;

export class Ok<T, E> {
  readonly ok = true;
  readonly err = false;

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
  readonly ok = false;
  readonly err = true;

  constructor(public readonly error: E) {}

  isOk(): this is Ok<T, E> {
    return false;
  }

  isErr(): this is Err<T, E> {
    return true;
  }

  unwrap(): T {
    throw this.error;
  }
}

/** Successful result. */
export const OkResult = <T, E = Error>(value: T): Result<T, E> => new Ok(value);

/** Failed result. */
export const ErrResult = <T, E = Error>(error: E): Result<T, E> => new Err(error);
