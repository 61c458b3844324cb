/**
 * Result<T, E> for operations whose failure is an expected outcome rather
 * than an exception, such as a codec rejecting a platform string.
 */

export type Result<T, E> = Ok<T, E> | Err<T, E>;

export class Ok<T, E> {
  readonly _tag = 'Ok' as const;

  constructor(public readonly value: T) {}

  isOk(): this is Ok<T, E> {
    return true;
  }

  isErr(): this is Err<T, E> {
    return false;
  }
}

export class Err<T, E> {
  readonly _tag = 'Err' as const;

  constructor(public readonly error: E) {}

  isOk(): this is Ok<T, E> {
    return false;
  }

  isErr(): this is Err<T, E> {
    return true;
  }
}

export function ok<T, E = never>(value: T): Ok<T, E> {
  return new Ok(value);
}

export function err<T = never, E = unknown>(error: E): Err<T, E> {
  return new Err(error);
}
