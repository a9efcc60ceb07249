/**
 * Success or failure as a value. Every fallible call that crosses a package
 * boundary returns one of these instead of throwing.
 */
export type Result<T, E = Error> = Success<T> | Failure<E>;

export interface Success<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Failure<E> {
  readonly ok: false;
  readonly error: E;
}

export function Ok<T>(value: T): Success<T> {
  return { ok: true, value };
}

export function Err<E>(error: E): Failure<E> {
  return { ok: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is Success<T> {
  return result.ok;
}

export function map<T, U, E>(result: Result<T, E>, transform: (value: T) => U): Result<U, E> {
  if (!result.ok) return result;
  return Ok(transform(result.value));
}

/** flatMap: run the next fallible step only after a success. */
export function andThen<T, U, E>(result: Result<T, E>, next: (value: T) => Result<U, E>): Result<U, E> {
  if (!result.ok) return result;
  return next(result.value);
}

export function unwrapOr<T, E>(result: Result<T, E>, fallback: T): T {
  return result.ok ? result.value : fallback;
}

export function toError(thrown: unknown): Error {
  if (thrown instanceof Error) return thrown;
  return new Error(String(thrown));
}

export function tryCatch<T>(run: () => T): Result<T, Error> {
  try {
    return Ok(run());
  } catch (thrown) {
    return Err(toError(thrown));
  }
}

export async function tryCatchAsync<T>(run: () => Promise<T>): Promise<Result<T, Error>> {
  try {
    return Ok(await run());
  } catch (thrown) {
    return Err(toError(thrown));
  }
}
