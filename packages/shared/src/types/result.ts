/**
 * Result Type Module
 *
 * Discriminated union for operations that can fail without throwing.
 * Cache operations return `Result<V, CacheError>` instead of raising.
 *
 * @module @recency/shared/types/result
 */

export interface OkResult<T> {
  readonly ok: true;
  readonly value: T;
}

export interface ErrResult<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E = Error> = OkResult<T> | ErrResult<E>;

export function Ok<T>(value: T): OkResult<T> {
  return { ok: true, value };
}

export function Err<E>(error: E): ErrResult<E> {
  return { ok: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is OkResult<T> {
  return result.ok;
}

export function isErr<T, E>(result: Result<T, E>): result is ErrResult<E> {
  return !result.ok;
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return JSON.stringify(error) ?? String(error);
}

/**
 * Extract the value of an Ok result.
 *
 * @throws Error when called on an Err
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) {
    return result.value;
  }
  throw new Error(`Result.unwrap called on Err: ${describeError(result.error)}`, {
    cause: result.error,
  });
}

export function unwrapOr<T, E>(result: Result<T, E>, fallback: T): T {
  return result.ok ? result.value : fallback;
}

export function map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  return result.ok ? Ok(fn(result.value)) : result;
}

export function mapErr<T, E, F>(result: Result<T, E>, fn: (error: E) => F): Result<T, F> {
  return result.ok ? result : Err(fn(result.error));
}

/**
 * Run a function and capture a thrown value as an Err.
 */
export function tryCatch<T>(fn: () => T): Result<T, unknown> {
  try {
    return Ok(fn());
  } catch (error) {
    return Err(error);
  }
}

/**
 * Await a function and capture a thrown value or rejection as an Err.
 */
export async function tryCatchAsync<T>(fn: () => Promise<T> | T): Promise<Result<T, unknown>> {
  try {
    return Ok(await fn());
  } catch (error) {
    return Err(error);
  }
}
