/**
 * Result Type Module
 *
 * Discriminated union for operations that can fail without throwing.
 * Lives in @querymemo/shared so that the cache, core and sparql packages
 * agree on one shape.
 *
 * @module result
 */

/**
 * Successful branch of a {@link Result}.
 */
export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

/**
 * Failed branch of a {@link Result}.
 */
export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E> = Ok<T> | Err<E>;

/**
 * Create a successful result.
 */
export function Ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

/**
 * Create a failed result.
 */
export function Err<E>(error: E): Err<E> {
  return { ok: false, error };
}

/**
 * Run an async function and capture a rejection as an Err.
 * Non-Error rejection values are wrapped in an Error.
 *
 * @example
 * ```typescript
 * const result = await tryCatchAsync(() => fetchRows());
 * if (!result.ok) {
 *   logger.warn("fetch failed", { message: result.error.message });
 * }
 * ```
 */
export async function tryCatchAsync<T>(fn: () => Promise<T>): Promise<Result<T, Error>> {
  try {
    return Ok(await fn());
  } catch (error) {
    return Err(error instanceof Error ? error : new Error(String(error)));
  }
}
