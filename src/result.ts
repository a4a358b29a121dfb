/**
 * Result type for boundaries that report failure as a value.
 *
 * @example
 * ```ts
 * const result = await session.generateAnalysis();
 * if (!result.ok) {
 *   return res.status(result.error.statusCode).json({ error: result.error.toJSON() });
 * }
 * ```
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

/** Run an async operation, mapping anything it throws through `mapError`. */
export async function tryCatch<T, E>(
  fn: () => Promise<T>,
  mapError: (error: unknown) => E
): Promise<Result<T, E>> {
  try {
    return Ok(await fn());
  } catch (e) {
    return Err(mapError(e));
  }
}
