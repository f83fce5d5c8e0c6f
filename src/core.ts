/**
 * reactive-saga/core
 *
 * Result primitives shared by the saga helpers.
 * The saga algebra itself never catches; these types exist for drivers that
 * prefer failures as values (see `tryComputeNewActions`).
 */

// =============================================================================
// Core Result Types
// =============================================================================

/**
 * Represents a successful computation or a failed one.
 *
 * @template T - The type of the success value
 * @template E - The type of the error value (defaults to unknown)
 * @template C - The type of the cause (defaults to unknown)
 */
export type Result<T, E = unknown, C = unknown> =
  | { ok: true; value: T }
  | { ok: false; error: E; cause?: C };

// =============================================================================
// Result Constructors
// =============================================================================

/**
 * Creates a successful Result.
 *
 * @example
 * ```typescript
 * const r = ok([{ _tag: "CreateShipment", orderId: 1 }]);
 * ```
 */
export const ok = <T>(value: T): Result<T, never, never> => ({ ok: true, value });

/**
 * Creates a failed Result.
 *
 * @param error - The error value describing what went wrong
 * @param options.cause - The underlying cause of the error (e.g., a caught exception)
 */
export const err = <E, C = unknown>(
  error: E,
  options?: { cause?: C }
): Result<never, E, C> => ({
  ok: false,
  error,
  ...(options?.cause !== undefined ? { cause: options.cause } : {}),
});

// =============================================================================
// Wrap
// =============================================================================

/**
 * Runs a synchronous function and captures a throw as an error Result.
 *
 * @example
 * ```typescript
 * const parsed = from(
 *   () => JSON.parse(raw) as unknown,
 *   (cause) => ({ type: "PARSE_ERROR" as const, cause })
 * );
 * ```
 */
export function from<T, E>(fn: () => T, onError: (cause: unknown) => E): Result<T, E> {
  try {
    return ok(fn());
  } catch (cause) {
    return err(onError(cause), { cause });
  }
}
