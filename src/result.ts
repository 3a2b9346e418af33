/**
 * Result\<T, E\> — Railway-Oriented Decoding
 *
 * A lightweight discriminated union for expressing success/failure
 * without exception throwing. Decoding a request returns
 * `Result<T, DecodeError>`: either `Success<T>` or `Failure<DecodeError>`.
 *
 * @example
 * ```typescript
 * import { reconstruct, int } from 'typed-service-params';
 *
 * const result = reconstruct(int('id'), { params: [['id', '42']] });
 * if (!result.ok) return badRequest(result.error);  // Early return on failure
 * const id = result.value;                          // Narrowed to number
 * ```
 *
 * @see {@link succeed} for creating successful results
 * @see {@link fail} for creating failure results
 *
 * @module
 */

// ── Discriminated Union ──────────────────────────────────

/**
 * Successful result containing a typed value.
 *
 * @typeParam T - The success value type
 */
export interface Success<T> {
    readonly ok: true;
    readonly value: T;
}

/**
 * Failed result carrying the error that stopped the computation.
 *
 * @typeParam E - The error type
 */
export interface Failure<E> {
    readonly ok: false;
    readonly error: E;
}

/**
 * Discriminated union: either `Success<T>` or `Failure<E>`.
 *
 * Check `result.ok` to narrow the type:
 *
 * @example
 * ```typescript
 * const result: Result<number, DecodeError> = reconstruct(int('id'), input);
 * if (!result.ok) return result.error;  // Failure path
 * const id = result.value;              // Success path — typed as number
 * ```
 */
export type Result<T, E> = Success<T> | Failure<E>;

// ── Constructors ─────────────────────────────────────────

/**
 * Create a successful result.
 *
 * @example
 * ```typescript
 * return succeed(42);
 * return succeed([380, 'yo']);
 * ```
 */
export function succeed<T>(value: T): Success<T> {
    return { ok: true, value };
}

/**
 * Create a failed result.
 *
 * @example
 * ```typescript
 * return fail(new MissingParameterError('page'));
 * ```
 */
export function fail<E>(error: E): Failure<E> {
    return { ok: false, error };
}
