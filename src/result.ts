/**
 * Result\<T, E\> — Success/Failure Without Throwing
 *
 * A small discriminated union used wherever a failure is an expected
 * outcome rather than a bug: model validation, safe tool calls and
 * dispatch all return one.
 *
 * @example
 * ```typescript
 * import { succeed, fail, type Result } from 'toolshape';
 *
 * function parsePort(input: string): Result<number, string> {
 *     const port = Number.parseInt(input, 10);
 *     return Number.isNaN(port) ? fail(`not a port: ${input}`) : succeed(port);
 * }
 *
 * const result = parsePort('8080');
 * if (!result.ok) return result.error;  // Failure path
 * const port = result.value;            // Narrowed to number
 * ```
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
 * Failed result containing a typed error payload.
 *
 * @typeParam E - The error payload type
 */
export interface Failure<E> {
    readonly ok: false;
    readonly error: E;
}

/**
 * Either `Success<T>` or `Failure<E>`. Check `result.ok` to narrow.
 */
export type Result<T, E> = Success<T> | Failure<E>;

// ── Constructors ─────────────────────────────────────────

/**
 * Create a successful result.
 *
 * @example
 * ```typescript
 * return succeed({ city: 'Lisbon' });
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
 * return fail(records);
 * ```
 */
export function fail<E>(error: E): Failure<E> {
    return { ok: false, error };
}
