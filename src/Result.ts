/**
 * Result — Tagged Success / Failure Values
 *
 * Every seam that can be denied or can fail upstream returns a Result.
 * Callers branch on `ok` instead of catching exceptions.
 */

export type Result<T, E> =
    | { readonly ok: true; readonly value: T }
    | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): { readonly ok: true; readonly value: T } {
    return { ok: true, value };
}

export function err<E>(error: E): { readonly ok: false; readonly error: E } {
    return { ok: false, error };
}
