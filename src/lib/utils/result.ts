/**
 * Outcome of one unit of work (a category pass, a document review).
 * Failures carry a human-readable reason instead of an exception.
 */
export type Result<T, E = string> =
    | { ok: true; value: T }
    | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
    return { ok: true, value };
}

export function err<E = string>(error: E): Result<never, E> {
    return { ok: false, error };
}
