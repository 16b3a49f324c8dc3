// src/utils/result.ts

export type Result<T, E = Error> =
    | { ok: true; value: T }
    | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const err = <E>(error: E): Result<never, E> => ({ ok: false, error });

/**
 * Splits a list of results into successes and failures, keeping input order.
 */
export function partitionResults<T, E>(results: Result<T, E>[]): { values: T[]; errors: E[] } {
    const values: T[] = [];
    const errors: E[] = [];
    for (const result of results) {
        if (result.ok) {
            values.push(result.value);
        } else {
            errors.push(result.error);
        }
    }
    return { values, errors };
}
