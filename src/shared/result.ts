/**
 * Result<T, E>: explicit success/failure values for domain operations.
 *
 * Domain code returns Result instead of throwing. Adapters convert thrown
 * errors at the boundary with classifyError.
 */

/** Discriminated union: `ok: true` carries a value, `ok: false` carries an error. */
export type Result<T, E = Error> =
	| { readonly ok: true; readonly value: T }
	| { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
	return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
	return { ok: false, error };
}

/** Transform the success value, leaving errors untouched. */
export function map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
	return result.ok ? ok(fn(result.value)) : result;
}
