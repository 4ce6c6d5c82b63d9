/**
 * Result: expected failures as values.
 *
 * A busy guard, a corrupt snapshot or an unreachable collaborator is an
 * outcome the caller must handle, so domain operations return one of these
 * instead of throwing. Only the CLI unwraps.
 */

export type Result<T, E = Error> =
	| { readonly ok: true; readonly value: T }
	| { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
	return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
	return { ok: false, error };
}

/** Apply `fn` to a success; a failure passes through unchanged. */
export function map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
	if (!result.ok) return result;
	return ok(fn(result.value));
}

export function isOk<T, E>(result: Result<T, E>): result is { readonly ok: true; readonly value: T } {
	return result.ok;
}

export function isErr<T, E>(
	result: Result<T, E>,
): result is { readonly ok: false; readonly error: E } {
	return !result.ok;
}

/**
 * The success value, or the failure thrown. A failure that is not an Error is
 * wrapped in one.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
	if (!result.ok) {
		throw result.error instanceof Error ? result.error : new Error(String(result.error));
	}
	return result.value;
}
