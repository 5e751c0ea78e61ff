/**
 * Result<T, E> — fallible outcomes as values.
 *
 * Classification, ledger mutation and persistence return a Result instead of
 * throwing; callers branch on `ok`. Thrown errors are reserved for
 * programmer mistakes and the `unwrap` boundary.
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

export function isOk<T, E>(
	result: Result<T, E>,
): result is { readonly ok: true; readonly value: T } {
	return result.ok;
}

export function isErr<T, E>(
	result: Result<T, E>,
): result is { readonly ok: false; readonly error: E } {
	return !result.ok;
}

/**
 * Re-types the error of a failed Result; a success passes through.
 * @example mapErr(sizer, (e) => new ConfigError(e.message, { cause: e }))
 */
export function mapErr<T, E, F>(result: Result<T, E>, fn: (error: E) => F): Result<T, F> {
	return result.ok ? result : err(fn(result.error));
}

/**
 * Runs a function that may throw (JSON.parse, a third-party parser) and
 * turns whatever it throws into a typed error.
 */
export function tryCatch<T, E>(fn: () => T, onThrow: (thrown: unknown) => E): Result<T, E> {
	try {
		return ok(fn());
	} catch (thrown: unknown) {
		return err(onThrow(thrown));
	}
}

/** Value of a success, or the thrown error. Tests and entry points only. */
export function unwrap<T, E>(result: Result<T, E>): T {
	if (result.ok) return result.value;
	throw result.error instanceof Error ? result.error : new Error(String(result.error));
}
