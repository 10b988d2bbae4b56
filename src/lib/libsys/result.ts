/**
 * libsys/result
 *
 * Result values returned by every fallible kernel and libsys call.
 * Only process edges (boot, the shell) turn a failure back into a throw.
 */

export type Result<T, E = Error> =
	| { ok: true; value: T }
	| { ok: false; error: E };

export type PromiseResult<T, E = Error> = Promise<Result<T, E>>;

/// Callbacks supplied by node types may answer synchronously or not.
export type MaybePromiseResult<T, E = Error> = Result<T, E> | PromiseResult<T, E>;

export const Ok = <T>(value: T): { ok: true; value: T } => {
	return { ok: true, value };
}

export const Err = <E>(error: E): { ok: false; error: E } => {
	return { ok: false, error };
}

export const wrap = <T, R, E = Error>(fn: (value: T) => R) => (
	result: Result<T, E>,
): Result<R, E> =>
	result.ok ? Ok(fn(result.value)) : result;

export interface Matchers<T, E, R1, R2> {
	ok(value: T): R1;
	err(error: E): R2;
}

export const match = <T, E, R1, R2>(
	matchers: Matchers<T, E, R1, R2>,
) => (result: Result<T, E>): R1 | R2 =>
		result.ok ? matchers.ok(result.value) : matchers.err(result.error);

/// Unpacks a result, throwing its error. Meant for boot code and tests.
export const unwrap = <T, E>(result: Result<T, E>): T => {
	if (!result.ok)
		throw result.error;

	return result.value;
}
