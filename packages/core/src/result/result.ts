import type { SwitchyardError } from "./errors";

/** Discriminated union representing either success or failure */
export type Result<T, E = SwitchyardError> = { ok: true; value: T } | { ok: false; error: E };

/** Create a successful Result */
export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

/** Create a failed Result */
export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

/** Extract the value from a Result or throw the error */
export function unwrapOrThrow<T, E>(result: Result<T, E>): T {
	if (result.ok) {
		return result.value;
	}
	throw result.error;
}

/** Wrap a Promise into a Result */
export async function fromPromise<T>(promise: Promise<T>): Promise<Result<T, Error>> {
	try {
		const value = await promise;
		return Ok(value);
	} catch (error) {
		return Err(error instanceof Error ? error : new Error(String(error)));
	}
}

/**
 * Structural check for a Result value.
 *
 * Handlers may return either a response or a Result wrapping one; the
 * middleware chain uses this to tell the two apart.
 */
export function isResult(value: unknown): value is Result<unknown, unknown> {
	if (typeof value !== "object" || value === null || !("ok" in value)) return false;
	if (value.ok === true) return "value" in value;
	if (value.ok === false) return "error" in value;
	return false;
}
