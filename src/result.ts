// ---------- Result values ----------------
export type Result<T, E extends Error = Error> =
	| { readonly ok: true; readonly value: T }
	| { readonly ok: false; readonly error: E }

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value })

export const err = <E extends Error>(error: E): Result<never, E> => ({ ok: false, error })

/** Returns the value or throws the carried error. Call-site sugar for the `must*` wrappers. */
export function unwrap<T, E extends Error>(result: Result<T, E>): T {
	if (!result.ok) throw result.error
	return result.value
}
