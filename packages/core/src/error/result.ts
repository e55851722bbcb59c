// =============================================================================
// RESULT VARIANTS: explicit success or failure for public operations
// =============================================================================
// Managers throw typed LipaErrors internally; the public surface converts
// every outcome into a LipaResult so callers have to branch on `ok`.

import { LipaError } from "./errors.js";

export type LipaResult<T> = { ok: true; value: T } | { ok: false; error: LipaError };

export function ok<T>(value: T): LipaResult<T> {
	return { ok: true, value };
}

export function err<T = never>(error: LipaError): LipaResult<T> {
	return { ok: false, error };
}

export function isOk<T>(result: LipaResult<T>): result is { ok: true; value: T } {
	return result.ok;
}

/** Normalize an unknown throwable into a LipaError. */
export function toLipaError(error: unknown): LipaError {
	if (error instanceof LipaError) return error;
	const message = error instanceof Error ? error.message : String(error);
	return LipaError.internal(message, error);
}

/** Run an operation and capture its outcome as a LipaResult. */
export async function settle<T>(operation: () => Promise<T>): Promise<LipaResult<T>> {
	try {
		return ok(await operation());
	} catch (error) {
		return err(toLipaError(error));
	}
}

/** Return the value of a successful result, or throw its error. */
export function unwrap<T>(result: LipaResult<T>): T {
	if (result.ok) return result.value;
	throw result.error;
}
