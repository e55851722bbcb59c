// =============================================================================
// ABORT SIGNAL HELPERS
// =============================================================================

import { GatewayUnavailableError } from "../error/errors.js";

export function abortError(signal: AbortSignal): GatewayUnavailableError {
	return new GatewayUnavailableError("Operation aborted", {
		cause: signal.reason,
		timedOut: true,
	});
}

export function throwIfAborted(signal?: AbortSignal): void {
	if (signal?.aborted) throw abortError(signal);
}

/**
 * Wait for `promise`, giving up early when `signal` aborts. Aborting ends
 * only this wait; the underlying work keeps running for other waiters.
 */
export function waitWithSignal<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
	if (!signal) return promise;
	if (signal.aborted) return Promise.reject(abortError(signal));

	return new Promise<T>((resolve, reject) => {
		const onAbort = () => reject(abortError(signal));
		signal.addEventListener("abort", onAbort, { once: true });
		void promise.then(
			(value) => {
				signal.removeEventListener("abort", onAbort);
				resolve(value);
			},
			(error: unknown) => {
				signal.removeEventListener("abort", onAbort);
				reject(error);
			},
		);
	});
}

/** Combine several optional signals; the result aborts when any of them does. */
export function linkSignals(...signals: Array<AbortSignal | undefined>): {
	signal: AbortSignal;
	dispose: () => void;
} {
	const controller = new AbortController();
	const cleanups: Array<() => void> = [];

	for (const source of signals) {
		if (!source) continue;
		if (source.aborted) {
			controller.abort(source.reason);
			break;
		}
		const onAbort = () => controller.abort(source.reason);
		source.addEventListener("abort", onAbort, { once: true });
		cleanups.push(() => source.removeEventListener("abort", onAbort));
	}

	return {
		signal: controller.signal,
		dispose: () => {
			for (const cleanup of cleanups) cleanup();
		},
	};
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	if (signal?.aborted) return Promise.reject(abortError(signal));

	return new Promise<void>((resolve, reject) => {
		const onAbort = () => {
			clearTimeout(timer);
			reject(signal ? abortError(signal) : new Error("aborted"));
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		signal?.addEventListener("abort", onAbort, { once: true });
	});
}
