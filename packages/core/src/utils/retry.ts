import { sleep } from "./signal.js";

export interface RetryOptions {
	/** Total attempts including the first. */
	attempts: number;
	baseDelayMs: number;
	maxDelayMs: number;
	/** Decides whether a failure is worth another attempt. */
	shouldRetry: (error: unknown) => boolean;
	onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
	signal?: AbortSignal;
}

/** Exponential delay capped at `maxDelayMs`, scaled by a jitter factor in [0.5, 1.5). */
export function computeBackoffDelay(
	attempt: number,
	baseDelayMs: number,
	maxDelayMs: number,
	random: () => number = Math.random,
): number {
	const delay = Math.min(baseDelayMs * 2 ** attempt, maxDelayMs);
	return Math.round(delay * (0.5 + random()));
}

export async function withRetry<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
	const attempts = Math.max(1, options.attempts);

	for (let attempt = 0; ; attempt++) {
		try {
			return await operation(attempt);
		} catch (err) {
			if (attempt + 1 >= attempts || !options.shouldRetry(err) || options.signal?.aborted) {
				throw err;
			}
			const delayMs = computeBackoffDelay(attempt, options.baseDelayMs, options.maxDelayMs);
			options.onRetry?.({ attempt: attempt + 1, delayMs, error: err });
			await sleep(delayMs, options.signal);
		}
	}
}
