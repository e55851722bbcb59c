/**
 * Deduplicates concurrent async work by key. While a call for a key is in
 * flight, later callers receive the same promise; the entry is dropped once
 * it settles so the next call starts fresh.
 */
export class SingleFlight<T> {
	private readonly inFlight = new Map<string, Promise<T>>();

	run(key: string, fn: () => Promise<T>): Promise<T> {
		const existing = this.inFlight.get(key);
		if (existing) return existing;

		const promise = fn().finally(() => {
			this.inFlight.delete(key);
		});
		this.inFlight.set(key, promise);
		return promise;
	}

	has(key: string): boolean {
		return this.inFlight.has(key);
	}

	get size(): number {
		return this.inFlight.size;
	}
}
