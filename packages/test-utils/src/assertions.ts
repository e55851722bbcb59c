import type { LipaError, LipaErrorCode, LipaResult, LipaStore, StoredRecord, GatewayTransaction } from "@lipa/core";

/** Return the value of a successful result, or throw describing the error. */
export function assertOk<T>(result: LipaResult<T>): T {
	if (!result.ok) {
		throw new Error(`Expected success, got ${result.error.code}: ${result.error.message}`);
	}
	return result.value;
}

/** Return the error of a failed result, checking its code. */
export function assertErr<T>(result: LipaResult<T>, code?: LipaErrorCode): LipaError {
	if (result.ok) {
		throw new Error(`Expected failure${code ? ` with ${code}` : ""}, got success`);
	}
	if (code && result.error.code !== code) {
		throw new Error(`Expected ${code}, got ${result.error.code}: ${result.error.message}`);
	}
	return result.error;
}

/** Read a stored transaction, failing when it is absent. */
export async function assertStoredTransaction(
	store: LipaStore,
	localReference: string,
): Promise<StoredRecord<GatewayTransaction>> {
	const stored = await store.get({ model: "transaction", key: localReference });
	if (!stored) {
		throw new Error(`Expected transaction '${localReference}' in the store`);
	}
	return stored;
}
