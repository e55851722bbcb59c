// =============================================================================
// LIPA STORE INTERFACE
// =============================================================================
// Versioned key-value persistence for the integration. Every model stores one
// JSON value per key. Writes that must not race go through compareAndPut,
// which succeeds only when the caller saw the latest version.

import type { Credential } from "../types/credential.js";
import type { InconsistencyRecord } from "../types/event.js";
import type { GatewayTransaction } from "../types/transaction.js";

export const STORE_MODELS = {
	TRANSACTION: "transaction",
	CREDENTIAL: "credential",
	INCONSISTENCY: "inconsistency",
} as const;

/** Value type stored under each model. */
export interface StoreModels {
	transaction: GatewayTransaction;
	credential: Credential;
	inconsistency: InconsistencyRecord;
}

export type StoreModel = keyof StoreModels;

export interface StoredRecord<T> {
	key: string;
	/** Starts at 1 and increases by one on every write. */
	version: number;
	value: T;
	updatedAt: string;
}

export type CompareAndPutResult<T> =
	| { ok: true; record: StoredRecord<T> }
	| { ok: false; current: StoredRecord<T> | null };

export interface Where {
	/** Field of the stored value, not of the record envelope. */
	field: string;
	operator: WhereOperator;
	value: unknown;
}

/** `gt` compares strings or numbers of the same type. */
export type WhereOperator = "eq" | "ne" | "in" | "gt";

export interface SortBy {
	field: "updatedAt" | "key";
	direction: "asc" | "desc";
}

export interface LipaStore {
	id: string;

	get<M extends StoreModel>(params: {
		model: M;
		key: string;
	}): Promise<StoredRecord<StoreModels[M]> | null>;

	/**
	 * Write `value` only if the stored version equals `expectedVersion`.
	 * `null` means the key must not exist yet. On mismatch nothing is written
	 * and the current record is returned.
	 */
	compareAndPut<M extends StoreModel>(params: {
		model: M;
		key: string;
		expectedVersion: number | null;
		value: StoreModels[M];
	}): Promise<CompareAndPutResult<StoreModels[M]>>;

	/** Unconditional write. Used for append-only records. */
	put<M extends StoreModel>(params: {
		model: M;
		key: string;
		value: StoreModels[M];
	}): Promise<StoredRecord<StoreModels[M]>>;

	findMany<M extends StoreModel>(params: {
		model: M;
		where?: Where[];
		limit?: number;
		sortBy?: SortBy;
	}): Promise<StoredRecord<StoreModels[M]>[]>;
}
