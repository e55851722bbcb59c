// =============================================================================
// MEMORY ADAPTER: LipaStore implementation backed by in-memory Maps
// =============================================================================
// Designed for unit testing and single-process use. No external database.
// Data is stored in one Map per model: key -> versioned record.
// Each operation runs to completion without yielding, so compareAndPut is
// atomic with respect to every other caller in the process.

import type {
	CompareAndPutResult,
	LipaStore,
	SortBy,
	StoredRecord,
	StoreModel,
	StoreModels,
	Where,
} from "@lipa/core";
import { matchesWhere } from "@lipa/core/store";

// =============================================================================
// INTERNAL HELPERS
// =============================================================================

type Tables = { [M in StoreModel]: Map<string, StoredRecord<StoreModels[M]>> };

function createTables(): Tables {
	return {
		transaction: new Map(),
		credential: new Map(),
		inconsistency: new Map(),
	};
}

/** Records leave the store as deep copies so callers cannot mutate stored state. */
function copy<T>(record: StoredRecord<T>): StoredRecord<T> {
	return structuredClone(record);
}

/**
 * Sort records by a SortBy field and direction.
 */
function sortRecords<T>(records: StoredRecord<T>[], sortBy: SortBy): StoredRecord<T>[] {
	return [...records].sort((a, b) => {
		const aVal = a[sortBy.field];
		const bVal = b[sortBy.field];
		if (aVal === bVal) return 0;
		const comparison = aVal < bVal ? -1 : 1;
		return sortBy.direction === "desc" ? -comparison : comparison;
	});
}

export interface MemoryAdapterOptions {
	/** Clock for `updatedAt`. Default: `() => new Date()` */
	now?: () => Date;
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Create a LipaStore backed by in-memory Maps.
 * Ideal for unit testing. No database required.
 *
 * @example
 * ```ts
 * import { memoryAdapter } from "@lipa/memory-adapter";
 *
 * const store = memoryAdapter();
 * const created = await store.compareAndPut({
 *   model: "transaction",
 *   key: "ORDER-1",
 *   expectedVersion: null,
 *   value: transaction,
 * });
 * ```
 */
export function memoryAdapter(options: MemoryAdapterOptions = {}): LipaStore {
	const tables = createTables();
	const now = options.now ?? (() => new Date());

	function write<M extends StoreModel>(
		table: Map<string, StoredRecord<StoreModels[M]>>,
		key: string,
		value: StoreModels[M],
		version: number,
	): StoredRecord<StoreModels[M]> {
		const record: StoredRecord<StoreModels[M]> = {
			key,
			version,
			value: structuredClone(value),
			updatedAt: now().toISOString(),
		};
		table.set(key, record);
		return copy(record);
	}

	return {
		id: "memory",

		get: async <M extends StoreModel>({
			model,
			key,
		}: {
			model: M;
			key: string;
		}): Promise<StoredRecord<StoreModels[M]> | null> => {
			const table: Map<string, StoredRecord<StoreModels[M]>> = tables[model];
			const record = table.get(key);
			return record ? copy(record) : null;
		},

		compareAndPut: async <M extends StoreModel>({
			model,
			key,
			expectedVersion,
			value,
		}: {
			model: M;
			key: string;
			expectedVersion: number | null;
			value: StoreModels[M];
		}): Promise<CompareAndPutResult<StoreModels[M]>> => {
			const table: Map<string, StoredRecord<StoreModels[M]>> = tables[model];
			const current = table.get(key) ?? null;
			const currentVersion = current ? current.version : null;

			if (currentVersion !== expectedVersion) {
				return { ok: false, current: current ? copy(current) : null };
			}

			return { ok: true, record: write(table, key, value, (currentVersion ?? 0) + 1) };
		},

		put: async <M extends StoreModel>({
			model,
			key,
			value,
		}: {
			model: M;
			key: string;
			value: StoreModels[M];
		}): Promise<StoredRecord<StoreModels[M]>> => {
			const table: Map<string, StoredRecord<StoreModels[M]>> = tables[model];
			const current = table.get(key);
			return write(table, key, value, (current?.version ?? 0) + 1);
		},

		findMany: async <M extends StoreModel>({
			model,
			where,
			limit,
			sortBy,
		}: {
			model: M;
			where?: Where[];
			limit?: number;
			sortBy?: SortBy;
		}): Promise<StoredRecord<StoreModels[M]>[]> => {
			const table: Map<string, StoredRecord<StoreModels[M]>> = tables[model];

			let results = [...table.values()].filter((record) => matchesWhere(record.value, where ?? []));

			if (sortBy) {
				results = sortRecords(results, sortBy);
			}

			if (limit !== undefined) {
				results = results.slice(0, limit);
			}

			return results.map(copy);
		},
	};
}
