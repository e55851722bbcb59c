// =============================================================================
// DRIZZLE ADAPTER -- LipaStore implementation backed by Drizzle ORM
// =============================================================================
// Uses raw SQL via drizzle-orm's `sql` template for all operations. Creation
// is INSERT ... ON CONFLICT DO NOTHING, conditional updates carry the expected
// version in their WHERE clause, and both report the winner on conflict.

import type {
	CompareAndPutResult,
	LipaStore,
	SortBy,
	StoredRecord,
	StoreModel,
	StoreModels,
	Where,
} from "@lipa/core";
import { decodeStoredValue, LipaError } from "@lipa/core";
import { type SQL, sql } from "drizzle-orm";

/** The part of a Drizzle database (or transaction) handle this adapter uses. */
export interface DrizzleExecutor {
	execute(query: SQL): Promise<unknown>;
}

export interface DrizzleAdapterOptions {
	/** Table holding the records (default: "lipa_record") */
	tableName?: string;
	now?: () => Date;
}

// =============================================================================
// INTERNAL HELPERS
// =============================================================================

type Row = Record<string, unknown>;

function isRow(value: unknown): value is Row {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** node-postgres returns `{ rows }`, postgres.js returns the rows array. */
function rowsOf(result: unknown): Row[] {
	const rows = Array.isArray(result) ? result : isRow(result) && Array.isArray(result.rows) ? result.rows : [];
	return rows.filter(isRow);
}

function toIsoString(value: unknown): string {
	if (value instanceof Date) return value.toISOString();
	if (typeof value === "string") return new Date(value).toISOString();
	throw LipaError.internal("Stored record has an invalid 'updated_at' column");
}

function toRecord<M extends StoreModel>(model: M, row: Row): StoredRecord<StoreModels[M]> {
	const version = Number(row.version);
	if (typeof row.key !== "string" || !Number.isInteger(version)) {
		throw LipaError.internal(`Stored ${model} row is missing its key or version`);
	}
	const raw: unknown = typeof row.value === "string" ? JSON.parse(row.value) : row.value;
	return {
		key: row.key,
		version,
		value: decodeStoredValue(model, raw),
		updatedAt: toIsoString(row.updated_at),
	};
}

/**
 * Build SQL conditions on fields of the JSON value. Values are compared as
 * jsonb so strings, numbers and booleans keep their type.
 */
function buildWhereClause(where: Where[]): SQL {
	const conditions = where.map((w) => {
		const field = sql`value -> ${w.field}`;
		switch (w.operator) {
			case "eq":
				return sql`${field} = ${JSON.stringify(w.value)}::jsonb`;
			case "ne":
				return sql`${field} IS DISTINCT FROM ${JSON.stringify(w.value)}::jsonb`;
			case "in": {
				const values = Array.isArray(w.value) ? w.value : [];
				if (values.length === 0) return sql`FALSE`;
				return sql`${field} IN (${sql.join(
					values.map((value) => sql`${JSON.stringify(value)}::jsonb`),
					sql`, `,
				)})`;
			}
			case "gt":
				return sql`${field} > ${JSON.stringify(w.value)}::jsonb`;
			default:
				return sql`FALSE`;
		}
	});
	return conditions.length === 0 ? sql`TRUE` : sql.join(conditions, sql` AND `);
}

function buildOrderBy(sortBy: SortBy | undefined): SQL {
	if (!sortBy) return sql``;
	const column = sortBy.field === "updatedAt" ? "updated_at" : "key";
	const direction = sortBy.direction === "desc" ? "DESC" : "ASC";
	return sql.raw(` ORDER BY ${column} ${direction}`);
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Create a LipaStore backed by a Drizzle ORM database instance.
 *
 * @example
 * ```ts
 * import { drizzle } from "drizzle-orm/node-postgres";
 * import { Pool } from "pg";
 * import { drizzleAdapter } from "@lipa/drizzle-adapter";
 *
 * const pool = new Pool({ connectionString: process.env.DATABASE_URL });
 * const store = drizzleAdapter(drizzle(pool));
 * ```
 */
export function drizzleAdapter(db: DrizzleExecutor, options: DrizzleAdapterOptions = {}): LipaStore {
	const table = sql.identifier(options.tableName ?? "lipa_record");
	const now = options.now ?? (() => new Date());
	const columns = sql.raw("key, version, value, updated_at");

	async function get<M extends StoreModel>(params: {
		model: M;
		key: string;
	}): Promise<StoredRecord<StoreModels[M]> | null> {
		const result = await db.execute(
			sql`SELECT ${columns} FROM ${table} WHERE model = ${params.model} AND key = ${params.key} LIMIT 1`,
		);
		const row = rowsOf(result)[0];
		return row ? toRecord(params.model, row) : null;
	}

	return {
		id: "drizzle",

		get,

		compareAndPut: async <M extends StoreModel>(params: {
			model: M;
			key: string;
			expectedVersion: number | null;
			value: StoreModels[M];
		}): Promise<CompareAndPutResult<StoreModels[M]>> => {
			const value = JSON.stringify(params.value);
			const updatedAt = now().toISOString();

			const query =
				params.expectedVersion === null
					? sql`INSERT INTO ${table} (model, key, version, value, updated_at)
						VALUES (${params.model}, ${params.key}, 1, ${value}::jsonb, ${updatedAt}::timestamptz)
						ON CONFLICT (model, key) DO NOTHING
						RETURNING ${columns}`
					: sql`UPDATE ${table}
						SET version = version + 1, value = ${value}::jsonb, updated_at = ${updatedAt}::timestamptz
						WHERE model = ${params.model} AND key = ${params.key} AND version = ${params.expectedVersion}
						RETURNING ${columns}`;

			const row = rowsOf(await db.execute(query))[0];
			if (row) return { ok: true, record: toRecord(params.model, row) };
			return { ok: false, current: await get({ model: params.model, key: params.key }) };
		},

		put: async <M extends StoreModel>(params: {
			model: M;
			key: string;
			value: StoreModels[M];
		}): Promise<StoredRecord<StoreModels[M]>> => {
			const value = JSON.stringify(params.value);
			const updatedAt = now().toISOString();
			const result = await db.execute(
				sql`INSERT INTO ${table} (model, key, version, value, updated_at)
					VALUES (${params.model}, ${params.key}, 1, ${value}::jsonb, ${updatedAt}::timestamptz)
					ON CONFLICT (model, key) DO UPDATE
					SET version = ${table}.version + 1, value = EXCLUDED.value, updated_at = EXCLUDED.updated_at
					RETURNING ${columns}`,
			);
			const row = rowsOf(result)[0];
			if (!row) {
				throw LipaError.internal(`Upsert into ${params.model} returned no rows`);
			}
			return toRecord(params.model, row);
		},

		findMany: async <M extends StoreModel>(params: {
			model: M;
			where?: Where[];
			limit?: number;
			sortBy?: SortBy;
		}): Promise<StoredRecord<StoreModels[M]>[]> => {
			const limit = params.limit !== undefined ? sql` LIMIT ${params.limit}` : sql``;
			const result = await db.execute(
				sql`SELECT ${columns} FROM ${table} WHERE model = ${params.model} AND ${buildWhereClause(
					params.where ?? [],
				)}${buildOrderBy(params.sortBy)}${limit}`,
			);
			return rowsOf(result).map((row) => toRecord(params.model, row));
		},
	};
}
