export type {
	CompareAndPutResult,
	LipaStore,
	SortBy,
	StoredRecord,
	StoreModel,
	StoreModels,
	Where,
	WhereOperator,
} from "./adapter.js";
export { STORE_MODELS } from "./adapter.js";
export { decodeStoredValue } from "./codec.js";
export { matchesCondition, matchesWhere } from "./where.js";
