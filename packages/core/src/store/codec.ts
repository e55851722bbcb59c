// =============================================================================
// STORED VALUE DECODERS
// =============================================================================
// Adapters backed by a database read values back as untyped JSON. These
// decoders check the shape before the value re-enters typed code.

import { LipaError } from "../error/errors.js";
import type { Credential } from "../types/credential.js";
import type { InconsistencyRecord } from "../types/event.js";
import {
	type GatewayTransaction,
	isCurrency,
	isKnownStatus,
	type TransactionKind,
} from "../types/transaction.js";
import type { StoreModel, StoreModels } from "./adapter.js";

type Fields = Record<string, unknown>;

function isFields(value: unknown): value is Fields {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function corrupt(model: string, field: string): LipaError {
	return LipaError.internal(`Stored ${model} has an invalid '${field}' field`);
}

function str(model: string, row: Fields, field: string): string {
	const value = row[field];
	if (typeof value !== "string") throw corrupt(model, field);
	return value;
}

function nullableStr(model: string, row: Fields, field: string): string | null {
	const value = row[field];
	if (value === null || value === undefined) return null;
	if (typeof value !== "string") throw corrupt(model, field);
	return value;
}

function num(model: string, row: Fields, field: string): number {
	const value = row[field];
	if (typeof value !== "number" || !Number.isFinite(value)) throw corrupt(model, field);
	return value;
}

function nullableNum(model: string, row: Fields, field: string): number | null {
	const value = row[field];
	if (value === null || value === undefined) return null;
	if (typeof value !== "number" || !Number.isFinite(value)) throw corrupt(model, field);
	return value;
}

function kindOf(model: string, row: Fields): TransactionKind {
	const kind = row.kind;
	if (kind !== "PAYMENT" && kind !== "PAYOUT") throw corrupt(model, "kind");
	return kind;
}

function decodeTransaction(value: unknown): GatewayTransaction {
	const model = "transaction";
	if (!isFields(value)) throw corrupt(model, "value");
	const kind = kindOf(model, value);
	const status = str(model, value, "status");
	if (!isKnownStatus(kind, status)) throw corrupt(model, "status");
	const currency = str(model, value, "currency");
	if (!isCurrency(currency)) throw corrupt(model, "currency");
	const metadata = value.metadata ?? {};
	if (!isFields(metadata)) throw corrupt(model, "metadata");

	return {
		localReference: str(model, value, "localReference"),
		gatewayId: nullableStr(model, value, "gatewayId"),
		kind,
		amount: num(model, value, "amount"),
		currency,
		counterpartyPhone: str(model, value, "counterpartyPhone"),
		status,
		fee: nullableNum(model, value, "fee"),
		beneficiaryAmount: nullableNum(model, value, "beneficiaryAmount"),
		exchangeRate: nullableNum(model, value, "exchangeRate"),
		channel: nullableStr(model, value, "channel"),
		channelProvider: nullableStr(model, value, "channelProvider"),
		paymentReference: nullableStr(model, value, "paymentReference"),
		counterpartyName: nullableStr(model, value, "counterpartyName"),
		message: nullableStr(model, value, "message"),
		metadata,
		createdAt: str(model, value, "createdAt"),
		updatedAt: str(model, value, "updatedAt"),
		completedAt: nullableStr(model, value, "completedAt"),
	};
}

function decodeCredential(value: unknown): Credential {
	const model = "credential";
	if (!isFields(value)) throw corrupt(model, "value");
	if (typeof value.active !== "boolean") throw corrupt(model, "active");
	return {
		id: str(model, value, "id"),
		token: str(model, value, "token"),
		issuedAt: str(model, value, "issuedAt"),
		expiresAt: str(model, value, "expiresAt"),
		active: value.active,
	};
}

function decodeInconsistency(value: unknown): InconsistencyRecord {
	const model = "inconsistency";
	if (!isFields(value)) throw corrupt(model, "value");
	const kind = kindOf(model, value);
	const currentStatus = str(model, value, "currentStatus");
	if (!isKnownStatus(kind, currentStatus)) throw corrupt(model, "currentStatus");
	const source = value.source;
	if (source !== "reconciliation" && source !== "webhook") throw corrupt(model, "source");
	return {
		id: str(model, value, "id"),
		kind,
		localReference: str(model, value, "localReference"),
		currentStatus,
		reportedStatus: str(model, value, "reportedStatus"),
		source,
		detectedAt: str(model, value, "detectedAt"),
	};
}

const DECODERS: { [M in StoreModel]: (value: unknown) => StoreModels[M] } = {
	transaction: decodeTransaction,
	credential: decodeCredential,
	inconsistency: decodeInconsistency,
};

/** Check an untyped stored value against the shape of its model. */
export function decodeStoredValue<M extends StoreModel>(model: M, value: unknown): StoreModels[M] {
	const decode: (value: unknown) => StoreModels[M] = DECODERS[model];
	return decode(value);
}
