// =============================================================================
// TRANSACTION HELPERS: shared patterns for payment and payout records
// =============================================================================

import type {
	Currency,
	GatewayReport,
	GatewayTransaction,
	StoredRecord,
	TransactionKind,
	TransactionStatus,
} from "@lipa/core";
import { DuplicateReferenceError, isSuccessful } from "@lipa/core";
import type { LipaContext } from "../context/context.js";

/** Validated request data a record is created from. */
export interface TransactionRequest {
	kind: TransactionKind;
	amount: number;
	currency: Currency;
	phoneNumber: string;
	orderReference: string;
	metadata: Record<string, unknown>;
}

// =============================================================================
// IDEMPOTENT REPLAY
// =============================================================================

/**
 * Compare a stored record against a replayed request. Returns the name of the
 * first mismatched field, or null if all fields match.
 */
export function findFieldMismatch(
	original: Pick<GatewayTransaction, "amount" | "currency" | "counterpartyPhone">,
	retry: Pick<TransactionRequest, "amount" | "currency" | "phoneNumber">,
): string | null {
	if (retry.amount !== original.amount) return "amount";
	if (retry.currency !== original.currency) return "currency";
	if (retry.phoneNumber !== original.counterpartyPhone) return "phoneNumber";
	return null;
}

/**
 * Resolve a request against a record already holding its reference. Same kind
 * returns the record; the other kind is a duplicate reference.
 */
export function resolveExisting(
	ctx: LipaContext,
	request: TransactionRequest,
	existing: GatewayTransaction,
): GatewayTransaction {
	if (existing.kind !== request.kind) {
		throw new DuplicateReferenceError(
			`Order reference '${request.orderReference}' is already used by a ${existing.kind.toLowerCase()}`,
			{ localReference: request.orderReference, existing },
		);
	}

	const mismatch = findFieldMismatch(existing, request);
	if (mismatch) {
		ctx.logger.warn("Replayed request differs from the stored transaction; returning the stored one", {
			localReference: request.orderReference,
			field: mismatch,
		});
	}
	return existing;
}

// =============================================================================
// RECORD BUILDING
// =============================================================================

export function buildRecord(
	request: TransactionRequest,
	report: GatewayReport,
	status: TransactionStatus,
	now: Date,
): GatewayTransaction {
	const timestamp = now.toISOString();
	const record: GatewayTransaction = {
		localReference: request.orderReference,
		gatewayId: report.gatewayId,
		kind: request.kind,
		amount: request.amount,
		currency: request.currency,
		counterpartyPhone: request.phoneNumber,
		status,
		fee: report.fee,
		beneficiaryAmount: report.beneficiaryAmount,
		exchangeRate: report.exchangeRate,
		channel: report.channel,
		channelProvider: report.channelProvider,
		paymentReference: report.paymentReference,
		counterpartyName: report.counterpartyName,
		message: report.message,
		metadata: request.metadata,
		createdAt: timestamp,
		updatedAt: timestamp,
		completedAt: null,
	};
	if (isSuccessful(record)) record.completedAt = timestamp;
	return record;
}

/**
 * Copy of `record` moved to `status`, with any detail the report carries.
 * Fields the report leaves empty keep their stored value.
 */
export function applyReport(
	record: GatewayTransaction,
	report: GatewayReport,
	status: TransactionStatus,
	now: Date,
): GatewayTransaction {
	const timestamp = now.toISOString();
	const next: GatewayTransaction = {
		...record,
		status,
		gatewayId: report.gatewayId ?? record.gatewayId,
		fee: report.fee ?? record.fee,
		beneficiaryAmount: report.beneficiaryAmount ?? record.beneficiaryAmount,
		exchangeRate: report.exchangeRate ?? record.exchangeRate,
		channel: report.channel ?? record.channel,
		channelProvider: report.channelProvider ?? record.channelProvider,
		paymentReference: report.paymentReference ?? record.paymentReference,
		counterpartyName: report.counterpartyName ?? record.counterpartyName,
		message: report.message ?? record.message,
		updatedAt: timestamp,
	};
	if (isSuccessful(next) && !next.completedAt) next.completedAt = timestamp;
	return next;
}

// =============================================================================
// STORE ACCESS
// =============================================================================

export function readTransaction(
	ctx: LipaContext,
	localReference: string,
): Promise<StoredRecord<GatewayTransaction> | null> {
	return ctx.store.get({ model: "transaction", key: localReference });
}
