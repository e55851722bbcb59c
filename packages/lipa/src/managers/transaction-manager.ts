// =============================================================================
// TRANSACTION MANAGER
// =============================================================================
// Shared creation flow for payments and payouts. A reference is created at
// most once: a stored record is returned as-is, concurrent calls in this
// process share one execution, and the final write is a create-if-absent so a
// concurrent writer elsewhere wins cleanly.

import type {
	GatewayReport,
	GatewayTransaction,
	TransactionKind,
	TransactionStatus,
} from "@lipa/core";
import {
	DuplicateReferenceError,
	GatewayUnavailableError,
	isKnownStatus,
	LipaError,
	NotFoundError,
	pendingStatuses,
	throwIfAborted,
	validateAmount,
	validateCurrency,
	validateOrderReference,
	validatePhoneNumber,
	waitWithSignal,
} from "@lipa/core";
import type { LipaContext } from "../context/context.js";
import {
	buildRecord,
	readTransaction,
	resolveExisting,
	type TransactionRequest,
} from "./transaction-helpers.js";

export interface CreateTransactionParams {
	amount: number;
	phoneNumber: string;
	localReference: string;
	/** Defaults to the configured currency. */
	currency?: string;
	/** Ask the gateway to preview the transaction before creating it. */
	previewFirst?: boolean;
	metadata?: Record<string, unknown>;
	signal?: AbortSignal;
}

/** Kind-specific gateway calls the shared flow drives. */
export interface TransactionOperations {
	kind: TransactionKind;
	/** Status recorded when the creation response carries none we know. */
	initialStatus: TransactionStatus;
	/** Throws when the preview says the transaction cannot go ahead. */
	preview(ctx: LipaContext, request: TransactionRequest, signal?: AbortSignal): Promise<void>;
	create(ctx: LipaContext, request: TransactionRequest, signal?: AbortSignal): Promise<GatewayReport>;
}

// =============================================================================
// VALIDATION
// =============================================================================

export function validateRequest(
	ctx: LipaContext,
	kind: TransactionKind,
	params: CreateTransactionParams,
): TransactionRequest {
	const { minAmount, maxAmount } = ctx.options.advanced;
	return {
		kind,
		orderReference: validateOrderReference(params.localReference),
		amount: validateAmount(params.amount, { minAmount, maxAmount }),
		currency: validateCurrency(params.currency ?? ctx.options.currency),
		phoneNumber: validatePhoneNumber(params.phoneNumber),
		metadata: params.metadata ?? {},
	};
}

// =============================================================================
// CREATE
// =============================================================================

export async function createTransaction(
	ctx: LipaContext,
	ops: TransactionOperations,
	params: CreateTransactionParams,
): Promise<GatewayTransaction> {
	const request = validateRequest(ctx, ops.kind, params);
	const previewFirst = params.previewFirst ?? false;

	for (;;) {
		throwIfAborted(params.signal);

		const existing = await readTransaction(ctx, request.orderReference);
		if (existing) return resolveExisting(ctx, request, existing.value);

		// The caller that starts the shared execution lends it its signal;
		// every other caller can only stop waiting.
		const shared = ctx.creations.run(request.orderReference, () =>
			runCreation(ctx, ops, request, previewFirst, params.signal),
		);
		const outcome = await waitWithSignal(shared, params.signal);
		if (outcome.type === "created") return resolveExisting(ctx, request, outcome.record);

		ctx.logger.info("Shared creation was abandoned by the caller that started it; retrying", {
			localReference: request.orderReference,
		});
	}
}

/** Result of a shared creation as seen by every caller waiting on it. */
export type CreationOutcome = { type: "created"; record: GatewayTransaction } | { type: "abandoned" };

async function runCreation(
	ctx: LipaContext,
	ops: TransactionOperations,
	request: TransactionRequest,
	previewFirst: boolean,
	signal?: AbortSignal,
): Promise<CreationOutcome> {
	try {
		return { type: "created", record: await executeCreation(ctx, ops, request, previewFirst, signal) };
	} catch (error) {
		// Only the starting caller aborted; the others retry under their own signals.
		if (signal?.aborted) return { type: "abandoned" };
		throw error;
	}
}

async function executeCreation(
	ctx: LipaContext,
	ops: TransactionOperations,
	request: TransactionRequest,
	previewFirst: boolean,
	signal?: AbortSignal,
): Promise<GatewayTransaction> {
	const reference = request.orderReference;

	// Another process may have created it since the first read.
	const existing = await readTransaction(ctx, reference);
	if (existing) return existing.value;

	if (previewFirst) {
		await ops.preview(ctx, request, signal);
	}

	let report: GatewayReport;
	try {
		report = await ops.create(ctx, request, signal);
	} catch (error) {
		report = await recoverCreation(ctx, ops.kind, reference, error, signal);
	}

	let status: TransactionStatus = ops.initialStatus;
	if (isKnownStatus(ops.kind, report.status)) {
		status = report.status;
	} else {
		ctx.logger.warn("Creation response carried no known status; recording the initial status", {
			localReference: reference,
			reportedStatus: report.status,
			recordedStatus: ops.initialStatus,
		});
	}

	const record = buildRecord(request, report, status, ctx.now());
	const result = await ctx.store.compareAndPut({
		model: "transaction",
		key: reference,
		expectedVersion: null,
		value: record,
	});

	if (!result.ok) {
		if (!result.current) {
			throw LipaError.internal(`Store rejected creation of '${reference}' without a conflicting record`);
		}
		ctx.logger.info("Another writer persisted this reference first; returning its record", {
			localReference: reference,
		});
		return result.current.value;
	}

	const stored = result.record.value;
	ctx.logger.info(`${ops.kind === "PAYMENT" ? "Payment" : "Payout"} created`, {
		localReference: reference,
		gatewayId: stored.gatewayId,
		status: stored.status,
		amount: stored.amount,
		currency: stored.currency,
	});

	await ctx.events.emitStatusChange({
		kind: stored.kind,
		localReference: reference,
		oldStatus: null,
		newStatus: stored.status,
		record: stored,
		created: true,
	});
	return stored;
}

/**
 * The gateway said the reference exists, or the creation outcome is unknown.
 * Ask for the authoritative status; when the gateway has no record of the
 * reference, the original error stands.
 */
async function recoverCreation(
	ctx: LipaContext,
	kind: TransactionKind,
	reference: string,
	error: unknown,
	signal?: AbortSignal,
): Promise<GatewayReport> {
	if (
		!(
			error instanceof DuplicateReferenceError ||
			(error instanceof GatewayUnavailableError && !signal?.aborted)
		)
	) {
		throw error;
	}

	ctx.logger.warn("Creation outcome uncertain; querying gateway status", {
		localReference: reference,
		error: error.message,
	});

	try {
		return await ctx.gateway.queryStatus(kind, reference, { signal });
	} catch (queryError) {
		if (queryError instanceof NotFoundError) {
			ctx.logger.info("Gateway has no record of the reference", { localReference: reference });
		} else {
			ctx.logger.error("Status query after failed creation also failed", {
				localReference: reference,
				error: String(queryError),
			});
		}
		throw error;
	}
}

// =============================================================================
// QUERIES
// =============================================================================

/** Local read. Absent records and records of the other kind are not found. */
export async function getTransaction(
	ctx: LipaContext,
	kind: TransactionKind,
	localReference: string,
): Promise<GatewayTransaction> {
	const stored = await readTransaction(ctx, localReference.trim());
	if (!stored || stored.value.kind !== kind) {
		throw new NotFoundError(`${kind === "PAYMENT" ? "Payment" : "Payout"} '${localReference}' not found`);
	}
	return stored.value;
}

/** Records in a non-terminal status, least recently updated first. */
export async function listPending(
	ctx: LipaContext,
	params: { kind?: TransactionKind; limit?: number } = {},
): Promise<GatewayTransaction[]> {
	const kinds: TransactionKind[] = params.kind ? [params.kind] : ["PAYMENT", "PAYOUT"];
	const statuses = new Set<string>(kinds.flatMap((kind) => pendingStatuses(kind)));

	const rows = await ctx.store.findMany({
		model: "transaction",
		where: [
			...(params.kind ? [{ field: "kind", operator: "eq" as const, value: params.kind }] : []),
			{ field: "status", operator: "in", value: [...statuses] },
		],
		sortBy: { field: "updatedAt", direction: "asc" },
		limit: params.limit,
	});

	return rows.map((row) => row.value).filter((record) => pendingStatuses(record.kind).includes(record.status));
}
