// =============================================================================
// STATUS RECONCILER
// =============================================================================
// Moves a stored record to the status the gateway reports. The gateway is
// always asked, even for terminal records, so that a contradiction of a
// terminal status is detected, recorded and surfaced instead of applied.
//
// Payment: PROCESSING -> PENDING -> SUCCESS | SETTLED | FAILED
// Payout:  AUTHORIZED -> PROCESSING | PENDING -> SUCCESS | FAILED | REVERSED | REFUNDED

import type {
	GatewayReport,
	GatewayTransaction,
	InconsistencyRecord,
	StoredRecord,
	TransactionKind,
	TransactionStatus,
} from "@lipa/core";
import {
	generateId,
	InconsistentStateError,
	isKnownStatus,
	isTerminalStatus,
	LipaError,
	MalformedResponseError,
	NotFoundError,
} from "@lipa/core";
import type { LipaContext } from "../context/context.js";
import { applyReport, readTransaction } from "./transaction-helpers.js";

export type TransitionOutcome =
	| { type: "unchanged" }
	| { type: "update"; status: TransactionStatus }
	| { type: "inconsistent" }
	| { type: "unknown" };

export type ReconcileSource = InconsistencyRecord["source"];

export interface ReconcileResult {
	record: GatewayTransaction;
	previousStatus: TransactionStatus;
	changed: boolean;
}

export interface ReconcileOptions {
	signal?: AbortSignal;
	/** Restrict to one kind; a record of the other kind is not found. */
	kind?: TransactionKind;
	source?: ReconcileSource;
}

/** Decide what a reported status means for a record in `current`. */
export function evaluateTransition(
	kind: TransactionKind,
	current: TransactionStatus,
	reported: string,
): TransitionOutcome {
	if (!isKnownStatus(kind, reported)) return { type: "unknown" };
	if (reported === current) return { type: "unchanged" };
	if (isTerminalStatus(kind, current)) return { type: "inconsistent" };
	return { type: "update", status: reported };
}

export async function reconcile(
	ctx: LipaContext,
	localReference: string,
	options: ReconcileOptions = {},
): Promise<ReconcileResult> {
	const reference = localReference.trim();
	const initial = await readTransaction(ctx, reference);
	if (!initial || (options.kind && initial.value.kind !== options.kind)) {
		throw new NotFoundError(`Transaction '${reference}' not found`);
	}

	const kind = initial.value.kind;
	const report = await ctx.gateway.queryStatus(kind, reference, { signal: options.signal });
	return applyGatewayReport(ctx, initial, report, options.source ?? "reconciliation");
}

/** Apply an already-fetched report, re-reading on version conflicts. */
export async function applyGatewayReport(
	ctx: LipaContext,
	initial: StoredRecord<GatewayTransaction>,
	report: GatewayReport,
	source: ReconcileSource,
): Promise<ReconcileResult> {
	const reference = initial.key;
	const { conflictRetryCount } = ctx.options.advanced;
	let stored = initial;

	for (let attempt = 0; ; attempt++) {
		const current = stored.value;
		const outcome = evaluateTransition(current.kind, current.status, report.status);

		switch (outcome.type) {
			case "unknown":
				throw new MalformedResponseError(
					`Gateway reported unknown ${current.kind.toLowerCase()} status '${report.status}' for '${reference}'`,
				);

			case "unchanged":
				ctx.logger.debug("Status unchanged", { localReference: reference, status: current.status });
				return { record: current, previousStatus: current.status, changed: false };

			case "inconsistent":
				await recordInconsistency(ctx, current, report.status, source);
				throw new InconsistentStateError({
					localReference: reference,
					currentStatus: current.status,
					reportedStatus: report.status,
				});

			case "update": {
				const next = applyReport(current, report, outcome.status, ctx.now());
				const result = await ctx.store.compareAndPut({
					model: "transaction",
					key: reference,
					expectedVersion: stored.version,
					value: next,
				});

				if (result.ok) {
					const record = result.record.value;
					ctx.logger.info("Transaction status updated", {
						localReference: reference,
						kind: record.kind,
						oldStatus: current.status,
						newStatus: record.status,
						source,
					});
					await ctx.events.emitStatusChange({
						kind: record.kind,
						localReference: reference,
						oldStatus: current.status,
						newStatus: record.status,
						record,
						created: false,
					});
					return { record, previousStatus: current.status, changed: true };
				}

				if (!result.current) {
					throw LipaError.internal(`Transaction '${reference}' disappeared during reconciliation`);
				}
				if (attempt >= conflictRetryCount) {
					throw new LipaError("INTERNAL", `Gave up reconciling '${reference}' after ${attempt + 1} version conflicts`, {
						transient: true,
					});
				}
				ctx.logger.debug("Version conflict during reconciliation; re-reading", {
					localReference: reference,
					attempt: attempt + 1,
				});
				stored = result.current;
				break;
			}
		}
	}
}

async function recordInconsistency(
	ctx: LipaContext,
	record: GatewayTransaction,
	reportedStatus: string,
	source: ReconcileSource,
): Promise<void> {
	const incident: InconsistencyRecord = {
		id: generateId(),
		kind: record.kind,
		localReference: record.localReference,
		currentStatus: record.status,
		reportedStatus,
		source,
		detectedAt: ctx.now().toISOString(),
	};

	ctx.logger.error("Gateway contradicts a terminal transaction status", {
		localReference: record.localReference,
		kind: record.kind,
		currentStatus: record.status,
		reportedStatus,
		source,
		incidentId: incident.id,
	});

	await ctx.store.put({ model: "inconsistency", key: incident.id, value: incident });
	await ctx.events.emitInconsistency(incident);
}
