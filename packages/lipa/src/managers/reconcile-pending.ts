// =============================================================================
// BATCH RECONCILIATION
// =============================================================================
// Re-queries non-terminal records in reference order. A limited run resumes
// after the last reference the previous run checked and starts over once it
// reaches the end, so every pending record is eventually visited whatever the
// batch size. Failures are collected per record and never stop the batch.

import type { GatewayTransaction, TransactionKind, Where } from "@lipa/core";
import { pendingStatuses, throwIfAborted, toLipaError } from "@lipa/core";
import type { LipaContext } from "../context/context.js";
import { reconcile } from "./status-reconciler.js";

export interface ReconcileFailure {
	localReference: string;
	code: string;
	message: string;
}

export interface ReconcileSummary {
	checked: number;
	updated: number;
	unchanged: number;
	failed: ReconcileFailure[];
}

/** Pending records with a reference after `after`, in reference order. */
export async function listPendingPage(
	ctx: LipaContext,
	params: { kind?: TransactionKind; after?: string | null; limit?: number },
): Promise<GatewayTransaction[]> {
	const kinds: TransactionKind[] = params.kind ? [params.kind] : ["PAYMENT", "PAYOUT"];
	const where: Where[] = [
		{ field: "status", operator: "in", value: [...new Set(kinds.flatMap((kind) => pendingStatuses(kind)))] },
	];
	if (params.kind) where.push({ field: "kind", operator: "eq", value: params.kind });
	if (params.after) where.push({ field: "localReference", operator: "gt", value: params.after });

	const rows = await ctx.store.findMany({
		model: "transaction",
		where,
		sortBy: { field: "key", direction: "asc" },
		limit: params.limit,
	});
	return rows.map((row) => row.value).filter((record) => pendingStatuses(record.kind).includes(record.status));
}

export async function reconcilePending(
	ctx: LipaContext,
	params: { kind?: TransactionKind; limit?: number; signal?: AbortSignal } = {},
): Promise<ReconcileSummary> {
	const cursorKey = params.kind ?? "ALL";
	const after = params.limit === undefined ? null : (ctx.reconcileCursors.get(cursorKey) ?? null);
	const pending = await listPendingPage(ctx, { kind: params.kind, after, limit: params.limit });
	const summary: ReconcileSummary = { checked: 0, updated: 0, unchanged: 0, failed: [] };

	for (const record of pending) {
		throwIfAborted(params.signal);
		summary.checked++;
		try {
			const result = await reconcile(ctx, record.localReference, { signal: params.signal });
			if (result.changed) summary.updated++;
			else summary.unchanged++;
		} catch (error) {
			const { code, message } = toLipaError(error);
			ctx.logger.warn("Reconciliation failed for transaction", {
				localReference: record.localReference,
				code,
				error: message,
			});
			summary.failed.push({ localReference: record.localReference, code, message });
		}
	}

	const last = pending.at(-1);
	if (params.limit !== undefined && last && pending.length >= params.limit) {
		ctx.reconcileCursors.set(cursorKey, last.localReference);
	} else {
		ctx.reconcileCursors.delete(cursorKey);
	}

	if (summary.checked > 0) {
		ctx.logger.info("Pending transactions reconciled", {
			checked: summary.checked,
			updated: summary.updated,
			unchanged: summary.unchanged,
			failed: summary.failed.length,
		});
	}
	return summary;
}
