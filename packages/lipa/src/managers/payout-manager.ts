// =============================================================================
// PAYOUT MANAGER
// =============================================================================
// Disbursements to mobile wallets, funded from the merchant's gateway balance.

import type { GatewayTransaction, PayoutPreview, PayoutRequest } from "@lipa/core";
import { InsufficientBalanceError } from "@lipa/core";
import type { LipaContext } from "../context/context.js";
import type { TransactionRequest } from "./transaction-helpers.js";
import {
	type CreateTransactionParams,
	createTransaction,
	getTransaction,
	type TransactionOperations,
	validateRequest,
} from "./transaction-manager.js";
import { type ReconcileResult, reconcile } from "./status-reconciler.js";

function toPayoutRequest(request: TransactionRequest): PayoutRequest {
	return {
		amount: request.amount,
		currency: request.currency,
		orderReference: request.orderReference,
		phoneNumber: request.phoneNumber,
	};
}

const PAYOUT_OPERATIONS: TransactionOperations = {
	kind: "PAYOUT",
	initialStatus: "AUTHORIZED",

	async preview(ctx, request, signal) {
		const preview = await ctx.gateway.previewPayout(toPayoutRequest(request), { signal });
		if (preview.balance < preview.amount) {
			ctx.logger.warn("Payout preview reports insufficient balance", {
				localReference: request.orderReference,
				balance: preview.balance,
				required: preview.amount,
			});
			throw new InsufficientBalanceError(
				`Insufficient balance: ${preview.balance} available, ${preview.amount} required`,
				{ available: preview.balance, required: preview.amount },
			);
		}
	},

	create(ctx, request, signal) {
		return ctx.gateway.createPayout(toPayoutRequest(request), { signal });
	},
};

export function createPayout(ctx: LipaContext, params: CreateTransactionParams): Promise<GatewayTransaction> {
	return createTransaction(ctx, PAYOUT_OPERATIONS, params);
}

export function getPayout(ctx: LipaContext, localReference: string): Promise<GatewayTransaction> {
	return getTransaction(ctx, "PAYOUT", localReference);
}

export function checkPayoutStatus(
	ctx: LipaContext,
	localReference: string,
	options: { signal?: AbortSignal } = {},
): Promise<ReconcileResult> {
	return reconcile(ctx, localReference, { ...options, kind: "PAYOUT" });
}

/** Fee, total debit and current balance for a prospective payout. */
export async function previewPayout(
	ctx: LipaContext,
	params: Omit<CreateTransactionParams, "previewFirst" | "metadata">,
): Promise<PayoutPreview> {
	const request = validateRequest(ctx, "PAYOUT", params);
	return ctx.gateway.previewPayout(toPayoutRequest(request), { signal: params.signal });
}
