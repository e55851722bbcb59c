// =============================================================================
// PAYMENT MANAGER
// =============================================================================
// Collections by USSD push: the customer approves the charge on their phone
// and the payment settles asynchronously.

import type { GatewayTransaction, PaymentMethod, PaymentRequest } from "@lipa/core";
import { PreviewRejectedError } from "@lipa/core";
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

function toPaymentRequest(request: TransactionRequest): PaymentRequest {
	return {
		amount: request.amount,
		currency: request.currency,
		orderReference: request.orderReference,
		phoneNumber: request.phoneNumber,
	};
}

const PAYMENT_OPERATIONS: TransactionOperations = {
	kind: "PAYMENT",
	initialStatus: "PROCESSING",

	async preview(ctx, request, signal) {
		const preview = await ctx.gateway.previewPayment(toPaymentRequest(request), { signal });
		const available = preview.activeMethods.filter((method) => method.status === "AVAILABLE");
		if (available.length === 0) {
			ctx.logger.warn("Payment preview found no available method", {
				localReference: request.orderReference,
				methods: preview.activeMethods.map((method) => `${method.name}:${method.status}`),
			});
			throw new PreviewRejectedError(
				`No payment method is available for '${request.orderReference}'`,
				{ details: { methods: preview.activeMethods.map((method) => method.name) } },
			);
		}
	},

	create(ctx, request, signal) {
		return ctx.gateway.createPayment(toPaymentRequest(request), { signal });
	},
};

export function createPayment(ctx: LipaContext, params: CreateTransactionParams): Promise<GatewayTransaction> {
	return createTransaction(ctx, PAYMENT_OPERATIONS, params);
}

export function getPayment(ctx: LipaContext, localReference: string): Promise<GatewayTransaction> {
	return getTransaction(ctx, "PAYMENT", localReference);
}

export function checkPaymentStatus(
	ctx: LipaContext,
	localReference: string,
	options: { signal?: AbortSignal } = {},
): Promise<ReconcileResult> {
	return reconcile(ctx, localReference, { ...options, kind: "PAYMENT" });
}

/** Methods the gateway offers for this payment, whatever their status. */
export async function getAvailableMethods(
	ctx: LipaContext,
	params: Omit<CreateTransactionParams, "previewFirst" | "metadata">,
): Promise<PaymentMethod[]> {
	const request = validateRequest(ctx, "PAYMENT", params);
	const preview = await ctx.gateway.previewPayment(toPaymentRequest(request), { signal: params.signal });
	return preview.activeMethods;
}
