// =============================================================================
// LIPA -- Main entry point
// =============================================================================
// Creates the Lipa instance that provides the gateway integration API. Every
// operation resolves to a LipaResult; nothing on this surface rejects.

import type {
	AccountBalance,
	GatewayTransaction,
	InconsistencySubscriber,
	LipaOptions,
	LipaResult,
	PaymentMethod,
	PayoutPreview,
	StatusChangeSubscriber,
	TransactionKind,
} from "@lipa/core";
import { settle } from "@lipa/core";
import { buildContext, type LipaContext } from "../context/context.js";
import { createWorkerRunner, type LipaWorkerRunner } from "../infrastructure/worker-runner.js";
import * as account from "../managers/account-manager.js";
import * as payments from "../managers/payment-manager.js";
import * as payouts from "../managers/payout-manager.js";
import { type ReconcileSummary, reconcilePending } from "../managers/reconcile-pending.js";
import { type ReconcileResult, reconcile } from "../managers/status-reconciler.js";
import { type CreateTransactionParams, listPending } from "../managers/transaction-manager.js";
import { handleNotification, type WebhookOutcome, type WebhookRequest } from "../webhooks/index.js";

type PreviewParams = Omit<CreateTransactionParams, "previewFirst" | "metadata">;
type CallOptions = { signal?: AbortSignal };

// =============================================================================
// LIPA INTERFACE
// =============================================================================

export interface Lipa {
	payments: {
		create: (params: CreateTransactionParams) => Promise<LipaResult<GatewayTransaction>>;
		get: (localReference: string) => Promise<LipaResult<GatewayTransaction>>;
		checkStatus: (localReference: string, options?: CallOptions) => Promise<LipaResult<ReconcileResult>>;
		getAvailableMethods: (params: PreviewParams) => Promise<LipaResult<PaymentMethod[]>>;
	};
	payouts: {
		create: (params: CreateTransactionParams) => Promise<LipaResult<GatewayTransaction>>;
		get: (localReference: string) => Promise<LipaResult<GatewayTransaction>>;
		checkStatus: (localReference: string, options?: CallOptions) => Promise<LipaResult<ReconcileResult>>;
		preview: (params: PreviewParams) => Promise<LipaResult<PayoutPreview>>;
	};
	transactions: {
		reconcile: (localReference: string, options?: CallOptions) => Promise<LipaResult<ReconcileResult>>;
		reconcilePending: (params?: {
			kind?: TransactionKind;
			limit?: number;
			signal?: AbortSignal;
		}) => Promise<LipaResult<ReconcileSummary>>;
		listPending: (params?: { kind?: TransactionKind; limit?: number }) => Promise<LipaResult<GatewayTransaction[]>>;
	};
	account: {
		getBalance: (options?: CallOptions) => Promise<LipaResult<AccountBalance[]>>;
	};
	webhooks: {
		/** Verify and process an inbound notification. Always resolves. */
		handle: (request: WebhookRequest) => Promise<WebhookOutcome>;
	};
	events: {
		/** Returns a function that removes the subscriber. */
		subscribe: (subscriber: StatusChangeSubscriber) => () => void;
		onInconsistency: (subscriber: InconsistencySubscriber) => () => void;
	};
	workers: {
		start: () => Promise<LipaResult<void>>;
		stop: () => Promise<void>;
	};
	$context: LipaContext;
	$options: LipaOptions;
}

// =============================================================================
// CREATE LIPA
// =============================================================================

/**
 * Create a Lipa instance. Invalid options throw ConfigurationError here,
 * before any operation can run.
 *
 * @example
 * ```ts
 * import { createLipa } from "lipa";
 * import { memoryAdapter } from "@lipa/memory-adapter";
 *
 * const lipa = createLipa({
 *   store: memoryAdapter(),
 *   credentials: { clientId: "client-id", apiKey: "api-key" },
 * });
 *
 * const result = await lipa.payments.create({
 *   amount: 1000,
 *   phoneNumber: "0712345678",
 *   localReference: "ORDER-1",
 * });
 * ```
 */
export function createLipa(options: LipaOptions): Lipa {
	const ctx = buildContext(options);
	let workerRunner: LipaWorkerRunner | null = null;

	return {
		payments: {
			create: (params) => settle(() => payments.createPayment(ctx, params)),
			get: (localReference) => settle(() => payments.getPayment(ctx, localReference)),
			checkStatus: (localReference, callOptions) =>
				settle(() => payments.checkPaymentStatus(ctx, localReference, callOptions)),
			getAvailableMethods: (params) => settle(() => payments.getAvailableMethods(ctx, params)),
		},
		payouts: {
			create: (params) => settle(() => payouts.createPayout(ctx, params)),
			get: (localReference) => settle(() => payouts.getPayout(ctx, localReference)),
			checkStatus: (localReference, callOptions) =>
				settle(() => payouts.checkPayoutStatus(ctx, localReference, callOptions)),
			preview: (params) => settle(() => payouts.previewPayout(ctx, params)),
		},
		transactions: {
			reconcile: (localReference, callOptions) => settle(() => reconcile(ctx, localReference, callOptions)),
			reconcilePending: (params) => settle(() => reconcilePending(ctx, params)),
			listPending: (params) => settle(() => listPending(ctx, params)),
		},
		account: {
			getBalance: (callOptions) => settle(() => account.getBalance(ctx, callOptions)),
		},
		webhooks: {
			handle: (request) => handleNotification(ctx, request),
		},
		events: {
			subscribe: (subscriber) => ctx.events.subscribe(subscriber),
			onInconsistency: (subscriber) => ctx.events.onInconsistency(subscriber),
		},
		workers: {
			start: () =>
				settle(async () => {
					if (workerRunner?.isRunning) return;
					const runner = createWorkerRunner(ctx);
					runner.start();
					workerRunner = runner;
				}),
			stop: async () => {
				if (workerRunner) {
					await workerRunner.stop();
					workerRunner = null;
				}
			},
		},
		$context: ctx,
		$options: options,
	};
}
