// =============================================================================
// GATEWAY CLIENT
// =============================================================================
// Typed operations over the gateway HTTP API. Every call obtains a credential
// from the injected source, maps the response status onto the error taxonomy
// and, for 401, invalidates the failing credential and retries once.

import type {
	AccountBalance,
	Credential,
	GatewayReport,
	LipaLogger,
	PaymentPreview,
	PaymentRequest,
	PayoutPreview,
	PayoutRequest,
	TransactionKind,
} from "@lipa/core";
import {
	AuthenticationError,
	computeRequestChecksum,
	DuplicateReferenceError,
	GatewayUnavailableError,
	MalformedResponseError,
	NotFoundError,
	ValidationError,
	withRetry,
} from "@lipa/core";
import type { HttpClient, HttpResponse } from "./http.js";
import {
	extractErrorMessage,
	extractFieldErrors,
	parseBalance,
	parsePaymentPreview,
	parsePayoutPreview,
	parseReport,
} from "./parse.js";

export const GATEWAY_PATHS = {
	paymentPreview: "/third-parties/payments/preview-ussd-push-request",
	paymentCreate: "/third-parties/payments/initiate-ussd-push-request",
	paymentStatus: (reference: string) => `/third-parties/payments/${encodeURIComponent(reference)}`,
	payoutPreview: "/third-parties/payouts/preview-mobile-money-payout",
	payoutCreate: "/third-parties/payouts/create-mobile-money-payout",
	payoutStatus: (reference: string) => `/third-parties/payouts/${encodeURIComponent(reference)}`,
	balance: "/third-parties/account/balance",
} as const;

const DUPLICATE_PATTERN = /duplicate|already (exists|used|been used)/i;

/** What the gateway client needs from the credential cache. */
export interface CredentialSource {
	getValidCredential(options?: { signal?: AbortSignal }): Promise<Credential>;
	invalidate(token?: string): Promise<void>;
}

export interface ReadRetryPolicy {
	attempts: number;
	baseDelayMs: number;
	maxDelayMs: number;
}

export interface GatewayClientDeps {
	http: HttpClient;
	credentials: CredentialSource;
	checksumSecret: string | null;
	retry: ReadRetryPolicy;
	logger: LipaLogger;
}

interface CallOptions {
	signal?: AbortSignal;
}

interface GatewayCall {
	method: "GET" | "POST";
	path: string;
	body?: Record<string, unknown>;
	signal?: AbortSignal;
	/** Order reference the call concerns; carried on duplicate errors. */
	reference?: string;
}

export class GatewayClient {
	private readonly deps: GatewayClientDeps;

	constructor(deps: GatewayClientDeps) {
		this.deps = deps;
	}

	// =========================================================================
	// PAYMENTS
	// =========================================================================

	async previewPayment(request: PaymentRequest, options: CallOptions = {}): Promise<PaymentPreview> {
		const body = this.signed({
			amount: String(request.amount),
			currency: request.currency,
			orderReference: request.orderReference,
			phoneNumber: request.phoneNumber,
			fetchSenderDetails: false,
		});
		const response = await this.call({
			method: "POST",
			path: GATEWAY_PATHS.paymentPreview,
			body,
			signal: options.signal,
			reference: request.orderReference,
		});
		return parsePaymentPreview(response);
	}

	async createPayment(request: PaymentRequest, options: CallOptions = {}): Promise<GatewayReport> {
		const body = this.signed({
			amount: String(request.amount),
			currency: request.currency,
			orderReference: request.orderReference,
			phoneNumber: request.phoneNumber,
		});
		const response = await this.call({
			method: "POST",
			path: GATEWAY_PATHS.paymentCreate,
			body,
			signal: options.signal,
			reference: request.orderReference,
		});
		return this.parseCreation(response, "PAYMENT", request.orderReference);
	}

	queryPaymentStatus(orderReference: string, options: CallOptions = {}): Promise<GatewayReport> {
		return this.read(async () => {
			const response = await this.call({
				method: "GET",
				path: GATEWAY_PATHS.paymentStatus(orderReference),
				signal: options.signal,
				reference: orderReference,
			});
			return parseReport(response, "PAYMENT", orderReference);
		}, options.signal);
	}

	// =========================================================================
	// PAYOUTS
	// =========================================================================

	async previewPayout(request: PayoutRequest, options: CallOptions = {}): Promise<PayoutPreview> {
		const body = this.signed({
			amount: request.amount,
			phoneNumber: request.phoneNumber,
			currency: request.currency,
			orderReference: request.orderReference,
		});
		const response = await this.call({
			method: "POST",
			path: GATEWAY_PATHS.payoutPreview,
			body,
			signal: options.signal,
			reference: request.orderReference,
		});
		return parsePayoutPreview(response);
	}

	async createPayout(request: PayoutRequest, options: CallOptions = {}): Promise<GatewayReport> {
		const body = this.signed({
			amount: request.amount,
			phoneNumber: request.phoneNumber,
			currency: request.currency,
			orderReference: request.orderReference,
		});
		const response = await this.call({
			method: "POST",
			path: GATEWAY_PATHS.payoutCreate,
			body,
			signal: options.signal,
			reference: request.orderReference,
		});
		return this.parseCreation(response, "PAYOUT", request.orderReference);
	}

	queryPayoutStatus(orderReference: string, options: CallOptions = {}): Promise<GatewayReport> {
		return this.read(async () => {
			const response = await this.call({
				method: "GET",
				path: GATEWAY_PATHS.payoutStatus(orderReference),
				signal: options.signal,
				reference: orderReference,
			});
			return parseReport(response, "PAYOUT", orderReference);
		}, options.signal);
	}

	queryStatus(kind: TransactionKind, orderReference: string, options: CallOptions = {}): Promise<GatewayReport> {
		return kind === "PAYMENT"
			? this.queryPaymentStatus(orderReference, options)
			: this.queryPayoutStatus(orderReference, options);
	}

	// =========================================================================
	// ACCOUNT
	// =========================================================================

	getBalance(options: CallOptions = {}): Promise<AccountBalance[]> {
		return this.read(async () => {
			const response = await this.call({
				method: "GET",
				path: GATEWAY_PATHS.balance,
				signal: options.signal,
			});
			return parseBalance(response);
		}, options.signal);
	}

	// =========================================================================
	// INTERNALS
	// =========================================================================

	private signed(body: Record<string, unknown>): Record<string, unknown> {
		const secret = this.deps.checksumSecret;
		if (!secret) return body;
		return { ...body, checksum: computeRequestChecksum(body, secret) };
	}

	/** Creation responses omit the status on some channels; absent means unknown. */
	private parseCreation(body: unknown, kind: TransactionKind, reference: string): GatewayReport {
		if (body !== null && typeof body === "object" && !Array.isArray(body) && !("status" in body)) {
			return parseReport({ ...body, status: "UNKNOWN" }, kind, reference);
		}
		return parseReport(body, kind, reference);
	}

	private read<T>(operation: () => Promise<T>, signal?: AbortSignal): Promise<T> {
		const { retry, logger } = this.deps;
		return withRetry(operation, {
			attempts: retry.attempts,
			baseDelayMs: retry.baseDelayMs,
			maxDelayMs: retry.maxDelayMs,
			signal,
			shouldRetry: (error) => error instanceof GatewayUnavailableError,
			onRetry: ({ attempt, delayMs, error }) => {
				logger.warn("Retrying gateway read", {
					attempt,
					delayMs,
					error: error instanceof Error ? error.message : String(error),
				});
			},
		});
	}

	private async call(call: GatewayCall): Promise<unknown> {
		const { credentials, http, logger } = this.deps;

		let credential = await credentials.getValidCredential({ signal: call.signal });
		let response = await this.send(http, call, credential);

		if (response.status === 401) {
			logger.warn("Gateway rejected credential, refreshing", { path: call.path });
			await credentials.invalidate(credential.token);
			credential = await credentials.getValidCredential({ signal: call.signal });
			response = await this.send(http, call, credential);
			if (response.status === 401) {
				throw new AuthenticationError(
					extractErrorMessage(response.body) ?? "Gateway rejected a freshly issued credential",
					{ details: { httpStatus: 401 } },
				);
			}
		}

		return this.mapResponse(response, call);
	}

	private send(http: HttpClient, call: GatewayCall, credential: Credential): Promise<HttpResponse> {
		return http.request({
			method: call.method,
			path: call.path,
			body: call.body,
			headers: { Authorization: credential.token },
			signal: call.signal,
		});
	}

	private mapResponse(response: HttpResponse, call: GatewayCall): unknown {
		const { status, body } = response;
		if (status >= 200 && status < 300) {
			if (body === null) {
				throw new MalformedResponseError(`Gateway returned an empty body for ${call.path}`);
			}
			return body;
		}

		const message = extractErrorMessage(body);
		const details = { httpStatus: status, path: call.path };

		if (status === 403) {
			throw new AuthenticationError(message ?? "Gateway denied access", { details });
		}
		if (status === 404) {
			throw new NotFoundError(message ?? `Gateway has no record at ${call.path}`, { details });
		}
		if (status === 409 || (status >= 400 && status < 500 && message && DUPLICATE_PATTERN.test(message))) {
			throw new DuplicateReferenceError(message ?? "Order reference already used", {
				details,
				localReference: call.reference,
			});
		}
		if (status >= 400 && status < 500) {
			throw new ValidationError(message ?? `Gateway rejected the request with HTTP ${status}`, extractFieldErrors(body), {
				details,
			});
		}
		if (status >= 500) {
			throw new GatewayUnavailableError(message ?? `Gateway returned HTTP ${status}`, {
				httpStatus: status,
				details,
			});
		}
		throw new MalformedResponseError(`Unexpected HTTP ${status} from ${call.path}`, { details });
	}
}
