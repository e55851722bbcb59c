import type { GatewayCredentials, WebhookOptions, WorkerOptions } from "./config.js";
import type { Currency } from "./transaction.js";

export interface ResolvedLipaOptions {
	baseURL: string;
	credentials: GatewayCredentials;
	checksumSecret: string | null;
	currency: Currency;
	webhook: Required<Pick<WebhookOptions, "signatureHeader" | "allowedIps">> & {
		secret: string | null;
	};
	workers: WorkerOptions;
	advanced: ResolvedAdvancedOptions;
}

export interface ResolvedAdvancedOptions {
	requestTimeoutMs: number;
	maxReadAttempts: number;
	retryBaseDelayMs: number;
	retryMaxDelayMs: number;
	credentialTtlMs: number;
	credentialSafetyMarginMs: number;
	minAmount: number;
	maxAmount: number | null;
	conflictRetryCount: number;
}
