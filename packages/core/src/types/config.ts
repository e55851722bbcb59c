import type { LipaStore } from "../store/adapter.js";
import type { InconsistencySubscriber, StatusChangeSubscriber } from "./event.js";
import type { Currency } from "./transaction.js";

export interface GatewayCredentials {
	clientId: string;
	apiKey: string;
}

export interface WorkerOptions {
	/** Re-queries non-terminal records at the gateway. Default: disabled, 5m interval */
	reconciliation?: boolean | { interval?: string; batchSize?: number };
}

export interface WebhookOptions {
	/** HMAC secret the gateway signs callbacks with. Falls back to `checksumSecret`. */
	secret?: string;
	/** Header carrying the hex signature. Default: "x-clickpesa-signature" */
	signatureHeader?: string;
	/** Source addresses accepted for callbacks. Empty means any. */
	allowedIps?: string[];
}

export interface LipaOptions {
	/** Store instance or factory function */
	store: LipaStore | (() => LipaStore);

	/** Gateway client id and API key */
	credentials: GatewayCredentials;

	/** Gateway API base URL (default: "https://api.clickpesa.com") */
	baseURL?: string;

	/** When set, outgoing create and preview requests carry a checksum field. */
	checksumSecret?: string;

	/** Default currency code (default: "TZS") */
	currency?: Currency;

	/** Custom fetch implementation. Defaults to global fetch. */
	fetch?: typeof fetch;

	/** Notified after every persisted status change, including creation. */
	subscribers?: StatusChangeSubscriber[];

	/** Notified whenever the gateway contradicts a terminal record. */
	inconsistencySubscribers?: InconsistencySubscriber[];

	webhook?: WebhookOptions;

	/** Background workers. All disabled by default. */
	workers?: WorkerOptions;

	/** Advanced configuration */
	advanced?: LipaAdvancedOptions;

	/** Custom logger */
	logger?: LipaLogger;
}

export interface LipaAdvancedOptions {
	/** Per-request timeout in ms. Default: 30000 */
	requestTimeoutMs?: number;
	/** Attempts for read-only gateway calls. Default: 3 */
	maxReadAttempts?: number;
	/** Base delay in ms between read retries (doubled each attempt + jitter). Default: 200 */
	retryBaseDelayMs?: number;
	/** Maximum delay in ms between read retries. Default: 2000 */
	retryMaxDelayMs?: number;
	/** Lifetime the gateway grants a token, in ms. Default: 1h */
	credentialTtlMs?: number;
	/** A credential this close to expiry is treated as expired. Default: 60000 */
	credentialSafetyMarginMs?: number;
	/** Smallest amount accepted. Default: 100 */
	minAmount?: number;
	/** Largest amount accepted. Default: no limit */
	maxAmount?: number | null;
	/** Re-read and re-apply attempts when a reconcile write loses a version race. Default: 3 */
	conflictRetryCount?: number;
	/** Clock used for expiry and timestamps. Default: `() => new Date()` */
	now?: () => Date;
}

export interface LipaLogger {
	info(message: string, data?: Record<string, unknown>): void;
	warn(message: string, data?: Record<string, unknown>): void;
	error(message: string, data?: Record<string, unknown>): void;
	debug(message: string, data?: Record<string, unknown>): void;
}
