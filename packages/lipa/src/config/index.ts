import type { LipaOptions } from "@lipa/core";
import { ConfigurationError, isCurrency } from "@lipa/core";

/** Applied when `advanced.credentialTtlMs` is not set. */
export const DEFAULT_CREDENTIAL_TTL_MS = 60 * 60 * 1000;
/** Applied when `advanced.credentialSafetyMarginMs` is not set. */
export const DEFAULT_CREDENTIAL_SAFETY_MARGIN_MS = 60_000;

// =============================================================================
// INTERVAL PARSING
// =============================================================================

const INTERVAL_UNITS = {
	s: 1_000,
	m: 60_000,
	h: 3_600_000,
	d: 86_400_000,
} as const;

function isIntervalUnit(unit: string): unit is keyof typeof INTERVAL_UNITS {
	return Object.hasOwn(INTERVAL_UNITS, unit);
}

/**
 * Parse a human-friendly interval string into milliseconds.
 *
 * Supported formats: "5s", "1m", "30m", "1h", "1d"
 */
export function parseInterval(interval: string): number {
	const match = interval.trim().match(/^(\d+(?:\.\d+)?)\s*(s|m|h|d)$/);
	const unit = match?.[2];
	if (!match || unit === undefined || !isIntervalUnit(unit)) {
		throw new ConfigurationError(
			`Invalid interval "${interval}". Expected format: <number><s|m|h|d> (e.g. "5s", "1m", "1h", "1d")`,
		);
	}

	const value = Number(match[1]);
	if (value <= 0) {
		throw new ConfigurationError(`Interval value must be positive, got ${value}`);
	}

	return value * INTERVAL_UNITS[unit];
}


function requirePositive(value: number | undefined, name: string): void {
	if (value !== undefined && (value <= 0 || !Number.isFinite(value))) {
		throw new ConfigurationError(`Lipa config: 'advanced.${name}' must be a positive finite number`);
	}
}

function requireNonNegative(value: number | undefined, name: string): void {
	if (value !== undefined && (value < 0 || !Number.isFinite(value))) {
		throw new ConfigurationError(`Lipa config: 'advanced.${name}' must be a non-negative finite number`);
	}
}

/**
 * Validate Lipa configuration options at runtime.
 * Throws ConfigurationError with clear messages on invalid configuration.
 */
export function validateConfig(options: LipaOptions): void {
	if (!options.store) {
		throw new ConfigurationError("Lipa config: 'store' is required");
	}

	const credentials = options.credentials;
	if (!credentials || !credentials.clientId?.trim() || !credentials.apiKey?.trim()) {
		throw new ConfigurationError("Lipa config: 'credentials.clientId' and 'credentials.apiKey' are required");
	}

	if (options.baseURL !== undefined) {
		let url: URL;
		try {
			url = new URL(options.baseURL);
		} catch (error) {
			throw new ConfigurationError(`Lipa config: 'baseURL' is not a valid URL, got "${options.baseURL}"`, {
				cause: error,
			});
		}
		if (url.protocol !== "https:" && url.protocol !== "http:") {
			throw new ConfigurationError(`Lipa config: 'baseURL' must use http or https, got "${url.protocol}"`);
		}
	}

	if (options.currency !== undefined && !isCurrency(options.currency)) {
		throw new ConfigurationError(
			`Lipa config: unsupported currency "${String(options.currency)}". Use TZS or USD.`,
		);
	}

	if (options.checksumSecret !== undefined && options.checksumSecret.length === 0) {
		throw new ConfigurationError("Lipa config: 'checksumSecret' must not be empty when set");
	}

	const reconciliation = options.workers?.reconciliation;
	if (typeof reconciliation === "object") {
		if (reconciliation.interval !== undefined) {
			try {
				parseInterval(reconciliation.interval);
			} catch (error) {
				throw new ConfigurationError(
					`Lipa config: 'workers.reconciliation.interval' must be a positive interval like "30s", "5m", "0.5h" or "1d", got "${reconciliation.interval}"`,
					{ cause: error },
				);
			}
		}
		if (
			reconciliation.batchSize !== undefined &&
			(!Number.isInteger(reconciliation.batchSize) || reconciliation.batchSize <= 0)
		) {
			throw new ConfigurationError("Lipa config: 'workers.reconciliation.batchSize' must be a positive integer");
		}
	}

	const adv = options.advanced;
	if (adv) {
		requirePositive(adv.requestTimeoutMs, "requestTimeoutMs");
		requirePositive(adv.credentialTtlMs, "credentialTtlMs");
		requirePositive(adv.minAmount, "minAmount");
		requireNonNegative(adv.retryBaseDelayMs, "retryBaseDelayMs");
		requireNonNegative(adv.retryMaxDelayMs, "retryMaxDelayMs");
		requireNonNegative(adv.credentialSafetyMarginMs, "credentialSafetyMarginMs");

		if (adv.maxReadAttempts !== undefined && (!Number.isInteger(adv.maxReadAttempts) || adv.maxReadAttempts < 1)) {
			throw new ConfigurationError("Lipa config: 'advanced.maxReadAttempts' must be an integer of at least 1");
		}
		if (
			adv.conflictRetryCount !== undefined &&
			(!Number.isInteger(adv.conflictRetryCount) || adv.conflictRetryCount < 0)
		) {
			throw new ConfigurationError("Lipa config: 'advanced.conflictRetryCount' must be a non-negative integer");
		}
		if (adv.maxAmount !== undefined && adv.maxAmount !== null) {
			requirePositive(adv.maxAmount, "maxAmount");
			if (adv.minAmount !== undefined && adv.maxAmount < adv.minAmount) {
				throw new ConfigurationError("Lipa config: 'advanced.maxAmount' must not be below 'advanced.minAmount'");
			}
		}
		const ttlMs = adv.credentialTtlMs ?? DEFAULT_CREDENTIAL_TTL_MS;
		const marginMs = adv.credentialSafetyMarginMs ?? DEFAULT_CREDENTIAL_SAFETY_MARGIN_MS;
		if (marginMs >= ttlMs) {
			throw new ConfigurationError(
				"Lipa config: 'advanced.credentialSafetyMarginMs' must be shorter than 'advanced.credentialTtlMs'",
			);
		}
	}
}

/**
 * Identity function for defining Lipa configuration with autocomplete support.
 * Validates configuration at runtime before returning.
 *
 * @example
 * ```ts
 * import { defineLipaConfig } from "lipa/config";
 *
 * export default defineLipaConfig({
 *   store: memoryAdapter(),
 *   credentials: { clientId: "client-id", apiKey: "api-key" },
 *   currency: "TZS",
 * });
 * ```
 */
export function defineLipaConfig(options: LipaOptions): LipaOptions {
	validateConfig(options);
	return options;
}

/** Options that can be supplied through the environment. */
export type EnvOptions = Pick<LipaOptions, "credentials" | "baseURL" | "checksumSecret" | "currency" | "webhook">;

/**
 * Read gateway settings from environment variables. Merge the result with
 * a store and any other options before passing it to `createLipa`.
 */
export function loadOptionsFromEnv(env: Record<string, string | undefined> = process.env): EnvOptions {
	const clientId = env.CLICKPESA_CLIENT_ID?.trim();
	const apiKey = env.CLICKPESA_API_KEY?.trim();
	if (!clientId || !apiKey) {
		throw new ConfigurationError("CLICKPESA_CLIENT_ID and CLICKPESA_API_KEY must be set");
	}

	const options: EnvOptions = { credentials: { clientId, apiKey } };

	const baseURL = env.CLICKPESA_API_BASE_URL?.trim();
	if (baseURL) options.baseURL = baseURL;

	const checksumSecret = env.CLICKPESA_CHECKSUM_SECRET?.trim();
	if (checksumSecret) options.checksumSecret = checksumSecret;

	const currency = env.LIPA_DEFAULT_CURRENCY?.trim().toUpperCase();
	if (currency) {
		if (!isCurrency(currency)) {
			throw new ConfigurationError(`LIPA_DEFAULT_CURRENCY must be TZS or USD, got "${currency}"`);
		}
		options.currency = currency;
	}

	const allowedIps = (env.CLICKPESA_WEBHOOK_ALLOWED_IPS ?? "")
		.split(",")
		.map((ip) => ip.trim())
		.filter((ip) => ip.length > 0);
	if (allowedIps.length > 0) options.webhook = { allowedIps };

	return options;
}
