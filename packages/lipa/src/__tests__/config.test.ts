import type { LipaOptions } from "@lipa/core";
import { ConfigurationError } from "@lipa/core";
import { memoryAdapter } from "@lipa/memory-adapter";
import { createRecordingLogger } from "@lipa/test-utils";
import { describe, expect, it } from "vitest";
import { defineLipaConfig, loadOptionsFromEnv, validateConfig } from "../config/index.js";
import { buildContext, DEFAULT_BASE_URL } from "../context/context.js";
import { createLipa } from "../lipa/base.js";

function baseOptions(overrides: Partial<LipaOptions> = {}): LipaOptions {
	return {
		store: memoryAdapter(),
		credentials: { clientId: "test-client", apiKey: "test-api-key" },
		logger: createRecordingLogger(),
		...overrides,
	};
}

// =============================================================================
// VALIDATION
// =============================================================================

describe("validateConfig", () => {
	it("accepts minimal options", () => {
		expect(() => validateConfig(baseOptions())).not.toThrow();
	});

	it.each<[string, Partial<LipaOptions>, string]>([
		[
			"an empty API key",
			{ credentials: { clientId: "test-client", apiKey: " " } },
			"Lipa config: 'credentials.clientId' and 'credentials.apiKey' are required",
		],
		["an unparseable base URL", { baseURL: "not a url" }, `Lipa config: 'baseURL' is not a valid URL, got "not a url"`],
		["a non-HTTP base URL", { baseURL: "ftp://example.com" }, `Lipa config: 'baseURL' must use http or https, got "ftp:"`],
		["an empty checksum secret", { checksumSecret: "" }, "Lipa config: 'checksumSecret' must not be empty when set"],
		[
			"a malformed worker interval",
			{ workers: { reconciliation: { interval: "5 minutes" } } },
			`Lipa config: 'workers.reconciliation.interval' must be a positive interval like "30s", "5m", "0.5h" or "1d", got "5 minutes"`,
		],
		[
			"a zero worker interval",
			{ workers: { reconciliation: { interval: "0s" } } },
			`Lipa config: 'workers.reconciliation.interval' must be a positive interval like "30s", "5m", "0.5h" or "1d", got "0s"`,
		],
		[
			"a zero batch size",
			{ workers: { reconciliation: { batchSize: 0 } } },
			"Lipa config: 'workers.reconciliation.batchSize' must be a positive integer",
		],
		[
			"a zero request timeout",
			{ advanced: { requestTimeoutMs: 0 } },
			"Lipa config: 'advanced.requestTimeoutMs' must be a positive finite number",
		],
		[
			"a negative retry delay",
			{ advanced: { retryBaseDelayMs: -1 } },
			"Lipa config: 'advanced.retryBaseDelayMs' must be a non-negative finite number",
		],
		[
			"zero read attempts",
			{ advanced: { maxReadAttempts: 0 } },
			"Lipa config: 'advanced.maxReadAttempts' must be an integer of at least 1",
		],
		[
			"a negative conflict retry count",
			{ advanced: { conflictRetryCount: -1 } },
			"Lipa config: 'advanced.conflictRetryCount' must be a non-negative integer",
		],
		[
			"a maximum amount below the minimum",
			{ advanced: { minAmount: 1000, maxAmount: 500 } },
			"Lipa config: 'advanced.maxAmount' must not be below 'advanced.minAmount'",
		],
		[
			"a safety margin as long as the credential lifetime",
			{ advanced: { credentialTtlMs: 60_000, credentialSafetyMarginMs: 60_000 } },
			"Lipa config: 'advanced.credentialSafetyMarginMs' must be shorter than 'advanced.credentialTtlMs'",
		],
		[
			"a credential lifetime within the default safety margin",
			{ advanced: { credentialTtlMs: 30_000 } },
			"Lipa config: 'advanced.credentialSafetyMarginMs' must be shorter than 'advanced.credentialTtlMs'",
		],
		[
			"a safety margin beyond the default credential lifetime",
			{ advanced: { credentialSafetyMarginMs: 3_600_000 } },
			"Lipa config: 'advanced.credentialSafetyMarginMs' must be shorter than 'advanced.credentialTtlMs'",
		],
	])("rejects %s", (_label, overrides, message) => {
		expect(() => validateConfig(baseOptions(overrides))).toThrow(message);
	});

	it("accepts a fractional worker interval", () => {
		expect(() => validateConfig(baseOptions({ workers: { reconciliation: { interval: "0.5h" } } }))).not.toThrow();
	});

	it("accepts a short credential lifetime with a shorter margin", () => {
		expect(() =>
			validateConfig(baseOptions({ advanced: { credentialTtlMs: 30_000, credentialSafetyMarginMs: 5_000 } })),
		).not.toThrow();
	});

	it("makes createLipa throw before any operation runs", () => {
		expect(() => createLipa(baseOptions({ baseURL: "not a url" }))).toThrow(ConfigurationError);
	});

	it("returns the options unchanged from defineLipaConfig", () => {
		const options = baseOptions({ currency: "USD" });

		expect(defineLipaConfig(options)).toBe(options);
	});
});

// =============================================================================
// ENVIRONMENT
// =============================================================================

describe("loadOptionsFromEnv", () => {
	it("reads every supported variable", () => {
		const options = loadOptionsFromEnv({
			CLICKPESA_CLIENT_ID: " env-client ",
			CLICKPESA_API_KEY: "env-key",
			CLICKPESA_API_BASE_URL: "https://sandbox.example.com",
			CLICKPESA_CHECKSUM_SECRET: "test-checksum",
			LIPA_DEFAULT_CURRENCY: "usd",
			CLICKPESA_WEBHOOK_ALLOWED_IPS: "10.0.0.1, 10.0.0.2,",
		});

		expect(options).toEqual({
			credentials: { clientId: "env-client", apiKey: "env-key" },
			baseURL: "https://sandbox.example.com",
			checksumSecret: "test-checksum",
			currency: "USD",
			webhook: { allowedIps: ["10.0.0.1", "10.0.0.2"] },
		});
	});

	it("needs only the credentials", () => {
		expect(loadOptionsFromEnv({ CLICKPESA_CLIENT_ID: "env-client", CLICKPESA_API_KEY: "env-key" })).toEqual({
			credentials: { clientId: "env-client", apiKey: "env-key" },
		});
	});

	it("requires the client id and API key", () => {
		expect(() => loadOptionsFromEnv({ CLICKPESA_CLIENT_ID: "env-client" })).toThrow(
			"CLICKPESA_CLIENT_ID and CLICKPESA_API_KEY must be set",
		);
	});

	it("rejects an unsupported currency", () => {
		expect(() =>
			loadOptionsFromEnv({ CLICKPESA_CLIENT_ID: "c", CLICKPESA_API_KEY: "k", LIPA_DEFAULT_CURRENCY: "eur" }),
		).toThrow('LIPA_DEFAULT_CURRENCY must be TZS or USD, got "EUR"');
	});
});

// =============================================================================
// CONTEXT
// =============================================================================

describe("buildContext", () => {
	it("fills in defaults", () => {
		const ctx = buildContext(baseOptions({ webhook: { secret: "test-secret" } }));

		expect(ctx.options.baseURL).toBe(DEFAULT_BASE_URL);
		expect(ctx.options.currency).toBe("TZS");
		expect(ctx.options.checksumSecret).toBeNull();
		expect(ctx.options.webhook).toEqual({
			secret: "test-secret",
			signatureHeader: "x-clickpesa-signature",
			allowedIps: [],
		});
		expect(ctx.options.advanced).toEqual({
			requestTimeoutMs: 30_000,
			maxReadAttempts: 3,
			retryBaseDelayMs: 200,
			retryMaxDelayMs: 2_000,
			credentialTtlMs: 3_600_000,
			credentialSafetyMarginMs: 60_000,
			minAmount: 100,
			maxAmount: null,
			conflictRetryCount: 3,
		});
	});

	it("merges advanced options field by field", () => {
		const ctx = buildContext(baseOptions({ advanced: { maxReadAttempts: 5 } }));

		expect(ctx.options.advanced.maxReadAttempts).toBe(5);
		expect(ctx.options.advanced.requestTimeoutMs).toBe(30_000);
	});

	it("verifies webhooks with the checksum secret unless a webhook secret is given", () => {
		const ctx = buildContext(
			baseOptions({ checksumSecret: "test-checksum", webhook: { signatureHeader: "X-Signature" } }),
		);

		expect(ctx.options.webhook.secret).toBe("test-checksum");
		expect(ctx.options.webhook.signatureHeader).toBe("x-signature");
	});

	it("warns when notifications cannot be verified", () => {
		const logger = createRecordingLogger();

		buildContext(baseOptions({ logger }));

		expect(
			logger.find(
				"warn",
				"No webhook secret is configured. Inbound notifications cannot be verified and will be rejected.",
			),
		).toHaveLength(1);
	});

	it("calls a store factory once", () => {
		const store = memoryAdapter();
		let calls = 0;

		const ctx = buildContext(
			baseOptions({
				store: () => {
					calls++;
					return store;
				},
			}),
		);

		expect(ctx.store).toBe(store);
		expect(calls).toBe(1);
	});
});
