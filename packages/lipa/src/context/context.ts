// =============================================================================
// CONTEXT BUILDER
// =============================================================================
// Builds LipaContext from LipaOptions. Resolves the store and logger, merges
// config defaults and wires the gateway client to its credential cache.

import type {
	LipaAdvancedOptions,
	LipaLogger,
	LipaOptions,
	LipaStore,
	ResolvedAdvancedOptions,
	ResolvedLipaOptions,
} from "@lipa/core";
import { SingleFlight } from "@lipa/core";
import { createConsoleLogger } from "@lipa/core/logger";
import { CredentialCache } from "../auth/credential-cache.js";
import {
	DEFAULT_CREDENTIAL_SAFETY_MARGIN_MS,
	DEFAULT_CREDENTIAL_TTL_MS,
	validateConfig,
} from "../config/index.js";
import { createAuthenticator } from "../gateway/authenticate.js";
import { GatewayClient } from "../gateway/gateway-client.js";
import { createHttpClient } from "../gateway/http.js";
import type { CreationOutcome } from "../managers/transaction-manager.js";
import { EventBus } from "./events.js";

export interface LipaContext {
	store: LipaStore;
	options: ResolvedLipaOptions;
	logger: LipaLogger;
	gateway: GatewayClient;
	credentials: CredentialCache;
	events: EventBus;
	now: () => Date;
	/** In-process deduplication of creation calls, keyed by order reference. */
	creations: SingleFlight<CreationOutcome>;
	/** Last reference checked by a limited batch reconciliation, per kind filter. */
	reconcileCursors: Map<string, string>;
}

// =============================================================================
// DEFAULT CONFIG VALUES
// =============================================================================

export const DEFAULT_BASE_URL = "https://api.clickpesa.com";
export const DEFAULT_SIGNATURE_HEADER = "x-clickpesa-signature";

const DEFAULT_ADVANCED: ResolvedAdvancedOptions = {
	requestTimeoutMs: 30_000,
	maxReadAttempts: 3,
	retryBaseDelayMs: 200,
	retryMaxDelayMs: 2_000,
	credentialTtlMs: DEFAULT_CREDENTIAL_TTL_MS,
	credentialSafetyMarginMs: DEFAULT_CREDENTIAL_SAFETY_MARGIN_MS,
	minAmount: 100,
	maxAmount: null,
	conflictRetryCount: 3,
};

// =============================================================================
// BUILD CONTEXT
// =============================================================================

export function buildContext(options: LipaOptions): LipaContext {
	validateConfig(options);

	const store = typeof options.store === "function" ? options.store() : options.store;
	const logger = options.logger ?? createConsoleLogger();
	const now = options.advanced?.now ?? (() => new Date());

	// Merge advanced options with defaults
	const adv: LipaAdvancedOptions = options.advanced ?? {};
	const advanced: ResolvedAdvancedOptions = {
		requestTimeoutMs: adv.requestTimeoutMs ?? DEFAULT_ADVANCED.requestTimeoutMs,
		maxReadAttempts: adv.maxReadAttempts ?? DEFAULT_ADVANCED.maxReadAttempts,
		retryBaseDelayMs: adv.retryBaseDelayMs ?? DEFAULT_ADVANCED.retryBaseDelayMs,
		retryMaxDelayMs: adv.retryMaxDelayMs ?? DEFAULT_ADVANCED.retryMaxDelayMs,
		credentialTtlMs: adv.credentialTtlMs ?? DEFAULT_ADVANCED.credentialTtlMs,
		credentialSafetyMarginMs: adv.credentialSafetyMarginMs ?? DEFAULT_ADVANCED.credentialSafetyMarginMs,
		minAmount: adv.minAmount ?? DEFAULT_ADVANCED.minAmount,
		maxAmount: adv.maxAmount ?? DEFAULT_ADVANCED.maxAmount,
		conflictRetryCount: adv.conflictRetryCount ?? DEFAULT_ADVANCED.conflictRetryCount,
	};

	const checksumSecret = options.checksumSecret ?? null;
	const resolved: ResolvedLipaOptions = {
		baseURL: options.baseURL ?? DEFAULT_BASE_URL,
		credentials: options.credentials,
		checksumSecret,
		currency: options.currency ?? "TZS",
		webhook: {
			secret: options.webhook?.secret ?? checksumSecret,
			signatureHeader: (options.webhook?.signatureHeader ?? DEFAULT_SIGNATURE_HEADER).toLowerCase(),
			allowedIps: options.webhook?.allowedIps ?? [],
		},
		workers: options.workers ?? {},
		advanced,
	};

	if (!resolved.webhook.secret) {
		logger.warn(
			"No webhook secret is configured. Inbound notifications cannot be verified and will be rejected.",
		);
	}

	const http = createHttpClient({
		baseURL: resolved.baseURL,
		timeoutMs: advanced.requestTimeoutMs,
		fetch: options.fetch,
		logger,
	});
	const authenticator = createAuthenticator({ http, credentials: resolved.credentials, logger });
	const credentials = new CredentialCache({
		store,
		authenticator,
		logger,
		ttlMs: advanced.credentialTtlMs,
		safetyMarginMs: advanced.credentialSafetyMarginMs,
		now,
	});
	const gateway = new GatewayClient({
		http,
		credentials,
		checksumSecret,
		retry: {
			attempts: advanced.maxReadAttempts,
			baseDelayMs: advanced.retryBaseDelayMs,
			maxDelayMs: advanced.retryMaxDelayMs,
		},
		logger,
	});

	return {
		store,
		options: resolved,
		logger,
		gateway,
		credentials,
		events: new EventBus(logger, {
			subscribers: options.subscribers,
			inconsistencySubscribers: options.inconsistencySubscribers,
		}),
		now,
		creations: new SingleFlight<CreationOutcome>(),
		reconcileCursors: new Map<string, string>(),
	};
}
