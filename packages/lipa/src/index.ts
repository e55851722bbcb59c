// Main entry point
export { createLipa, type Lipa } from "./lipa/base.js";

// Configuration
export {
	defineLipaConfig,
	type EnvOptions,
	loadOptionsFromEnv,
	parseInterval,
	validateConfig,
} from "./config/index.js";

// Context
export { buildContext, DEFAULT_BASE_URL, DEFAULT_SIGNATURE_HEADER, type LipaContext } from "./context/context.js";
export { EventBus } from "./context/events.js";

// Gateway
export { CREDENTIAL_KEY, CredentialCache, type CredentialCacheDeps } from "./auth/credential-cache.js";
export { type Authenticator, createAuthenticator, TOKEN_PATH } from "./gateway/authenticate.js";
export {
	type CredentialSource,
	GATEWAY_PATHS,
	GatewayClient,
	type GatewayClientDeps,
	type ReadRetryPolicy,
} from "./gateway/gateway-client.js";
export { createHttpClient, type HttpClient, type HttpRequest, type HttpResponse } from "./gateway/http.js";

// Managers
export type { ReconcileFailure, ReconcileSummary } from "./managers/reconcile-pending.js";
export {
	evaluateTransition,
	type ReconcileOptions,
	type ReconcileResult,
	type ReconcileSource,
	type TransitionOutcome,
} from "./managers/status-reconciler.js";
export { findFieldMismatch } from "./managers/transaction-helpers.js";
export type { CreateTransactionParams } from "./managers/transaction-manager.js";

// Workers
export { type LipaWorkerDefinition, LipaWorkerRunner } from "./infrastructure/worker-runner.js";

// Webhooks
export {
	extractOrderReference,
	type HeaderBag,
	type WebhookOutcome,
	type WebhookRejection,
	type WebhookRequest,
} from "./webhooks/index.js";

// Re-export the shared surface
export * from "@lipa/core";
