import type { Credential, LipaStore } from "@lipa/core";
import { AuthenticationError, GatewayUnavailableError } from "@lipa/core";
import { memoryAdapter } from "@lipa/memory-adapter";
import { createRecordingLogger, type RecordingLogger } from "@lipa/test-utils";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { CREDENTIAL_KEY, CredentialCache } from "../auth/credential-cache.js";

// =============================================================================
// HELPERS
// =============================================================================

const TTL_MS = 60_000;
const MARGIN_MS = 10_000;
const START = Date.parse("2026-03-01T08:00:00.000Z");

let clock = START;
let store: LipaStore;
let logger: RecordingLogger;

function createCache(authenticate: () => Promise<string>): CredentialCache {
	return new CredentialCache({
		store,
		authenticator: { authenticate },
		logger,
		ttlMs: TTL_MS,
		safetyMarginMs: MARGIN_MS,
		now: () => new Date(clock),
	});
}

/** Authenticator whose token requests stay pending until `release` is called. */
function controlledAuthenticator() {
	const pending: Array<(token: string) => void> = [];
	const authenticate = vi.fn(
		() =>
			new Promise<string>((resolve) => {
				pending.push(resolve);
			}),
	);
	return {
		authenticate,
		release: (token: string) => {
			for (const resolve of pending.splice(0)) resolve(token);
		},
	};
}

beforeEach(() => {
	clock = START;
	store = memoryAdapter();
	logger = createRecordingLogger();
});

// =============================================================================
// ACQUISITION
// =============================================================================

describe("CredentialCache acquisition", () => {
	it("issues a credential with the gateway token and the configured lifetime", async () => {
		const cache = createCache(async () => "Bearer token-1");

		const credential = await cache.getValidCredential();

		expect(credential.token).toBe("Bearer token-1");
		expect(credential.active).toBe(true);
		expect(credential.issuedAt).toBe("2026-03-01T08:00:00.000Z");
		expect(credential.expiresAt).toBe("2026-03-01T08:01:00.000Z");

		const stored = await store.get({ model: "credential", key: CREDENTIAL_KEY });
		expect(stored?.value).toEqual(credential);
		expect(stored?.version).toBe(1);
	});

	it("adds the Bearer prefix when the token lacks it", async () => {
		const cache = createCache(async () => "raw-token");

		const credential = await cache.getValidCredential();

		expect(credential.token).toBe("Bearer raw-token");
	});

	it("reuses a valid stored credential", async () => {
		const authenticate = vi.fn(async () => "Bearer token-1");
		const cache = createCache(authenticate);

		const first = await cache.getValidCredential();
		const second = await cache.getValidCredential();

		expect(second).toEqual(first);
		expect(authenticate).toHaveBeenCalledTimes(1);
	});

	it("shares one token request between concurrent callers", async () => {
		const auth = controlledAuthenticator();
		const cache = createCache(auth.authenticate);

		const callers = Promise.all([
			cache.getValidCredential(),
			cache.getValidCredential(),
			cache.getValidCredential(),
		]);
		await vi.waitFor(() => expect(auth.authenticate).toHaveBeenCalled());
		auth.release("Bearer shared");

		const credentials = await callers;
		expect(credentials.map((c) => c.token)).toEqual(["Bearer shared", "Bearer shared", "Bearer shared"]);
		expect(auth.authenticate).toHaveBeenCalledTimes(1);
	});

	it("lets an aborted caller stop waiting without cancelling the shared request", async () => {
		const auth = controlledAuthenticator();
		const cache = createCache(auth.authenticate);
		const controller = new AbortController();

		const aborted = cache.getValidCredential({ signal: controller.signal });
		const patient = cache.getValidCredential();
		await vi.waitFor(() => expect(auth.authenticate).toHaveBeenCalled());

		controller.abort();
		await expect(aborted).rejects.toThrow("Operation aborted");

		auth.release("Bearer survivor");
		expect((await patient).token).toBe("Bearer survivor");
		expect(auth.authenticate).toHaveBeenCalledTimes(1);
	});
});

// =============================================================================
// EXPIRY
// =============================================================================

describe("CredentialCache expiry", () => {
	it("treats a credential inside the safety margin as expired", async () => {
		let issued = 0;
		const cache = createCache(async () => `Bearer token-${++issued}`);

		await cache.getValidCredential();

		clock = START + TTL_MS - MARGIN_MS - 1;
		expect((await cache.getValidCredential()).token).toBe("Bearer token-1");

		clock = START + TTL_MS - MARGIN_MS;
		expect((await cache.getValidCredential()).token).toBe("Bearer token-2");
		expect(issued).toBe(2);
	});

	it("reports validity from the active flag and the expiry time", () => {
		const cache = createCache(async () => "Bearer unused");
		const credential: Credential = {
			id: "cred-1",
			token: "Bearer abc",
			issuedAt: new Date(START).toISOString(),
			expiresAt: new Date(START + TTL_MS).toISOString(),
			active: true,
		};

		expect(cache.isValid(credential)).toBe(true);
		expect(cache.isValid({ ...credential, active: false })).toBe(false);
		expect(cache.isValid({ ...credential, expiresAt: new Date(START + MARGIN_MS).toISOString() })).toBe(false);
	});
});

// =============================================================================
// INVALIDATION
// =============================================================================

describe("CredentialCache invalidation", () => {
	it("deactivates the credential carrying the rejected token", async () => {
		let issued = 0;
		const cache = createCache(async () => `Bearer token-${++issued}`);
		const first = await cache.getValidCredential();

		await cache.invalidate(first.token);

		const stored = await store.get({ model: "credential", key: CREDENTIAL_KEY });
		expect(stored?.value.active).toBe(false);
		expect(logger.find("info", "Credential invalidated")).toEqual([
			{ level: "info", message: "Credential invalidated", data: { credentialId: first.id } },
		]);

		const next = await cache.getValidCredential();
		expect(next.token).toBe("Bearer token-2");
	});

	it("leaves a newer credential alone when given a stale token", async () => {
		const authenticate = vi.fn(async () => "Bearer current");
		const cache = createCache(authenticate);
		await cache.getValidCredential();

		await cache.invalidate("Bearer stale");

		const stored = await store.get({ model: "credential", key: CREDENTIAL_KEY });
		expect(stored?.value.active).toBe(true);
		expect(stored?.version).toBe(1);
		await cache.getValidCredential();
		expect(authenticate).toHaveBeenCalledTimes(1);
	});

	it("deactivates whatever is active when no token is given", async () => {
		const cache = createCache(async () => "Bearer current");
		await cache.getValidCredential();

		await cache.invalidate();

		const stored = await store.get({ model: "credential", key: CREDENTIAL_KEY });
		expect(stored?.value.active).toBe(false);
	});

	it("does nothing when no credential is stored", async () => {
		const cache = createCache(async () => "Bearer unused");

		await cache.invalidate("Bearer anything");

		expect(await store.get({ model: "credential", key: CREDENTIAL_KEY })).toBeNull();
	});
});

// =============================================================================
// FAILURES AND RACES
// =============================================================================

describe("CredentialCache failures", () => {
	it("persists nothing when the token request fails, and retries on the next call", async () => {
		const authenticate = vi
			.fn<() => Promise<string>>()
			.mockRejectedValueOnce(new GatewayUnavailableError("Token endpoint returned HTTP 503"))
			.mockResolvedValueOnce("Bearer recovered");
		const cache = createCache(authenticate);

		const failure = cache.getValidCredential();
		await expect(failure).rejects.toBeInstanceOf(AuthenticationError);
		await expect(failure).rejects.toThrow("Credential acquisition failed: Token endpoint returned HTTP 503");

		expect(await store.get({ model: "credential", key: CREDENTIAL_KEY })).toBeNull();
		expect(logger.find("error", "Credential acquisition failed")).toEqual([
			{
				level: "error",
				message: "Credential acquisition failed",
				data: { error: "Token endpoint returned HTTP 503" },
			},
		]);

		expect((await cache.getValidCredential()).token).toBe("Bearer recovered");
		expect(authenticate).toHaveBeenCalledTimes(2);
	});

	it("passes an AuthenticationError from the token request through unchanged", async () => {
		const rejection = new AuthenticationError("Invalid client credentials");
		const cache = createCache(() => Promise.reject(rejection));

		await expect(cache.getValidCredential()).rejects.toBe(rejection);
	});

	it("returns a valid credential another process stored while the token was requested", async () => {
		const winner: Credential = {
			id: "other-process",
			token: "Bearer other",
			issuedAt: new Date(START).toISOString(),
			expiresAt: new Date(START + TTL_MS).toISOString(),
			active: true,
		};
		const cache = createCache(async () => {
			await store.put({ model: "credential", key: CREDENTIAL_KEY, value: winner });
			return "Bearer mine";
		});

		const credential = await cache.getValidCredential();

		expect(credential).toEqual(winner);
		const stored = await store.get({ model: "credential", key: CREDENTIAL_KEY });
		expect(stored?.value.token).toBe("Bearer other");
		expect(stored?.version).toBe(1);
	});

	it("replaces a deactivated credential written concurrently", async () => {
		const cache = createCache(async () => {
			await store.put({
				model: "credential",
				key: CREDENTIAL_KEY,
				value: {
					id: "revoked",
					token: "Bearer revoked",
					issuedAt: new Date(START).toISOString(),
					expiresAt: new Date(START + TTL_MS).toISOString(),
					active: false,
				},
			});
			return "Bearer mine";
		});

		const credential = await cache.getValidCredential();

		expect(credential.token).toBe("Bearer mine");
		const stored = await store.get({ model: "credential", key: CREDENTIAL_KEY });
		expect(stored?.value.id).toBe(credential.id);
		expect(stored?.version).toBe(2);
	});
});
