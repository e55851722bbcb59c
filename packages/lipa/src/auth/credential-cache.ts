// =============================================================================
// CREDENTIAL CACHE
// =============================================================================
// Holds the active bearer credential in the store under a single key.
// Acquisition is single-flight per process: concurrent callers share one
// token request and its outcome. Rotation is a compare-and-put against the
// version that was read, so two processes racing replace it at most once each.

import type { Credential, LipaLogger, LipaStore, StoredRecord } from "@lipa/core";
import {
	AuthenticationError,
	generateId,
	LipaError,
	waitWithSignal,
} from "@lipa/core";
import type { Authenticator } from "../gateway/authenticate.js";
import type { CredentialSource } from "../gateway/gateway-client.js";

export const CREDENTIAL_KEY = "active";

export interface CredentialCacheDeps {
	store: LipaStore;
	authenticator: Authenticator;
	logger: LipaLogger;
	/** Lifetime the gateway grants a token. */
	ttlMs: number;
	/** A credential this close to expiry counts as expired. */
	safetyMarginMs: number;
	now: () => Date;
}

export class CredentialCache implements CredentialSource {
	private readonly deps: CredentialCacheDeps;
	private inFlight: Promise<Credential> | null = null;

	constructor(deps: CredentialCacheDeps) {
		this.deps = deps;
	}

	isValid(credential: Credential): boolean {
		if (!credential.active) return false;
		const expiresAt = Date.parse(credential.expiresAt);
		return this.deps.now().getTime() < expiresAt - this.deps.safetyMarginMs;
	}

	/**
	 * Return the stored credential when still valid, otherwise wait for the
	 * shared acquisition. Aborting `signal` ends only this caller's wait.
	 */
	async getValidCredential(options: { signal?: AbortSignal } = {}): Promise<Credential> {
		const stored = await this.read();
		if (stored && this.isValid(stored.value)) return stored.value;
		return waitWithSignal(this.acquire(), options.signal);
	}

	/**
	 * Deactivate the active credential. With `token`, only when the stored
	 * credential still carries that token; a newer one is left alone.
	 */
	async invalidate(token?: string): Promise<void> {
		const stored = await this.read();
		if (!stored || !stored.value.active) return;
		if (token !== undefined && stored.value.token !== token) return;

		const result = await this.deps.store.compareAndPut({
			model: "credential",
			key: CREDENTIAL_KEY,
			expectedVersion: stored.version,
			value: { ...stored.value, active: false },
		});
		if (result.ok) {
			this.deps.logger.info("Credential invalidated", { credentialId: stored.value.id });
		} else {
			this.deps.logger.debug("Credential changed before invalidation; leaving it", {
				credentialId: stored.value.id,
			});
		}
	}

	private read(): Promise<StoredRecord<Credential> | null> {
		return this.deps.store.get({ model: "credential", key: CREDENTIAL_KEY });
	}

	private acquire(): Promise<Credential> {
		if (!this.inFlight) {
			this.inFlight = this.rotate().finally(() => {
				this.inFlight = null;
			});
		}
		return this.inFlight;
	}

	private async rotate(): Promise<Credential> {
		const { store, logger } = this.deps;

		// Another caller may have refreshed it since our first read.
		const before = await this.read();
		if (before && this.isValid(before.value)) return before.value;

		const token = await this.requestToken();
		const credential = this.issue(token);

		let expectedVersion = before?.version ?? null;
		for (let attempt = 0; attempt < 2; attempt++) {
			const result = await store.compareAndPut({
				model: "credential",
				key: CREDENTIAL_KEY,
				expectedVersion,
				value: credential,
			});
			if (result.ok) {
				logger.info("Credential rotated", {
					credentialId: credential.id,
					expiresAt: credential.expiresAt,
				});
				return credential;
			}

			const winner = result.current;
			if (winner && this.isValid(winner.value)) {
				logger.debug("Another process rotated the credential first", {
					credentialId: winner.value.id,
				});
				return winner.value;
			}
			expectedVersion = winner?.version ?? null;
		}

		throw new AuthenticationError("Could not persist a rotated credential after repeated conflicts");
	}

	private async requestToken(): Promise<string> {
		try {
			return await this.deps.authenticator.authenticate();
		} catch (error) {
			this.deps.logger.error("Credential acquisition failed", {
				error: error instanceof Error ? error.message : String(error),
			});
			if (error instanceof AuthenticationError) throw error;
			throw new AuthenticationError(
				error instanceof LipaError ? `Credential acquisition failed: ${error.message}` : "Credential acquisition failed",
				{ cause: error },
			);
		}
	}

	private issue(token: string): Credential {
		const issuedAt = this.deps.now();
		return {
			id: generateId(),
			token: token.startsWith("Bearer ") ? token : `Bearer ${token}`,
			issuedAt: issuedAt.toISOString(),
			expiresAt: new Date(issuedAt.getTime() + this.deps.ttlMs).toISOString(),
			active: true,
		};
	}
}
