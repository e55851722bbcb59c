import type { GatewayCredentials, LipaLogger } from "@lipa/core";
import { AuthenticationError, GatewayUnavailableError } from "@lipa/core";
import type { HttpClient } from "./http.js";
import { extractErrorMessage, parseToken } from "./parse.js";

export const TOKEN_PATH = "/third-parties/generate-token";

/** Exchanges the client id and API key for a bearer token. */
export interface Authenticator {
	authenticate(options?: { signal?: AbortSignal }): Promise<string>;
}

export function createAuthenticator(deps: {
	http: HttpClient;
	credentials: GatewayCredentials;
	logger: LipaLogger;
}): Authenticator {
	return {
		async authenticate(options = {}) {
			deps.logger.info("Requesting gateway token");
			const response = await deps.http.request({
				method: "POST",
				path: TOKEN_PATH,
				headers: {
					"client-id": deps.credentials.clientId,
					"api-key": deps.credentials.apiKey,
				},
				signal: options.signal,
			});

			if (response.status >= 500) {
				throw new GatewayUnavailableError(`Token endpoint returned HTTP ${response.status}`, {
					httpStatus: response.status,
				});
			}
			if (response.status < 200 || response.status >= 300) {
				throw new AuthenticationError(
					extractErrorMessage(response.body) ?? `Token request rejected with HTTP ${response.status}`,
					{ details: { httpStatus: response.status } },
				);
			}

			const token = parseToken(response.body);
			if (!token) {
				throw new AuthenticationError("Token generation failed: no token in response");
			}
			return token.startsWith("Bearer ") ? token : `Bearer ${token}`;
		},
	};
}
