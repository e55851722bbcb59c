// =============================================================================
// HTTP TRANSPORT: fetch wrapper with timeout, caller cancellation and JSON
// =============================================================================
// Knows nothing about credentials or gateway semantics. Transport failures
// and timeouts surface as GatewayUnavailableError; everything with an HTTP
// status is handed back for the gateway client to map.

import type { LipaLogger } from "@lipa/core";
import { abortError, GatewayUnavailableError, linkSignals, MalformedResponseError } from "@lipa/core";

export interface HttpRequest {
	method: "GET" | "POST";
	path: string;
	body?: Record<string, unknown>;
	headers?: Record<string, string>;
	signal?: AbortSignal;
}

export interface HttpResponse {
	status: number;
	/** Parsed JSON, the raw text when the body is not JSON, or null when empty. */
	body: unknown;
}

export interface HttpClient {
	request(request: HttpRequest): Promise<HttpResponse>;
}

export interface HttpClientOptions {
	baseURL: string;
	timeoutMs: number;
	fetch?: typeof fetch;
	logger: LipaLogger;
}

function describe(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

export function createHttpClient(options: HttpClientOptions): HttpClient {
	const fetchFn = options.fetch ?? globalThis.fetch;
	const baseURL = options.baseURL.replace(/\/+$/, "");

	async function request(req: HttpRequest): Promise<HttpResponse> {
		const url = `${baseURL}${req.path}`;
		const timeout = AbortSignal.timeout(options.timeoutMs);
		const linked = linkSignals(req.signal, timeout);

		const init: RequestInit = {
			method: req.method,
			headers: {
				Accept: "application/json",
				...(req.body !== undefined ? { "Content-Type": "application/json" } : {}),
				...req.headers,
			},
			signal: linked.signal,
		};
		if (req.body !== undefined && req.method !== "GET") {
			init.body = JSON.stringify(req.body);
		}

		let status: number;
		let text: string;
		try {
			const response = await fetchFn(url, init);
			status = response.status;
			text = await response.text();
		} catch (error) {
			if (req.signal?.aborted) throw abortError(req.signal);
			if (timeout.aborted) {
				options.logger.warn("Gateway request timed out", {
					method: req.method,
					path: req.path,
					timeoutMs: options.timeoutMs,
				});
				throw new GatewayUnavailableError(
					`Gateway request timed out after ${options.timeoutMs}ms`,
					{ cause: error, timedOut: true },
				);
			}
			throw new GatewayUnavailableError(`Gateway request failed: ${describe(error)}`, {
				cause: error,
			});
		} finally {
			linked.dispose();
		}

		options.logger.debug("Gateway response", { method: req.method, path: req.path, status });

		if (text.trim() === "") {
			return { status, body: null };
		}
		try {
			const body: unknown = JSON.parse(text);
			return { status, body };
		} catch (error) {
			if (status >= 200 && status < 300) {
				throw new MalformedResponseError(`Gateway returned a non-JSON body for ${req.path}`, {
					cause: error,
				});
			}
			return { status, body: text };
		}
	}

	return { request };
}
