// =============================================================================
// FAKE GATEWAY -- in-process stand-in for the mobile-money gateway HTTP API
// =============================================================================
// Exposes a `fetch` implementation that routes the gateway endpoints to an
// in-memory model. Tests inspect recorded requests, move transactions between
// statuses and script one-off responses (errors, timeouts) per route.

import type { TransactionKind } from "@lipa/core";
import { computeRequestChecksum } from "@lipa/core";

export type FakeRoute =
	| "token"
	| "paymentPreview"
	| "paymentCreate"
	| "paymentStatus"
	| "payoutPreview"
	| "payoutCreate"
	| "payoutStatus"
	| "balance";

export type ScriptedResponse =
	| { status: number; body?: unknown }
	/** Never answers. With `commit`, the request takes effect first. */
	| { timeout: true; commit?: boolean }
	| { networkError: string };

export interface RecordedRequest {
	route: FakeRoute | "unknown";
	method: string;
	path: string;
	headers: Record<string, string>;
	body: unknown;
}

export interface FakeTransaction {
	id: string;
	kind: TransactionKind;
	orderReference: string;
	status: string;
	amount: number;
	currency: string;
	phoneNumber: string;
	fee: number;
	paymentReference: string | null;
	counterpartyName: string | null;
	message: string | null;
}

export interface FakeGatewayOptions {
	baseURL?: string;
	clientId?: string;
	apiKey?: string;
	/** When set, preview and create bodies must carry a valid checksum. */
	checksumSecret?: string;
	balance?: number;
	payoutFee?: number;
	/** Delay in ms before every response. */
	latencyMs?: number;
}

export interface FakeGateway {
	fetch: typeof fetch;
	requests: RecordedRequest[];
	transactions: Map<string, FakeTransaction>;
	/** Payment methods returned by payment preview. */
	paymentMethods: Array<{ name: string; status: string; fee?: number; message?: string }>;
	balance: number;
	/** Number of requests that reached `route`. */
	count(route: FakeRoute): number;
	/** Queue responses consumed, in order, by the next requests to `route`. */
	script(route: FakeRoute, ...responses: ScriptedResponse[]): void;
	setStatus(orderReference: string, status: string, details?: Partial<FakeTransaction>): void;
	seed(transaction: Partial<FakeTransaction> & Pick<FakeTransaction, "kind" | "orderReference">): FakeTransaction;
	/** Make every token issued so far answer 401. */
	revokeTokens(): void;
	tokensIssued(): number;
}

const PATHS: Array<{ method: string; pattern: RegExp; route: FakeRoute }> = [
	{ method: "POST", pattern: /^\/third-parties\/generate-token$/, route: "token" },
	{ method: "POST", pattern: /^\/third-parties\/payments\/preview-ussd-push-request$/, route: "paymentPreview" },
	{ method: "POST", pattern: /^\/third-parties\/payments\/initiate-ussd-push-request$/, route: "paymentCreate" },
	{ method: "GET", pattern: /^\/third-parties\/payments\/([^/]+)$/, route: "paymentStatus" },
	{ method: "POST", pattern: /^\/third-parties\/payouts\/preview-mobile-money-payout$/, route: "payoutPreview" },
	{ method: "POST", pattern: /^\/third-parties\/payouts\/create-mobile-money-payout$/, route: "payoutCreate" },
	{ method: "GET", pattern: /^\/third-parties\/payouts\/([^/]+)$/, route: "payoutStatus" },
	{ method: "GET", pattern: /^\/third-parties\/account\/balance$/, route: "balance" },
];

type Fields = Record<string, unknown>;

function isFields(value: unknown): value is Fields {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function json(status: number, body: unknown): Response {
	return new Response(JSON.stringify(body), {
		status,
		headers: { "Content-Type": "application/json" },
	});
}

function abortReason(signal: AbortSignal | null | undefined): unknown {
	return signal?.reason ?? new Error("The operation was aborted");
}

function waitForAbort(signal: AbortSignal | null | undefined): Promise<never> {
	return new Promise<never>((_resolve, reject) => {
		if (!signal) return;
		if (signal.aborted) {
			reject(abortReason(signal));
			return;
		}
		signal.addEventListener("abort", () => reject(abortReason(signal)), { once: true });
	});
}

function delay(ms: number, signal: AbortSignal | null | undefined): Promise<void> {
	if (ms <= 0) return Promise.resolve();
	return new Promise<void>((resolve, reject) => {
		const timer = setTimeout(resolve, ms);
		signal?.addEventListener(
			"abort",
			() => {
				clearTimeout(timer);
				reject(abortReason(signal));
			},
			{ once: true },
		);
	});
}

export function createFakeGateway(options: FakeGatewayOptions = {}): FakeGateway {
	const origin = new URL(options.baseURL ?? "https://api.clickpesa.com").origin;
	const clientId = options.clientId ?? "test-client";
	const apiKey = options.apiKey ?? "test-api-key";
	const payoutFee = options.payoutFee ?? 0;
	const latencyMs = options.latencyMs ?? 0;

	const requests: RecordedRequest[] = [];
	const transactions = new Map<string, FakeTransaction>();
	const scripts = new Map<FakeRoute, ScriptedResponse[]>();
	const validTokens = new Set<string>();
	let issued = 0;
	let nextId = 1;

	const gateway: FakeGateway = {
		fetch: fakeFetch,
		requests,
		transactions,
		paymentMethods: [{ name: "M-PESA", status: "AVAILABLE", fee: 0, message: "Ready" }],
		balance: options.balance ?? 1_000_000,
		count: (route) => requests.filter((request) => request.route === route).length,
		script: (route, ...responses) => {
			scripts.set(route, [...(scripts.get(route) ?? []), ...responses]);
		},
		setStatus: (orderReference, status, details = {}) => {
			const existing = transactions.get(orderReference);
			if (!existing) throw new Error(`Fake gateway has no transaction '${orderReference}'`);
			transactions.set(orderReference, { ...existing, ...details, status });
		},
		seed: (transaction) => {
			const seeded: FakeTransaction = {
				id: `GW-${nextId++}`,
				status: transaction.kind === "PAYMENT" ? "PROCESSING" : "AUTHORIZED",
				amount: 1000,
				currency: "TZS",
				phoneNumber: "255712345678",
				fee: 0,
				paymentReference: null,
				counterpartyName: null,
				message: null,
				...transaction,
			};
			transactions.set(seeded.orderReference, seeded);
			return seeded;
		},
		revokeTokens: () => validTokens.clear(),
		tokensIssued: () => issued,
	};

	function nextScript(route: FakeRoute): ScriptedResponse | undefined {
		const queue = scripts.get(route);
		return queue?.shift();
	}

	async function fakeFetch(...[input, init]: Parameters<typeof fetch>): Promise<Response> {
		const url = new URL(typeof input === "string" ? input : input instanceof URL ? input.href : input.url);
		const method = (init?.method ?? "GET").toUpperCase();
		const headers = new Headers(init?.headers);
		const signal = init?.signal;
		let body: unknown = null;
		if (typeof init?.body === "string") {
			const parsed: unknown = JSON.parse(init.body);
			body = parsed;
		}

		const path = url.pathname;
		const match = url.origin === origin ? PATHS.find((p) => p.method === method && p.pattern.test(path)) : undefined;
		const recordedHeaders: Record<string, string> = {};
		headers.forEach((value, key) => {
			recordedHeaders[key] = value;
		});
		requests.push({ route: match?.route ?? "unknown", method, path, headers: recordedHeaders, body });

		await delay(latencyMs, signal);

		if (!match) return json(404, { message: `No route for ${method} ${path}` });
		const route = match.route;
		const param = decodeURIComponent(path.match(match.pattern)?.[1] ?? "");

		const scripted = nextScript(route);
		if (scripted) {
			if ("networkError" in scripted) throw new TypeError(scripted.networkError);
			if ("timeout" in scripted) {
				if (scripted.commit) handle(route, param, headers, body);
				return waitForAbort(signal);
			}
			return json(scripted.status, scripted.body ?? {});
		}

		return handle(route, param, headers, body);
	}

	function handle(route: FakeRoute, param: string, headers: Headers, body: unknown): Response {
		if (route === "token") {
			if (headers.get("client-id") !== clientId || headers.get("api-key") !== apiKey) {
				return json(401, { message: "Invalid client credentials" });
			}
			issued++;
			const token = `Bearer fake-token-${issued}`;
			validTokens.add(token);
			return json(200, { success: true, token });
		}

		const authorization = headers.get("authorization");
		if (!authorization || !validTokens.has(authorization)) {
			return json(401, { message: "Unauthorized" });
		}

		if (route === "balance") {
			return json(200, [{ currency: "TZS", balance: gateway.balance }]);
		}
		if (route === "paymentStatus") {
			const found = transactions.get(param);
			return json(200, found && found.kind === "PAYMENT" ? [paymentView(found)] : []);
		}
		if (route === "payoutStatus") {
			const found = transactions.get(param);
			if (!found || found.kind !== "PAYOUT") return json(404, { message: "Payout not found" });
			return json(200, payoutView(found));
		}

		if (!isFields(body)) return json(400, { message: "Request body must be a JSON object" });
		const checksumError = verifyBodyChecksum(body);
		if (checksumError) return json(400, { message: checksumError });

		const orderReference = typeof body.orderReference === "string" ? body.orderReference : "";
		const amount = Number(body.amount);
		const currency = typeof body.currency === "string" ? body.currency : "TZS";
		const phoneNumber = typeof body.phoneNumber === "string" ? body.phoneNumber : "";

		switch (route) {
			case "paymentPreview":
				return json(200, {
					activeMethods: gateway.paymentMethods,
					sender: null,
				});
			case "payoutPreview":
				return json(200, {
					amount: amount + payoutFee,
					balance: gateway.balance,
					fee: payoutFee,
					channelProvider: "TIGO PESA",
					receiver: { accountName: "Test Beneficiary" },
				});
			case "paymentCreate":
			case "payoutCreate": {
				if (transactions.has(orderReference)) {
					return json(409, { message: "Order reference already exists" });
				}
				const kind: TransactionKind = route === "paymentCreate" ? "PAYMENT" : "PAYOUT";
				const created = gateway.seed({
					kind,
					orderReference,
					amount,
					currency,
					phoneNumber,
					fee: kind === "PAYOUT" ? payoutFee : 0,
					counterpartyName: kind === "PAYOUT" ? "Test Beneficiary" : null,
				});
				if (kind === "PAYOUT") gateway.balance -= amount + payoutFee;
				return json(200, kind === "PAYMENT" ? paymentCreateView(created) : payoutView(created));
			}
		}
	}

	function verifyBodyChecksum(body: Fields): string | null {
		if (!options.checksumSecret) return null;
		const { checksum, ...rest } = body;
		if (typeof checksum !== "string") return "Missing checksum";
		return checksum === computeRequestChecksum(rest, options.checksumSecret) ? null : "Invalid checksum";
	}

	return gateway;
}

function paymentCreateView(tx: FakeTransaction): Fields {
	return {
		id: tx.id,
		status: tx.status,
		channel: "TANZANIA-MPESA",
		orderReference: tx.orderReference,
		collectedAmount: String(tx.amount),
		collectedCurrency: tx.currency,
	};
}

function paymentView(tx: FakeTransaction): Fields {
	return {
		...paymentCreateView(tx),
		paymentReference: tx.paymentReference,
		message: tx.message,
		customer: tx.counterpartyName ? { customerName: tx.counterpartyName } : null,
	};
}

function payoutView(tx: FakeTransaction): Fields {
	return {
		id: tx.id,
		status: tx.status,
		orderReference: tx.orderReference,
		amount: tx.amount,
		currency: tx.currency,
		fee: tx.fee,
		channel: "MOBILE MONEY",
		channelProvider: "TIGO PESA",
		notes: tx.message,
		beneficiary: { amount: tx.amount, accountName: tx.counterpartyName },
	};
}
