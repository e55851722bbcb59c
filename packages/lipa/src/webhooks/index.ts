// =============================================================================
// WEBHOOK HANDLER: verify inbound notifications and reconcile
// =============================================================================
// A notification is only a hint. After the source and signature checks pass,
// the referenced transaction is reconciled against the gateway's
// authoritative status; the payload's own status is never applied directly.

import type { GatewayTransaction, LipaError } from "@lipa/core";
import { isAllowedSource, toLipaError, verifyChecksum } from "@lipa/core";
import type { LipaContext } from "../context/context.js";
import { reconcile } from "../managers/status-reconciler.js";
import { readTransaction } from "../managers/transaction-helpers.js";

export type HeaderBag = Headers | Record<string, string | string[] | undefined>;

export interface WebhookRequest {
	/** Raw request body, exactly as received. */
	body: string | Uint8Array;
	headers: HeaderBag;
	/** Remote address, checked against the configured allow-list. */
	sourceIp?: string | null;
	signal?: AbortSignal;
}

export type WebhookRejection = "forbidden_source" | "invalid_signature" | "malformed_payload";

export type WebhookOutcome =
	| { status: "rejected"; reason: WebhookRejection }
	| { status: "ignored"; reason: "unknown_reference"; localReference: string }
	| { status: "processed"; localReference: string; changed: boolean; record: GatewayTransaction }
	| { status: "failed"; localReference: string; error: LipaError };

export function readHeader(headers: HeaderBag, name: string): string | undefined {
	if (headers instanceof Headers) return headers.get(name) ?? undefined;
	const wanted = name.toLowerCase();
	for (const [key, value] of Object.entries(headers)) {
		if (key.toLowerCase() !== wanted) continue;
		return Array.isArray(value) ? value[0] : value;
	}
	return undefined;
}

function decodeBody(body: string | Uint8Array): string {
	return typeof body === "string" ? body : new TextDecoder().decode(body);
}

function referenceField(source: Record<string, unknown>): string | null {
	for (const key of ["orderReference", "localReference", "reference"]) {
		const value = source[key];
		if (typeof value === "string" && value.trim() !== "") return value.trim();
	}
	return null;
}

/** Order reference from a notification, top level or under `data`. */
export function extractOrderReference(text: string): string | null {
	let payload: unknown;
	try {
		payload = JSON.parse(text);
	} catch {
		return null;
	}
	if (typeof payload !== "object" || payload === null || Array.isArray(payload)) return null;

	const fields = Object.fromEntries(Object.entries(payload));
	const direct = referenceField(fields);
	if (direct) return direct;

	const data = fields.data;
	if (typeof data === "object" && data !== null && !Array.isArray(data)) {
		return referenceField(Object.fromEntries(Object.entries(data)));
	}
	return null;
}

/** Verify a notification and reconcile the transaction it names. Never throws. */
export async function handleNotification(ctx: LipaContext, request: WebhookRequest): Promise<WebhookOutcome> {
	const { webhook } = ctx.options;

	if (webhook.allowedIps.length > 0 && !isAllowedSource(request.sourceIp, webhook.allowedIps)) {
		ctx.logger.warn("Webhook rejected: source not allowed", { sourceIp: request.sourceIp ?? null });
		return { status: "rejected", reason: "forbidden_source" };
	}

	const signature = readHeader(request.headers, webhook.signatureHeader);
	if (!webhook.secret || !verifyChecksum(request.body, signature, webhook.secret)) {
		ctx.logger.warn("Webhook rejected: signature verification failed", {
			hasSecret: webhook.secret !== null,
			hasSignature: signature !== undefined,
		});
		return { status: "rejected", reason: "invalid_signature" };
	}

	const localReference = extractOrderReference(decodeBody(request.body));
	if (!localReference) {
		ctx.logger.warn("Webhook rejected: no order reference in payload");
		return { status: "rejected", reason: "malformed_payload" };
	}

	try {
		const stored = await readTransaction(ctx, localReference);
		if (!stored) {
			ctx.logger.warn("Webhook ignored: unknown order reference", { localReference });
			return { status: "ignored", reason: "unknown_reference", localReference };
		}

		const result = await reconcile(ctx, localReference, { signal: request.signal, source: "webhook" });
		return { status: "processed", localReference, changed: result.changed, record: result.record };
	} catch (error) {
		const failure = toLipaError(error);
		ctx.logger.error("Webhook reconciliation failed", {
			localReference,
			code: failure.code,
			error: failure.message,
		});
		return { status: "failed", localReference, error: failure };
	}
}
