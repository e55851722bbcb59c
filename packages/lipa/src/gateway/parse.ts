// =============================================================================
// RESPONSE PARSING
// =============================================================================
// Narrows untyped gateway JSON into the normalized wire shapes. Required
// fields that are missing or of the wrong type raise MalformedResponseError.

import type {
	AccountBalance,
	GatewayReport,
	PaymentMethod,
	PaymentPreview,
	PayoutPreview,
	TransactionKind,
} from "@lipa/core";
import { MalformedResponseError, NotFoundError, parseGatewayAmount } from "@lipa/core";

type Fields = Record<string, unknown>;

export function isFields(value: unknown): value is Fields {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function malformed(what: string, detail: string): MalformedResponseError {
	return new MalformedResponseError(`Malformed ${what} response: ${detail}`);
}

function optionalString(value: unknown): string | null {
	if (typeof value === "string" && value !== "") return value;
	if (typeof value === "number") return String(value);
	return null;
}

function optionalAmount(value: unknown): number | null {
	if (value === null || value === undefined || value === "") return null;
	return parseGatewayAmount(value);
}

function nested(row: Fields, field: string): Fields {
	const value = row[field];
	return isFields(value) ? value : {};
}

function expectObject(body: unknown, what: string): Fields {
	if (!isFields(body)) throw malformed(what, "expected a JSON object");
	return body;
}

/** Status queries answer with one object or a list; the first entry wins. */
function firstEntry(body: unknown, what: string, reference: string): Fields {
	if (Array.isArray(body)) {
		const [first] = body;
		if (first === undefined) {
			throw new NotFoundError(`No gateway records found for order reference '${reference}'`);
		}
		return expectObject(first, what);
	}
	return expectObject(body, what);
}

export function parseToken(body: unknown): string | null {
	if (!isFields(body)) return null;
	const token = body.token;
	return typeof token === "string" && token.trim() !== "" ? token.trim() : null;
}

export function parseReport(
	body: unknown,
	kind: TransactionKind,
	reference: string,
): GatewayReport {
	const what = kind === "PAYMENT" ? "payment" : "payout";
	const row = firstEntry(body, what, reference);

	const status = row.status;
	if (typeof status !== "string" || status === "") {
		throw malformed(what, "missing status");
	}

	const beneficiary = nested(row, "beneficiary");
	const customer = nested(row, "customer");
	const exchange = nested(row, "exchange");

	return {
		gatewayId: optionalString(row.id),
		orderReference: optionalString(row.orderReference) ?? reference,
		status: status.toUpperCase(),
		amount: optionalAmount(kind === "PAYMENT" ? (row.collectedAmount ?? row.amount) : row.amount),
		currency: optionalString(kind === "PAYMENT" ? (row.collectedCurrency ?? row.currency) : row.currency),
		fee: optionalAmount(row.fee),
		beneficiaryAmount: kind === "PAYOUT" ? optionalAmount(beneficiary.amount) : null,
		exchangeRate: row.exchanged === true ? optionalAmount(exchange.rate) : null,
		channel: optionalString(row.channel),
		channelProvider: optionalString(row.channelProvider),
		paymentReference: optionalString(row.paymentReference),
		counterpartyName:
			kind === "PAYMENT"
				? optionalString(customer.customerName)
				: optionalString(beneficiary.accountName),
		message: optionalString(row.message) ?? optionalString(row.notes),
	};
}

function parseMethod(value: unknown): PaymentMethod | null {
	if (!isFields(value)) return null;
	const name = optionalString(value.name);
	const status = optionalString(value.status);
	if (!name || !status) return null;
	return {
		name,
		status: status.toUpperCase(),
		fee: optionalAmount(value.fee),
		message: optionalString(value.message),
	};
}

export function parsePaymentPreview(body: unknown): PaymentPreview {
	const row = expectObject(body, "payment preview");
	const methods = row.activeMethods ?? [];
	if (!Array.isArray(methods)) {
		throw malformed("payment preview", "activeMethods is not a list");
	}
	const activeMethods: PaymentMethod[] = [];
	for (const entry of methods) {
		const method = parseMethod(entry);
		if (method) activeMethods.push(method);
	}
	const sender = isFields(row.sender)
		? {
				accountName: optionalString(row.sender.accountName),
				accountProvider: optionalString(row.sender.accountProvider),
			}
		: null;
	return { activeMethods, sender };
}

export function parsePayoutPreview(body: unknown): PayoutPreview {
	const row = expectObject(body, "payout preview");
	const amount = optionalAmount(row.amount);
	const balance = optionalAmount(row.balance);
	if (amount === null || balance === null) {
		throw malformed("payout preview", "amount and balance are required");
	}
	const receiver = nested(row, "receiver");
	const exchange = nested(row, "exchange");
	return {
		amount,
		balance,
		fee: optionalAmount(row.fee) ?? 0,
		channelProvider: optionalString(row.channelProvider),
		receiverName: optionalString(receiver.accountName),
		exchangeRate: row.exchanged === true ? optionalAmount(exchange.rate) : null,
	};
}

export function parseBalance(body: unknown): AccountBalance[] {
	const entries = Array.isArray(body) ? body : [body];
	return entries.map((entry) => {
		const row = expectObject(entry, "balance");
		const currency = optionalString(row.currency);
		if (!currency) throw malformed("balance", "missing currency");
		return { currency, balance: parseGatewayAmount(row.balance) };
	});
}

/** Human-readable message the gateway attached to an error response. */
export function extractErrorMessage(body: unknown): string | null {
	if (typeof body === "string") return body.trim() || null;
	if (!isFields(body)) return null;
	for (const key of ["message", "error", "detail"]) {
		const value = body[key];
		if (typeof value === "string" && value.trim() !== "") return value.trim();
	}
	return null;
}

/**
 * Field errors in either of the two shapes the gateway uses:
 * `{ errors: { field: ["msg"] } }` or `{ errors: [{ field, message }] }`.
 */
export function extractFieldErrors(body: unknown): Record<string, string[]> {
	const result: Record<string, string[]> = {};
	if (!isFields(body)) return result;
	const errors = body.errors;

	if (Array.isArray(errors)) {
		for (const entry of errors) {
			if (!isFields(entry)) continue;
			const field = optionalString(entry.field) ?? "_";
			const message = optionalString(entry.message);
			if (message) (result[field] ??= []).push(message);
		}
	} else if (isFields(errors)) {
		for (const [field, value] of Object.entries(errors)) {
			const messages = Array.isArray(value) ? value : [value];
			for (const message of messages) {
				if (typeof message === "string") (result[field] ??= []).push(message);
			}
		}
	}
	return result;
}
