// =============================================================================
// GATEWAY WIRE SHAPES
// =============================================================================
// Normalized forms of what the gateway returns. The client parses raw JSON
// into these; nothing downstream reads the raw payloads.

import type { Currency } from "./transaction.js";

export interface PaymentRequest {
	amount: number;
	currency: Currency;
	orderReference: string;
	phoneNumber: string;
}

export type PayoutRequest = PaymentRequest;

export interface PaymentMethod {
	name: string;
	/** "AVAILABLE" when the method can take this payment. */
	status: string;
	fee: number | null;
	message: string | null;
}

export interface PaymentPreview {
	activeMethods: PaymentMethod[];
	sender: { accountName: string | null; accountProvider: string | null } | null;
}

export interface PayoutPreview {
	amount: number;
	/** Float balance available for payouts in the requested currency. */
	balance: number;
	fee: number;
	channelProvider: string | null;
	receiverName: string | null;
	exchangeRate: number | null;
}

/**
 * Transaction as the gateway reports it, from create or status queries.
 * `status` is left as the raw string; callers validate it per kind.
 */
export interface GatewayReport {
	gatewayId: string | null;
	orderReference: string;
	status: string;
	amount: number | null;
	currency: string | null;
	fee: number | null;
	beneficiaryAmount: number | null;
	exchangeRate: number | null;
	channel: string | null;
	channelProvider: string | null;
	paymentReference: string | null;
	counterpartyName: string | null;
	message: string | null;
}

export interface AccountBalance {
	currency: string;
	balance: number;
}
