export const TRANSACTION_KINDS = {
	PAYMENT: "PAYMENT",
	PAYOUT: "PAYOUT",
} as const;

export type TransactionKind = (typeof TRANSACTION_KINDS)[keyof typeof TRANSACTION_KINDS];

export const CURRENCIES = ["TZS", "USD"] as const;

export type Currency = (typeof CURRENCIES)[number];

export const PAYMENT_STATUSES = ["PROCESSING", "PENDING", "SUCCESS", "SETTLED", "FAILED"] as const;

export const PAYOUT_STATUSES = [
	"AUTHORIZED",
	"PROCESSING",
	"PENDING",
	"SUCCESS",
	"FAILED",
	"REVERSED",
	"REFUNDED",
] as const;

export type PaymentStatus = (typeof PAYMENT_STATUSES)[number];
export type PayoutStatus = (typeof PAYOUT_STATUSES)[number];
export type TransactionStatus = PaymentStatus | PayoutStatus;

const KNOWN_STATUSES: Record<TransactionKind, ReadonlySet<string>> = {
	PAYMENT: new Set(PAYMENT_STATUSES),
	PAYOUT: new Set(PAYOUT_STATUSES),
};

const TERMINAL_STATUSES: Record<TransactionKind, ReadonlySet<TransactionStatus>> = {
	PAYMENT: new Set<TransactionStatus>(["SUCCESS", "SETTLED", "FAILED"]),
	PAYOUT: new Set<TransactionStatus>(["SUCCESS", "FAILED", "REVERSED", "REFUNDED"]),
};

/** Payment or payout as held locally. Timestamps are ISO-8601 strings. */
export interface GatewayTransaction {
	/** Caller-supplied order reference, unique across both kinds. */
	localReference: string;
	/** Transaction id assigned by the gateway. */
	gatewayId: string | null;
	kind: TransactionKind;
	amount: number;
	currency: Currency;
	/** International digits-only form, e.g. 255712345678 */
	counterpartyPhone: string;
	status: TransactionStatus;
	fee: number | null;
	/** Payout only: amount the beneficiary receives. */
	beneficiaryAmount: number | null;
	/** Payout only: rate applied when the gateway converted currencies. */
	exchangeRate: number | null;
	channel: string | null;
	channelProvider: string | null;
	/** Payment only: provider-side payment reference. */
	paymentReference: string | null;
	/** Customer name for payments, beneficiary account name for payouts. */
	counterpartyName: string | null;
	message: string | null;
	metadata: Record<string, unknown>;
	createdAt: string;
	updatedAt: string;
	completedAt: string | null;
}

export function isKnownStatus(kind: TransactionKind, status: string): status is TransactionStatus {
	return KNOWN_STATUSES[kind].has(status);
}

export function isTerminalStatus(kind: TransactionKind, status: TransactionStatus): boolean {
	return TERMINAL_STATUSES[kind].has(status);
}

export function isCurrency(value: string): value is Currency {
	return CURRENCIES.some((currency) => currency === value);
}

export function isSuccessful(record: Pick<GatewayTransaction, "kind" | "status">): boolean {
	if (record.kind === "PAYMENT") {
		return record.status === "SUCCESS" || record.status === "SETTLED";
	}
	return record.status === "SUCCESS";
}

export function isPending(record: Pick<GatewayTransaction, "kind" | "status">): boolean {
	return !isTerminalStatus(record.kind, record.status);
}

export function isFailed(record: Pick<GatewayTransaction, "status">): boolean {
	return record.status === "FAILED";
}

export function isReversed(record: Pick<GatewayTransaction, "kind" | "status">): boolean {
	return record.kind === "PAYOUT" && (record.status === "REVERSED" || record.status === "REFUNDED");
}

/** Statuses from which reconciliation is still expected to move a record. */
export function pendingStatuses(kind: TransactionKind): TransactionStatus[] {
	const all: readonly TransactionStatus[] = kind === "PAYMENT" ? PAYMENT_STATUSES : PAYOUT_STATUSES;
	return all.filter((status) => !isTerminalStatus(kind, status));
}
