export type {
	GatewayCredentials,
	LipaAdvancedOptions,
	LipaLogger,
	LipaOptions,
	WebhookOptions,
	WorkerOptions,
} from "./config.js";
export type { ResolvedAdvancedOptions, ResolvedLipaOptions } from "./context.js";
export type { Credential } from "./credential.js";
export type {
	InconsistencyRecord,
	InconsistencySubscriber,
	StatusChangeEvent,
	StatusChangeSubscriber,
} from "./event.js";
export type {
	AccountBalance,
	GatewayReport,
	PaymentMethod,
	PaymentPreview,
	PaymentRequest,
	PayoutPreview,
	PayoutRequest,
} from "./gateway.js";
export type {
	Currency,
	GatewayTransaction,
	PaymentStatus,
	PayoutStatus,
	TransactionKind,
	TransactionStatus,
} from "./transaction.js";
export {
	CURRENCIES,
	isCurrency,
	isFailed,
	isKnownStatus,
	isPending,
	isReversed,
	isSuccessful,
	isTerminalStatus,
	PAYMENT_STATUSES,
	PAYOUT_STATUSES,
	pendingStatuses,
	TRANSACTION_KINDS,
} from "./transaction.js";
