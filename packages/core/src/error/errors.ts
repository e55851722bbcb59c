import type { GatewayTransaction, TransactionStatus } from "../types/transaction.js";
import { BASE_ERROR_CODES, type BaseErrorCode } from "./codes.js";

export type LipaErrorCode = BaseErrorCode;

interface LipaErrorOptions {
	cause?: unknown;
	details?: Record<string, unknown>;
}

export class LipaError extends Error {
	readonly code: LipaErrorCode;
	readonly status: number;
	readonly details?: Record<string, unknown>;
	/**
	 * Whether this error is transient: the condition may change and retrying
	 * the whole operation later may succeed.
	 *
	 * - `true`: Gateway outage, expired credential, low float balance.
	 * - `false`: Validation error, duplicate reference, illegal transition.
	 */
	readonly transient: boolean;

	constructor(
		code: LipaErrorCode,
		message?: string,
		options?: LipaErrorOptions & { status?: number; transient?: boolean },
	) {
		const raw = BASE_ERROR_CODES[code];
		super(message ?? raw.message, { cause: options?.cause });
		this.code = code;
		this.status = options?.status ?? raw.status;
		this.transient = options?.transient ?? raw.transient;
		this.details = options?.details;
		this.name = "LipaError";
	}

	/**
	 * Create an error from a typed code. Returns the matching subclass so that
	 * `instanceof` checks keep working.
	 */
	static fromCode(code: LipaErrorCode, options?: LipaErrorOptions & { message?: string }): LipaError {
		const message = options?.message ?? BASE_ERROR_CODES[code].message;
		switch (code) {
			case "VALIDATION_ERROR":
				return new ValidationError(message, {}, options);
			case "DUPLICATE_REFERENCE":
				return new DuplicateReferenceError(message, options);
			case "AUTHENTICATION_ERROR":
				return new AuthenticationError(message, options);
			case "GATEWAY_UNAVAILABLE":
				return new GatewayUnavailableError(message, options);
			case "INSUFFICIENT_BALANCE":
				return new InsufficientBalanceError(message, options);
			case "PREVIEW_REJECTED":
				return new PreviewRejectedError(message, options);
			case "NOT_FOUND":
				return new NotFoundError(message, options);
			case "MALFORMED_RESPONSE":
				return new MalformedResponseError(message, options);
			case "CONFIGURATION_ERROR":
				return new ConfigurationError(message, options);
			default:
				return new LipaError(code, message, options);
		}
	}

	static internal(message = "Internal error", cause?: unknown): LipaError {
		return new LipaError("INTERNAL", message, { cause });
	}
}

// =============================================================================
// TAXONOMY
// =============================================================================

/** Bad input shape or format. Always raised before any network call. */
export class ValidationError extends LipaError {
	/** Field name -> messages. Filled from gateway-reported errors on 4xx. */
	readonly fieldErrors: Record<string, string[]>;

	constructor(
		message = "Invalid input",
		fieldErrors: Record<string, string[]> = {},
		options?: LipaErrorOptions,
	) {
		super("VALIDATION_ERROR", message, options);
		this.fieldErrors = fieldErrors;
		this.name = "ValidationError";
	}
}

/**
 * The order reference is already in use. Recoverable: fetch the existing
 * record and continue.
 */
export class DuplicateReferenceError extends LipaError {
	readonly localReference?: string;
	readonly existing?: GatewayTransaction;

	constructor(
		message = "Order reference already used",
		options?: LipaErrorOptions & { localReference?: string; existing?: GatewayTransaction },
	) {
		super("DUPLICATE_REFERENCE", message, options);
		this.localReference = options?.localReference;
		this.existing = options?.existing;
		this.name = "DuplicateReferenceError";
	}
}

export class AuthenticationError extends LipaError {
	constructor(message = "Gateway authentication failed", options?: LipaErrorOptions) {
		super("AUTHENTICATION_ERROR", message, options);
		this.name = "AuthenticationError";
	}
}

/** Transport failure, timeout or 5xx from the gateway. */
export class GatewayUnavailableError extends LipaError {
	readonly httpStatus?: number;
	readonly timedOut: boolean;

	constructor(
		message = "Gateway unavailable",
		options?: LipaErrorOptions & { httpStatus?: number; timedOut?: boolean },
	) {
		super("GATEWAY_UNAVAILABLE", message, options);
		this.httpStatus = options?.httpStatus;
		this.timedOut = options?.timedOut ?? false;
		this.name = "GatewayUnavailableError";
	}
}

export class InsufficientBalanceError extends LipaError {
	readonly available?: number;
	readonly required?: number;

	constructor(
		message = "Insufficient balance",
		options?: LipaErrorOptions & { available?: number; required?: number },
	) {
		super("INSUFFICIENT_BALANCE", message, options);
		this.available = options?.available;
		this.required = options?.required;
		this.name = "InsufficientBalanceError";
	}
}

/** Preview reported no usable method for the transaction. */
export class PreviewRejectedError extends LipaError {
	constructor(message = "No payment method available for this transaction", options?: LipaErrorOptions) {
		super("PREVIEW_REJECTED", message, options);
		this.name = "PreviewRejectedError";
	}
}

/** A terminal status was about to be replaced by a different one. */
export class InconsistentStateError extends LipaError {
	readonly localReference: string;
	readonly currentStatus: TransactionStatus;
	readonly reportedStatus: string;

	constructor(params: {
		localReference: string;
		currentStatus: TransactionStatus;
		reportedStatus: string;
		cause?: unknown;
	}) {
		super(
			"INCONSISTENT_STATE",
			`Transaction '${params.localReference}' is ${params.currentStatus}; refusing gateway-reported ${params.reportedStatus}`,
			{
				cause: params.cause,
				details: {
					localReference: params.localReference,
					currentStatus: params.currentStatus,
					reportedStatus: params.reportedStatus,
				},
			},
		);
		this.localReference = params.localReference;
		this.currentStatus = params.currentStatus;
		this.reportedStatus = params.reportedStatus;
		this.name = "InconsistentStateError";
	}
}

export class NotFoundError extends LipaError {
	constructor(message = "Resource not found", options?: LipaErrorOptions) {
		super("NOT_FOUND", message, options);
		this.name = "NotFoundError";
	}
}

export class MalformedResponseError extends LipaError {
	constructor(message = "Malformed gateway response", options?: LipaErrorOptions) {
		super("MALFORMED_RESPONSE", message, options);
		this.name = "MalformedResponseError";
	}
}

export class ConfigurationError extends LipaError {
	constructor(message = "Invalid configuration", options?: LipaErrorOptions) {
		super("CONFIGURATION_ERROR", message, options);
		this.name = "ConfigurationError";
	}
}
