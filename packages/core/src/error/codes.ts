// =============================================================================
// TYPED ERROR CODES
// =============================================================================
// Registry of error codes with HTTP status codes and default messages.

export type RawErrorCode = {
	message: string;
	status: number;
	/**
	 * Whether this error is transient (retrying may succeed).
	 *
	 * - `true`: Condition may change: a gateway outage clears, a credential
	 *   is reissued, the float account is topped up.
	 * - `false` (default): Condition is permanent: retrying will always fail.
	 */
	transient?: boolean;
};

export const BASE_ERROR_CODES = {
	// Transient errors: condition may change.
	AUTHENTICATION_ERROR: { message: "Gateway authentication failed", status: 401, transient: true },
	GATEWAY_UNAVAILABLE: { message: "Gateway unavailable", status: 503, transient: true },
	INSUFFICIENT_BALANCE: { message: "Insufficient balance", status: 402, transient: true },
	PREVIEW_REJECTED: {
		message: "No payment method available for this transaction",
		status: 422,
		transient: true,
	},
	NOT_FOUND: { message: "Resource not found", status: 404, transient: true },

	// Deterministic errors: condition is permanent.
	VALIDATION_ERROR: { message: "Invalid input", status: 400, transient: false },
	DUPLICATE_REFERENCE: {
		message: "Order reference already used",
		status: 409,
		transient: false,
	},
	INCONSISTENT_STATE: {
		message: "Illegal status transition",
		status: 409,
		transient: false,
	},
	MALFORMED_RESPONSE: {
		message: "Malformed gateway response",
		status: 502,
		transient: false,
	},
	CONFIGURATION_ERROR: { message: "Invalid configuration", status: 500, transient: false },
	INTERNAL: { message: "Internal error", status: 500, transient: false },
} as const satisfies Record<string, RawErrorCode>;

export type BaseErrorCode = keyof typeof BASE_ERROR_CODES;
