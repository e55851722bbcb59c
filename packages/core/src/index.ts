// Errors
export type { BaseErrorCode, LipaErrorCode, LipaResult, RawErrorCode } from "./error/index.js";
export {
	AuthenticationError,
	BASE_ERROR_CODES,
	ConfigurationError,
	DuplicateReferenceError,
	err,
	GatewayUnavailableError,
	InconsistentStateError,
	InsufficientBalanceError,
	isOk,
	LipaError,
	MalformedResponseError,
	NotFoundError,
	ok,
	PreviewRejectedError,
	settle,
	toLipaError,
	unwrap,
	ValidationError,
} from "./error/index.js";

// Store contract
export * from "./store/index.js";

// Type definitions
export * from "./types/index.js";

// Utilities
export * from "./utils/index.js";
