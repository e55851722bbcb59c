export { BASE_ERROR_CODES, type BaseErrorCode, type RawErrorCode } from "./codes.js";
export {
	AuthenticationError,
	ConfigurationError,
	DuplicateReferenceError,
	GatewayUnavailableError,
	InconsistentStateError,
	InsufficientBalanceError,
	LipaError,
	type LipaErrorCode,
	MalformedResponseError,
	NotFoundError,
	PreviewRejectedError,
	ValidationError,
} from "./errors.js";
export { err, isOk, type LipaResult, ok, settle, toLipaError, unwrap } from "./result.js";
