export {
	computeRequestChecksum,
	isAllowedSource,
	signChecksum,
	verifyChecksum,
} from "./checksum.js";
export { generateId } from "./id.js";
export {
	formatAmount,
	formatCurrency,
	formatOrderReference,
	parseGatewayAmount,
} from "./money.js";
export { computeBackoffDelay, type RetryOptions, withRetry } from "./retry.js";
export { abortError, linkSignals, sleep, throwIfAborted, waitWithSignal } from "./signal.js";
export { SingleFlight } from "./single-flight.js";
export {
	COUNTRY_CODE,
	DEFAULT_MIN_AMOUNT,
	MAX_REFERENCE_LENGTH,
	normalizePhoneNumber,
	PHONE_NUMBER_LENGTH,
	validateAmount,
	validateCurrency,
	validateOrderReference,
	validatePhoneNumber,
} from "./validate.js";
