export { assertErr, assertOk, assertStoredTransaction } from "./assertions.js";
export {
	createFakeGateway,
	type FakeGateway,
	type FakeGatewayOptions,
	type FakeRoute,
	type FakeTransaction,
	type RecordedRequest,
	type ScriptedResponse,
} from "./fake-gateway.js";
export {
	getTestInstance,
	TEST_CREDENTIALS,
	TEST_WEBHOOK_SECRET,
	type TestInstance,
	type TestInstanceOptions,
} from "./get-test-instance.js";
export {
	createRecordingLogger,
	createSilentLogger,
	type LogEntry,
	type LogLevel,
	type RecordingLogger,
} from "./logger.js";
