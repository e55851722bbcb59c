import type { LipaOptions, LipaStore } from "@lipa/core";
import { memoryAdapter } from "@lipa/memory-adapter";
import { createLipa, type Lipa } from "lipa";
import { createFakeGateway, type FakeGateway, type FakeGatewayOptions } from "./fake-gateway.js";
import { createRecordingLogger, type RecordingLogger } from "./logger.js";

export const TEST_CREDENTIALS = { clientId: "test-client", apiKey: "test-api-key" } as const;
export const TEST_WEBHOOK_SECRET = "test-secret";

export interface TestInstanceOptions {
	/** Store (default: a fresh memoryAdapter) */
	store?: LipaStore;
	/** Fake gateway options, or an existing fake to share between instances */
	gateway?: FakeGatewayOptions | FakeGateway;
	/** Overrides merged over the test defaults */
	options?: Partial<Omit<LipaOptions, "store" | "fetch">>;
}

export interface TestInstance {
	/** The lipa instance */
	lipa: Lipa;
	gateway: FakeGateway;
	store: LipaStore;
	logger: RecordingLogger;
	/** Cleanup function -- call in afterEach/afterAll */
	cleanup: () => Promise<void>;
}

function isFakeGateway(value: FakeGatewayOptions | FakeGateway | undefined): value is FakeGateway {
	return value !== undefined && "fetch" in value;
}

/**
 * A Lipa instance wired to an in-process fake gateway and an in-memory store.
 * Read retries use 1ms delays so retry paths stay fast.
 */
export function getTestInstance(options: TestInstanceOptions = {}): TestInstance {
	const gateway = isFakeGateway(options.gateway) ? options.gateway : createFakeGateway(options.gateway);
	const store = options.store ?? memoryAdapter();
	const logger = createRecordingLogger();
	const overrides = options.options ?? {};

	const lipa = createLipa({
		credentials: TEST_CREDENTIALS,
		webhook: { secret: TEST_WEBHOOK_SECRET },
		logger,
		...overrides,
		advanced: {
			retryBaseDelayMs: 1,
			retryMaxDelayMs: 2,
			...overrides.advanced,
		},
		store,
		fetch: gateway.fetch,
	});

	return {
		lipa,
		gateway,
		store,
		logger,
		cleanup: async () => {
			await lipa.workers.stop();
		},
	};
}
