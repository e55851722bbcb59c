import { afterEach, describe, expect, it, vi } from "vitest";
import { createConsoleLogger, createJsonLogger, formatFields, redactData } from "../logger/index.js";

describe("redactData", () => {
	const keys = new Set(["phone", "token"]);

	it("replaces listed keys and leaves the input untouched", () => {
		const data = { phone: "255712345678", amount: 1000 };
		expect(redactData(data, keys)).toEqual({ phone: "[REDACTED]", amount: 1000 });
		expect(data.phone).toBe("255712345678");
	});

	it("descends into nested plain objects", () => {
		const data = { request: { token: "Bearer test-token", path: "/x" } };
		expect(redactData(data, keys)).toEqual({ request: { token: "[REDACTED]", path: "/x" } });
	});

	it("returns the same object when nothing matches", () => {
		const data = { amount: 1 };
		expect(redactData(data, keys)).toBe(data);
	});
});

describe("createJsonLogger", () => {
	it("writes one JSON line with redacted data", () => {
		const lines: string[] = [];
		const logger = createJsonLogger({ service: "checkout", write: (line) => lines.push(line) });

		logger.info("Payment created", { localReference: "ORDER-1", counterpartyPhone: "255712345678" });

		expect(lines).toHaveLength(1);
		const entry = JSON.parse(lines[0] ?? "{}");
		expect(entry).toMatchObject({
			level: "info",
			service: "checkout",
			message: "Payment created",
			localReference: "ORDER-1",
			counterpartyPhone: "[REDACTED]",
		});
	});

	it("drops entries below the configured level", () => {
		const write = vi.fn();
		const logger = createJsonLogger({ level: "warn", write });
		logger.info("ignored");
		logger.warn("kept");
		expect(write).toHaveBeenCalledTimes(1);
		expect(write).toHaveBeenCalledWith(expect.stringContaining('"message":"kept"'), "warn");
	});
});

describe("formatFields", () => {
	it("quotes only values that need it", () => {
		expect(formatFields({ amount: 1000, status: "SUCCESS", note: "two words", fee: null })).toBe(
			'amount=1000 status=SUCCESS note="two words" fee=null',
		);
	});
});

describe("createConsoleLogger", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("routes errors to console.error with the prefix", () => {
		const spy = vi.spyOn(console, "error").mockImplementation(() => {});
		const logger = createConsoleLogger({ timestamps: false, colors: false, prefix: "Test" });
		logger.error("Gateway down");
		expect(spy).toHaveBeenCalledTimes(1);
		expect(spy.mock.calls[0]?.[0]).toBe("ERROR [Test] Gateway down");
	});

	it("prints data as key=value pairs with phone numbers and tokens redacted", () => {
		const lines: string[] = [];
		const logger = createConsoleLogger({ timestamps: false, colors: false, write: (line) => lines.push(line) });

		logger.warn("Payment declined", {
			localReference: "ORD-1",
			phoneNumber: "255712345678",
			message: "Customer declined",
			headers: { authorization: "Bearer test-token", attempt: 2 },
		});

		expect(lines).toEqual([
			'WARN  [lipa] Payment declined localReference=ORD-1 phoneNumber=[REDACTED] message="Customer declined" headers={"attempt":2,"authorization":"[REDACTED]"}',
		]);
	});

	it("honours a custom redaction list", () => {
		const lines: string[] = [];
		const logger = createConsoleLogger({
			timestamps: false,
			colors: false,
			redactKeys: ["gatewayId"],
			write: (line) => lines.push(line),
		});

		logger.info("Created", { gatewayId: "GW-1", phoneNumber: "255712345678" });

		expect(lines).toEqual(["INFO  [lipa] Created gatewayId=[REDACTED] phoneNumber=255712345678"]);
	});

	it("suppresses debug output at the default level", () => {
		const spy = vi.spyOn(console, "log").mockImplementation(() => {});
		createConsoleLogger().debug("noise");
		expect(spy).not.toHaveBeenCalled();
	});
});
