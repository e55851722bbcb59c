import { describe, expect, it } from "vitest";
import {
	AuthenticationError,
	DuplicateReferenceError,
	err,
	GatewayUnavailableError,
	InconsistentStateError,
	LipaError,
	ok,
	settle,
	toLipaError,
	unwrap,
	ValidationError,
} from "../error/index.js";

describe("LipaError", () => {
	describe("constructor", () => {
		it("creates an error with the given code and message", () => {
			const error = new LipaError("NOT_FOUND", "Transaction not found");
			expect(error.code).toBe("NOT_FOUND");
			expect(error.message).toBe("Transaction not found");
			expect(error.status).toBe(404);
		});

		it("falls back to the registry message", () => {
			const error = new LipaError("GATEWAY_UNAVAILABLE");
			expect(error.message).toBe("Gateway unavailable");
		});

		it("is an instance of Error", () => {
			expect(new LipaError("INTERNAL", "boom")).toBeInstanceOf(Error);
		});

		it("has the name 'LipaError'", () => {
			expect(new LipaError("INTERNAL").name).toBe("LipaError");
		});

		it("keeps the cause", () => {
			const cause = new Error("socket hang up");
			const error = new LipaError("GATEWAY_UNAVAILABLE", "down", { cause });
			expect(error.cause).toBe(cause);
		});
	});

	describe("transient flag", () => {
		it("marks gateway outages as transient", () => {
			expect(new GatewayUnavailableError().transient).toBe(true);
			expect(new AuthenticationError().transient).toBe(true);
		});

		it("marks validation and duplicates as permanent", () => {
			expect(new ValidationError().transient).toBe(false);
			expect(new DuplicateReferenceError().transient).toBe(false);
		});
	});

	describe("fromCode", () => {
		it("returns the matching subclass", () => {
			expect(LipaError.fromCode("VALIDATION_ERROR")).toBeInstanceOf(ValidationError);
			expect(LipaError.fromCode("DUPLICATE_REFERENCE")).toBeInstanceOf(DuplicateReferenceError);
			expect(LipaError.fromCode("GATEWAY_UNAVAILABLE")).toBeInstanceOf(GatewayUnavailableError);
		});

		it("uses a custom message", () => {
			const error = LipaError.fromCode("AUTHENTICATION_ERROR", { message: "bad key" });
			expect(error.message).toBe("bad key");
			expect(error.name).toBe("AuthenticationError");
		});

		it("returns a plain LipaError for INTERNAL", () => {
			const error = LipaError.fromCode("INTERNAL");
			expect(error.constructor).toBe(LipaError);
		});
	});

	describe("subclasses", () => {
		it("ValidationError carries field errors", () => {
			const error = new ValidationError("Bad phone", { phoneNumber: ["too short"] });
			expect(error.fieldErrors).toEqual({ phoneNumber: ["too short"] });
			expect(error.code).toBe("VALIDATION_ERROR");
		});

		it("InconsistentStateError describes the rejected transition", () => {
			const error = new InconsistentStateError({
				localReference: "ORDER-1",
				currentStatus: "SUCCESS",
				reportedStatus: "FAILED",
			});
			expect(error.message).toBe("Transaction 'ORDER-1' is SUCCESS; refusing gateway-reported FAILED");
			expect(error.details).toEqual({
				localReference: "ORDER-1",
				currentStatus: "SUCCESS",
				reportedStatus: "FAILED",
			});
			expect(error.transient).toBe(false);
		});

		it("GatewayUnavailableError records timeouts", () => {
			const error = new GatewayUnavailableError("timed out", { timedOut: true, httpStatus: 504 });
			expect(error.timedOut).toBe(true);
			expect(error.httpStatus).toBe(504);
		});
	});
});

describe("LipaResult", () => {
	it("settle captures a resolved value", async () => {
		const result = await settle(async () => 42);
		expect(result).toEqual({ ok: true, value: 42 });
	});

	it("settle captures a LipaError unchanged", async () => {
		const failure = new ValidationError("nope");
		const result = await settle(async () => {
			throw failure;
		});
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error).toBe(failure);
	});

	it("wraps foreign throwables as INTERNAL", () => {
		const error = toLipaError(new TypeError("x is undefined"));
		expect(error.code).toBe("INTERNAL");
		expect(error.message).toBe("x is undefined");
		expect(error.cause).toBeInstanceOf(TypeError);
	});

	it("wraps non-Error throwables", () => {
		expect(toLipaError("plain string").message).toBe("plain string");
	});

	it("unwrap returns the value or throws the error", () => {
		expect(unwrap(ok("done"))).toBe("done");
		const failure = new AuthenticationError();
		expect(() => unwrap(err(failure))).toThrow(failure);
	});
});
