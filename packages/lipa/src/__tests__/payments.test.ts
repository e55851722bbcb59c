import type { StatusChangeEvent } from "@lipa/core";
import { DuplicateReferenceError, ValidationError } from "@lipa/core";
import { assertErr, assertOk, assertStoredTransaction, getTestInstance, type TestInstance } from "@lipa/test-utils";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { CreateTransactionParams } from "../managers/transaction-manager.js";

const ORDER: CreateTransactionParams = {
	amount: 1000,
	phoneNumber: "0712 345 678",
	localReference: "ORD-1",
};

describe("Payments", () => {
	let instance: TestInstance;

	beforeEach(() => {
		instance = getTestInstance();
	});

	afterEach(async () => {
		await instance.cleanup();
	});

	// =========================================================================
	// CREATE
	// =========================================================================

	describe("create", () => {
		it("initiates a USSD push and stores the transaction", async () => {
			const { lipa, gateway, store } = instance;

			const payment = assertOk(await lipa.payments.create({ ...ORDER, metadata: { orderId: 42 } }));

			expect(payment).toMatchObject({
				localReference: "ORD-1",
				gatewayId: "GW-1",
				kind: "PAYMENT",
				amount: 1000,
				currency: "TZS",
				counterpartyPhone: "255712345678",
				status: "PROCESSING",
				channel: "TANZANIA-MPESA",
				metadata: { orderId: 42 },
				completedAt: null,
			});
			expect(payment.createdAt).toBe(payment.updatedAt);

			const create = gateway.requests.find((request) => request.route === "paymentCreate");
			expect(create?.body).toEqual({
				amount: "1000",
				currency: "TZS",
				orderReference: "ORD-1",
				phoneNumber: "255712345678",
			});

			const stored = await assertStoredTransaction(store, "ORD-1");
			expect(stored.version).toBe(1);
			expect(stored.value).toEqual(payment);
		});

		it("uses the requested currency over the configured default", async () => {
			const payment = assertOk(await instance.lipa.payments.create({ ...ORDER, currency: "usd" }));

			expect(payment.currency).toBe("USD");
		});

		it("falls back to the configured currency", async () => {
			const { lipa } = getTestInstance({ options: { currency: "USD" } });

			const payment = assertOk(await lipa.payments.create(ORDER));

			expect(payment.currency).toBe("USD");
		});

		it("notifies subscribers of the new transaction", async () => {
			const events: StatusChangeEvent[] = [];
			instance.lipa.events.subscribe((event) => {
				events.push(event);
			});

			const payment = assertOk(await instance.lipa.payments.create(ORDER));

			expect(events).toEqual([
				{
					kind: "PAYMENT",
					localReference: "ORD-1",
					oldStatus: null,
					newStatus: "PROCESSING",
					record: payment,
					created: true,
				},
			]);
		});

		it("records the initial status when the response has none", async () => {
			const { lipa, gateway, logger } = instance;
			gateway.script("paymentCreate", { status: 200, body: { id: "GW-X", orderReference: "ORD-1" } });

			const payment = assertOk(await lipa.payments.create(ORDER));

			expect(payment.status).toBe("PROCESSING");
			expect(payment.gatewayId).toBe("GW-X");
			expect(
				logger.find("warn", "Creation response carried no known status; recording the initial status"),
			).toEqual([
				{
					level: "warn",
					message: "Creation response carried no known status; recording the initial status",
					data: { localReference: "ORD-1", reportedStatus: "UNKNOWN", recordedStatus: "PROCESSING" },
				},
			]);
		});
	});

	// =========================================================================
	// IDEMPOTENCY
	// =========================================================================

	describe("idempotency", () => {
		it("returns the stored transaction when the reference is replayed", async () => {
			const { lipa, gateway } = instance;

			const first = assertOk(await lipa.payments.create(ORDER));
			const second = assertOk(await lipa.payments.create(ORDER));

			expect(second).toEqual(first);
			expect(gateway.count("paymentCreate")).toBe(1);
		});

		it("creates once for concurrent calls with the same reference", async () => {
			const { lipa, gateway } = instance;
			const events: StatusChangeEvent[] = [];
			lipa.events.subscribe((event) => {
				events.push(event);
			});

			const results = await Promise.all(Array.from({ length: 5 }, () => lipa.payments.create(ORDER)));

			const payments = results.map(assertOk);
			for (const payment of payments) {
				expect(payment).toEqual(payments[0]);
			}
			expect(gateway.count("paymentCreate")).toBe(1);
			expect(events).toHaveLength(1);
		});

		it("lets a waiting caller finish when the caller that started the creation aborts", async () => {
			const { lipa, gateway, logger, store } = getTestInstance({ gateway: { latencyMs: 50 } });
			const controller = new AbortController();

			const first = lipa.payments.create({ ...ORDER, signal: controller.signal });
			const second = lipa.payments.create(ORDER);
			setTimeout(() => controller.abort(), 10);

			const aborted = assertErr(await first, "GATEWAY_UNAVAILABLE");
			const created = assertOk(await second);

			expect(aborted.message).toBe("Operation aborted");
			expect(created).toMatchObject({ localReference: "ORD-1", gatewayId: "GW-1", status: "PROCESSING" });
			expect((await assertStoredTransaction(store, "ORD-1")).value).toEqual(created);
			expect(gateway.count("paymentCreate")).toBe(1);
			expect(
				logger.find("info", "Shared creation was abandoned by the caller that started it; retrying"),
			).toHaveLength(1);
		});

		it("returns the stored transaction when a replay differs, and warns", async () => {
			const { lipa, gateway, logger } = instance;
			assertOk(await lipa.payments.create(ORDER));

			const replay = assertOk(await lipa.payments.create({ ...ORDER, amount: 2000 }));

			expect(replay.amount).toBe(1000);
			expect(gateway.count("paymentCreate")).toBe(1);
			expect(
				logger.find("warn", "Replayed request differs from the stored transaction; returning the stored one"),
			).toEqual([
				{
					level: "warn",
					message: "Replayed request differs from the stored transaction; returning the stored one",
					data: { localReference: "ORD-1", field: "amount" },
				},
			]);
		});

		it("rejects a reference already used by a payout", async () => {
			const { lipa, gateway } = instance;
			assertOk(await lipa.payouts.create({ ...ORDER, localReference: "ORD-X" }));

			const error = assertErr(
				await lipa.payments.create({ ...ORDER, localReference: "ORD-X" }),
				"DUPLICATE_REFERENCE",
			);

			expect(error.message).toBe("Order reference 'ORD-X' is already used by a payout");
			expect(error).toBeInstanceOf(DuplicateReferenceError);
			expect(error).toMatchObject({ existing: { kind: "PAYOUT", localReference: "ORD-X" } });
			expect(gateway.count("paymentCreate")).toBe(0);
		});

		it("adopts the gateway's record when the gateway already knows the reference", async () => {
			const { lipa, gateway } = instance;
			gateway.seed({
				kind: "PAYMENT",
				orderReference: "ORD-1",
				amount: 1000,
				status: "SUCCESS",
				counterpartyName: "Jane Doe",
			});

			const payment = assertOk(await lipa.payments.create(ORDER));

			expect(payment).toMatchObject({ status: "SUCCESS", gatewayId: "GW-1", counterpartyName: "Jane Doe" });
			expect(payment.completedAt).toBe(payment.createdAt);
			expect(gateway.count("paymentStatus")).toBe(1);
		});
	});

	// =========================================================================
	// UNCERTAIN OUTCOMES
	// =========================================================================

	describe("uncertain outcomes", () => {
		it("recovers a creation that timed out after the gateway committed it", async () => {
			const { lipa, gateway, logger } = getTestInstance({ options: { advanced: { requestTimeoutMs: 100 } } });
			gateway.script("paymentCreate", { timeout: true, commit: true });

			const payment = assertOk(await lipa.payments.create(ORDER));

			expect(payment).toMatchObject({ status: "PROCESSING", gatewayId: "GW-1" });
			expect(gateway.count("paymentCreate")).toBe(1);
			expect(gateway.count("paymentStatus")).toBe(1);
			expect(logger.find("warn", "Creation outcome uncertain; querying gateway status")).toHaveLength(1);
		});

		it("keeps the timeout error when the gateway never saw the creation", async () => {
			const { lipa, gateway, store } = getTestInstance({ options: { advanced: { requestTimeoutMs: 100 } } });
			gateway.script("paymentCreate", { timeout: true });

			const error = assertErr(await lipa.payments.create(ORDER), "GATEWAY_UNAVAILABLE");

			expect(error.message).toBe("Gateway request timed out after 100ms");
			expect(await store.get({ model: "transaction", key: "ORD-1" })).toBeNull();

			const retried = assertOk(await lipa.payments.create(ORDER));
			expect(retried.gatewayId).toBe("GW-1");
			expect(gateway.count("paymentCreate")).toBe(2);
		});

		it("does not start when the caller has already aborted", async () => {
			const { lipa, gateway } = instance;
			const controller = new AbortController();
			controller.abort();

			const error = assertErr(
				await lipa.payments.create({ ...ORDER, signal: controller.signal }),
				"GATEWAY_UNAVAILABLE",
			);

			expect(error.message).toBe("Operation aborted");
			expect(gateway.requests).toHaveLength(0);
		});
	});

	// =========================================================================
	// VALIDATION
	// =========================================================================

	describe("validation", () => {
		const cases: Array<[Partial<CreateTransactionParams>, string, string]> = [
			[{ amount: 50 }, "amount", "Amount must be at least 100. Got: 50"],
			[{ amount: 100.123 }, "amount", "Amount can have at most 2 decimal places. Got: 100.123"],
			[{ phoneNumber: "12345" }, "phoneNumber", "Phone number must be 12 digits starting with 255"],
			[
				{ localReference: "bad ref!" },
				"orderReference",
				"Order reference can only contain letters, numbers, hyphens and underscores",
			],
			[{ currency: "EUR" }, "currency", "Unsupported currency: EUR. Supported: TZS, USD"],
		];

		it.each(cases)("rejects %o before any network call", async (override, field, message) => {
			const { lipa, gateway } = instance;

			const error = assertErr(await lipa.payments.create({ ...ORDER, ...override }), "VALIDATION_ERROR");

			expect(error.message).toBe(message);
			expect(error).toBeInstanceOf(ValidationError);
			expect(error).toMatchObject({ fieldErrors: { [field]: [message] } });
			expect(gateway.requests).toHaveLength(0);
		});

		it("honors a configured maximum amount", async () => {
			const { lipa } = getTestInstance({ options: { advanced: { maxAmount: 5000 } } });

			const error = assertErr(await lipa.payments.create({ ...ORDER, amount: 5001 }), "VALIDATION_ERROR");

			expect(error.message).toBe("Amount must not exceed 5000. Got: 5001");
		});
	});

	// =========================================================================
	// PREVIEW
	// =========================================================================

	describe("preview", () => {
		it("previews before creating when asked", async () => {
			const { lipa, gateway } = instance;

			assertOk(await lipa.payments.create({ ...ORDER, previewFirst: true }));

			const preview = gateway.requests.find((request) => request.route === "paymentPreview");
			expect(preview?.body).toEqual({
				amount: "1000",
				currency: "TZS",
				orderReference: "ORD-1",
				phoneNumber: "255712345678",
				fetchSenderDetails: false,
			});
			expect(gateway.count("paymentCreate")).toBe(1);
		});

		it("does not create when no payment method is available", async () => {
			const { lipa, gateway, store } = instance;
			gateway.paymentMethods = [{ name: "M-PESA", status: "UNAVAILABLE" }];

			const error = assertErr(await lipa.payments.create({ ...ORDER, previewFirst: true }), "PREVIEW_REJECTED");

			expect(error.message).toBe("No payment method is available for 'ORD-1'");
			expect(gateway.count("paymentCreate")).toBe(0);
			expect(await store.get({ model: "transaction", key: "ORD-1" })).toBeNull();
		});

		it("lists the methods the gateway offers", async () => {
			const { lipa, gateway } = instance;

			const methods = assertOk(await lipa.payments.getAvailableMethods(ORDER));

			expect(methods).toEqual([{ name: "M-PESA", status: "AVAILABLE", fee: 0, message: "Ready" }]);
			expect(gateway.count("paymentCreate")).toBe(0);
		});
	});

	// =========================================================================
	// QUERIES
	// =========================================================================

	describe("get", () => {
		it("reads the stored payment without calling the gateway", async () => {
			const { lipa, gateway } = instance;
			const created = assertOk(await lipa.payments.create(ORDER));
			const requestsBefore = gateway.requests.length;

			const payment = assertOk(await lipa.payments.get("ORD-1"));

			expect(payment).toEqual(created);
			expect(gateway.requests).toHaveLength(requestsBefore);
		});

		it("reports an unknown reference as NOT_FOUND", async () => {
			const error = assertErr(await instance.lipa.payments.get("NOPE"), "NOT_FOUND");

			expect(error.message).toBe("Payment 'NOPE' not found");
		});

		it("does not return a payment as a payout", async () => {
			const { lipa } = instance;
			assertOk(await lipa.payments.create(ORDER));

			const error = assertErr(await lipa.payouts.get("ORD-1"), "NOT_FOUND");

			expect(error.message).toBe("Payout 'ORD-1' not found");
		});
	});
});
