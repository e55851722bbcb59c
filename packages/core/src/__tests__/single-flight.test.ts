import { describe, expect, it, vi } from "vitest";
import { SingleFlight } from "../utils/single-flight.js";

function deferred<T>() {
	let resolve: (value: T) => void = () => {};
	let reject: (reason: unknown) => void = () => {};
	const promise = new Promise<T>((res, rej) => {
		resolve = res;
		reject = rej;
	});
	return { promise, resolve, reject };
}

describe("SingleFlight", () => {
	it("shares one execution between concurrent callers of a key", async () => {
		const flight = new SingleFlight<string>();
		const gate = deferred<string>();
		const fn = vi.fn(() => gate.promise);

		const a = flight.run("k", fn);
		const b = flight.run("k", fn);
		expect(flight.has("k")).toBe(true);

		gate.resolve("value");
		await expect(Promise.all([a, b])).resolves.toEqual(["value", "value"]);
		expect(fn).toHaveBeenCalledTimes(1);
		expect(flight.size).toBe(0);
	});

	it("keeps keys independent", async () => {
		const flight = new SingleFlight<number>();
		const fn = vi.fn(async () => 1);
		await Promise.all([flight.run("a", fn), flight.run("b", fn)]);
		expect(fn).toHaveBeenCalledTimes(2);
	});

	it("shares a failure and clears the entry", async () => {
		const flight = new SingleFlight<number>();
		const gate = deferred<number>();
		const a = flight.run("k", () => gate.promise);
		const b = flight.run("k", () => gate.promise);

		gate.reject(new Error("boom"));
		await expect(a).rejects.toThrow("boom");
		await expect(b).rejects.toThrow("boom");
		expect(flight.has("k")).toBe(false);

		await expect(flight.run("k", async () => 2)).resolves.toBe(2);
	});
});
