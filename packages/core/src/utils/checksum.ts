import { createHmac, timingSafeEqual } from "node:crypto";
import stringify from "safe-stable-stringify";

const deterministicStringify = stringify.configure({ deterministic: true });

const HEX_SHA256 = /^[0-9a-f]{64}$/;

/** HMAC-SHA256 of the exact payload bytes, hex encoded. */
export function signChecksum(payload: string | Uint8Array, secret: string): string {
	return createHmac("sha256", secret).update(payload).digest("hex");
}

/**
 * Verify a lower-case hex signature over `payload`, compared exactly as
 * received. Returns `false` for a mismatch, an empty or malformed signature,
 * or a missing secret. Never throws.
 */
export function verifyChecksum(
	payload: string | Uint8Array,
	signature: string | null | undefined,
	secret: string | null | undefined,
): boolean {
	if (!secret || !signature) return false;

	if (!HEX_SHA256.test(signature)) return false;

	const expectedBuf = Buffer.from(signChecksum(payload, secret), "utf-8");
	const signatureBuf = Buffer.from(signature, "utf-8");

	if (expectedBuf.length !== signatureBuf.length) return false;
	return timingSafeEqual(expectedBuf, signatureBuf);
}

/**
 * Checksum for an outgoing request body. Keys are sorted at every depth so
 * the value does not depend on property order.
 */
export function computeRequestChecksum(body: Record<string, unknown>, secret: string): string {
	return signChecksum(deterministicStringify(body) ?? "", secret);
}

/** Source-address gate for inbound notifications. An empty list allows all. */
export function isAllowedSource(ip: string | null | undefined, allowList: readonly string[]): boolean {
	if (allowList.length === 0) return true;
	if (!ip) return false;
	const address = ip.trim().replace(/^::ffff:/, "");
	return allowList.some((allowed) => allowed.trim() === address);
}
