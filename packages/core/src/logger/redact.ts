// =============================================================================
// PII REDACTION: shared helper for log data redaction
// =============================================================================
// Phone numbers identify mobile-money subscribers; tokens and keys grant
// gateway access. Neither may reach a log line.

const DEFAULT_REDACT_KEYS = new Set([
	"phone",
	"phoneNumber",
	"counterpartyPhone",
	"email",
	"token",
	"apiKey",
	"api-key",
	"secret",
	"checksumSecret",
	"authorization",
	"Authorization",
]);

function isPlainObject(value: unknown): value is Record<string, unknown> {
	if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
	const proto = Object.getPrototypeOf(value);
	return proto === Object.prototype || proto === null;
}

/**
 * Redact keys from a log data object, descending into nested plain objects.
 * Keys matching the redact set have their values replaced with "[REDACTED]".
 * The input is never mutated.
 */
export function redactData(
	data: Record<string, unknown> | undefined,
	keys: Set<string>,
): Record<string, unknown> | undefined {
	if (!data || keys.size === 0) return data;

	let redacted: Record<string, unknown> | undefined;
	for (const [key, value] of Object.entries(data)) {
		let next: unknown = value;
		if (keys.has(key)) {
			next = "[REDACTED]";
		} else if (isPlainObject(value)) {
			next = redactData(value, keys);
		}
		if (next !== value) {
			if (!redacted) redacted = { ...data };
			redacted[key] = next;
		}
	}
	return redacted ?? data;
}

/**
 * Build the redaction key set from user-provided keys (or defaults).
 */
export function buildRedactKeys(userKeys?: string[]): Set<string> {
	if (userKeys) return new Set(userKeys);
	return new Set(DEFAULT_REDACT_KEYS);
}
