/**
 * Two-decimal string the gateway expects.
 * 1000 → "1000.00"
 */
export function formatAmount(amount: number | string): string {
	const value = typeof amount === "number" ? amount : Number(amount);
	if (!Number.isFinite(value)) return "0.00";
	return value.toFixed(2);
}

/**
 * Display form with thousands separators.
 * (1000, "TZS") → "TZS 1,000.00"
 */
export function formatCurrency(amount: number | string, currency = "TZS"): string {
	const value = typeof amount === "number" ? amount : Number(amount);
	if (!Number.isFinite(value)) return `${currency} 0.00`;
	const formatted = value.toLocaleString("en-US", {
		minimumFractionDigits: 2,
		maximumFractionDigits: 2,
	});
	return `${currency} ${formatted}`;
}

/** ("BOOKING", 12345) → "BOOKING-12345" */
export function formatOrderReference(prefix: string, identifier: string | number): string {
	return `${prefix}-${identifier}`;
}

/**
 * The gateway sends amounts as strings or numbers. Anything that does not
 * parse becomes 0.
 */
export function parseGatewayAmount(amount: unknown): number {
	if (typeof amount === "number") return Number.isFinite(amount) ? amount : 0;
	if (typeof amount === "string" && amount.trim() !== "") {
		const value = Number(amount.replace(/,/g, ""));
		return Number.isFinite(value) ? value : 0;
	}
	return 0;
}
