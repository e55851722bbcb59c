// =============================================================================
// INPUT VALIDATION
// =============================================================================
// Runs before any network call. Every failure is a ValidationError naming the
// offending field.

import { ValidationError } from "../error/errors.js";
import { CURRENCIES, type Currency, isCurrency } from "../types/transaction.js";

export const COUNTRY_CODE = "255";
export const PHONE_NUMBER_LENGTH = 12;
export const MAX_REFERENCE_LENGTH = 100;
export const DEFAULT_MIN_AMOUNT = 100;

const REFERENCE_PATTERN = /^[A-Za-z0-9_-]+$/;

function invalid(field: string, message: string): ValidationError {
	return new ValidationError(message, { [field]: [message] });
}

/**
 * Bring a local or formatted number into international digits-only form.
 * `0712 345 678` and `+255 712 345 678` both become `255712345678`.
 */
export function normalizePhoneNumber(phone: string): string {
	let digits = phone.replace(/\D/g, "");
	if (digits.startsWith("0")) {
		digits = COUNTRY_CODE + digits.slice(1);
	} else if (digits.length > 0 && !digits.startsWith(COUNTRY_CODE)) {
		digits = COUNTRY_CODE + digits;
	}
	return digits;
}

/** Normalize, then require 12 digits starting with the country code. */
export function validatePhoneNumber(phone: string): string {
	if (!phone.trim()) {
		throw invalid("phoneNumber", "Phone number is required");
	}
	const normalized = normalizePhoneNumber(phone);
	if (normalized.length !== PHONE_NUMBER_LENGTH || !normalized.startsWith(COUNTRY_CODE)) {
		throw invalid(
			"phoneNumber",
			`Phone number must be ${PHONE_NUMBER_LENGTH} digits starting with ${COUNTRY_CODE}`,
		);
	}
	return normalized;
}

export function validateAmount(
	amount: number,
	limits: { minAmount?: number; maxAmount?: number | null } = {},
): number {
	const { minAmount = DEFAULT_MIN_AMOUNT, maxAmount = null } = limits;

	if (!Number.isFinite(amount)) {
		throw invalid("amount", "Amount must be a finite number");
	}
	if (amount <= 0) {
		throw invalid("amount", `Amount must be greater than zero. Got: ${amount}`);
	}
	if (amount < minAmount) {
		throw invalid("amount", `Amount must be at least ${minAmount}. Got: ${amount}`);
	}
	if (maxAmount !== null && amount > maxAmount) {
		throw invalid("amount", `Amount must not exceed ${maxAmount}. Got: ${amount}`);
	}
	if (Math.abs(Math.round(amount * 100) - amount * 100) > 1e-6) {
		throw invalid("amount", `Amount can have at most 2 decimal places. Got: ${amount}`);
	}
	return amount;
}

export function validateCurrency(currency: string): Currency {
	const upper = currency.trim().toUpperCase();
	if (!isCurrency(upper)) {
		throw invalid(
			"currency",
			`Unsupported currency: ${currency}. Supported: ${CURRENCIES.join(", ")}`,
		);
	}
	return upper;
}

export function validateOrderReference(reference: string): string {
	const trimmed = reference.trim();
	if (!trimmed) {
		throw invalid("orderReference", "Order reference is required");
	}
	if (trimmed.length > MAX_REFERENCE_LENGTH) {
		throw invalid(
			"orderReference",
			`Order reference too long. Maximum ${MAX_REFERENCE_LENGTH} characters, got ${trimmed.length}`,
		);
	}
	if (!REFERENCE_PATTERN.test(trimmed)) {
		throw invalid(
			"orderReference",
			"Order reference can only contain letters, numbers, hyphens and underscores",
		);
	}
	return trimmed;
}
