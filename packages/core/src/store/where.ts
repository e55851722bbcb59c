import type { Where } from "./adapter.js";

function readField(value: object, field: string): unknown {
	return Object.hasOwn(value, field) ? Reflect.get(value, field) : undefined;
}

/** Evaluate a single Where condition against a stored value. */
export function matchesCondition(value: object, condition: Where): boolean {
	const actual = readField(value, condition.field);

	switch (condition.operator) {
		case "eq":
			return actual === condition.value;
		case "ne":
			return actual !== condition.value;
		case "in":
			return Array.isArray(condition.value) && condition.value.includes(actual);
		case "gt":
			if (typeof actual === "string" && typeof condition.value === "string") return actual > condition.value;
			if (typeof actual === "number" && typeof condition.value === "number") return actual > condition.value;
			return false;
		default:
			return false;
	}
}

/** All conditions must match (AND). */
export function matchesWhere(value: object, where: Where[]): boolean {
	return where.every((condition) => matchesCondition(value, condition));
}
