// =============================================================================
// CONSOLE LOGGER: human-readable LipaLogger for development
// =============================================================================
// One line per call: timestamp, level, prefix, message, then the data as
// key=value pairs. Phone numbers and credentials are redacted before
// rendering.

import stringify from "safe-stable-stringify";
import type { LipaLogger } from "../types/config.js";
import { colorsSupported, createPalette } from "./colors.js";
import { LOG_LEVEL_PRIORITY, type LogLevel, type LogSink, writeToConsole } from "./levels.js";
import { buildRedactKeys, redactData } from "./redact.js";

export interface ConsoleLoggerOptions {
	/** Minimum log level to emit. Default: `"info"` */
	level?: LogLevel;
	/** Shown in brackets before each message. Default: `"lipa"` */
	prefix?: string;
	/** Default: `true` */
	timestamps?: boolean;
	/** Default: on for an interactive terminal without NO_COLOR */
	colors?: boolean;
	/** Keys whose values are replaced with "[REDACTED]". Default: phone numbers and secrets */
	redactKeys?: string[];
	/** Line sink. Default: console, with errors and warnings on stderr */
	write?: LogSink;
}

const BARE_VALUE = /^[^\s"=]+$/;

function formatValue(value: unknown): string {
	if (typeof value === "string") return BARE_VALUE.test(value) ? value : JSON.stringify(value);
	if (value === undefined) return "undefined";
	return stringify(value) ?? String(value);
}

/** `{ a: 1, b: "x y" }` → `a=1 b="x y"` */
export function formatFields(data: Record<string, unknown>): string {
	return Object.entries(data)
		.map(([key, value]) => `${key}=${formatValue(value)}`)
		.join(" ");
}

/**
 * @example
 * ```ts
 * import { createConsoleLogger } from "@lipa/core/logger";
 *
 * const logger = createConsoleLogger({ level: "debug" });
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): LipaLogger {
	const { level = "info", prefix = "lipa", timestamps = true, write = writeToConsole } = options;
	const minPriority = LOG_LEVEL_PRIORITY[level];
	const redactKeys = buildRedactKeys(options.redactKeys);
	const palette = createPalette(options.colors ?? colorsSupported());

	function emit(lvl: LogLevel, message: string, data?: Record<string, unknown>) {
		if (LOG_LEVEL_PRIORITY[lvl] < minPriority) return;

		const parts: string[] = [];
		if (timestamps) parts.push(palette.dim(new Date().toISOString()));
		parts.push(palette.level[lvl](palette.bold(lvl.toUpperCase().padEnd(5))));
		parts.push(`[${prefix}]`, message);

		const safeData = redactData(data, redactKeys);
		if (safeData && Object.keys(safeData).length > 0) {
			parts.push(palette.dim(formatFields(safeData)));
		}
		write(parts.join(" "), lvl);
	}

	return {
		debug: (message, data) => emit("debug", message, data),
		info: (message, data) => emit("info", message, data),
		warn: (message, data) => emit("warn", message, data),
		error: (message, data) => emit("error", message, data),
	};
}
