// =============================================================================
// JSON LOGGER: structured JSON logging for production environments
// =============================================================================

import type { LipaLogger } from "../types/config.js";
import { LOG_LEVEL_PRIORITY, type LogLevel, type LogSink, writeToConsole } from "./levels.js";
import { buildRedactKeys, redactData } from "./redact.js";

export interface JsonLoggerOptions {
	/** Minimum log level to emit. Default: `"info"` */
	level?: LogLevel;
	/** Service name for structured output. Default: `"lipa"` */
	service?: string;
	/** Keys to redact from log data. Values replaced with "[REDACTED]". Default: phone numbers and secrets */
	redactKeys?: string[];
	/** Line sink. Default: console, with errors and warnings on stderr */
	write?: LogSink;
}

/**
 * Create a structured JSON logger implementing `LipaLogger`.
 *
 * Each log line is emitted as a single-line JSON object suitable for
 * log aggregation systems.
 *
 * @example
 * ```ts
 * import { createJsonLogger } from "@lipa/core/logger";
 *
 * const logger = createJsonLogger({ level: "debug", service: "checkout" });
 * ```
 */
export function createJsonLogger(options: JsonLoggerOptions = {}): LipaLogger {
	const { level = "info", service = "lipa", write = writeToConsole } = options;
	const minPriority = LOG_LEVEL_PRIORITY[level];
	const redactKeys = buildRedactKeys(options.redactKeys);

	function emit(lvl: LogLevel, message: string, data?: Record<string, unknown>) {
		if (LOG_LEVEL_PRIORITY[lvl] < minPriority) return;

		const safeData = redactData(data, redactKeys);
		const entry: Record<string, unknown> = {
			timestamp: new Date().toISOString(),
			level: lvl,
			service,
			message,
			...safeData,
		};

		write(JSON.stringify(entry), lvl);
	}

	return {
		debug: (message, data) => emit("debug", message, data),
		info: (message, data) => emit("info", message, data),
		warn: (message, data) => emit("warn", message, data),
		error: (message, data) => emit("error", message, data),
	};
}
