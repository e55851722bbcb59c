import type { LipaLogger } from "@lipa/core";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
	level: LogLevel;
	message: string;
	data?: Record<string, unknown>;
}

export interface RecordingLogger extends LipaLogger {
	entries: LogEntry[];
	/** Entries at `level`, optionally only those with `message`. */
	find(level: LogLevel, message?: string): LogEntry[];
}

export function createSilentLogger(): LipaLogger {
	return {
		info: () => {},
		warn: () => {},
		error: () => {},
		debug: () => {},
	};
}

/** Keeps every log call in memory so tests can assert on it. */
export function createRecordingLogger(): RecordingLogger {
	const entries: LogEntry[] = [];
	const record = (level: LogLevel) => (message: string, data?: Record<string, unknown>) => {
		entries.push({ level, message, data });
	};
	return {
		entries,
		info: record("info"),
		warn: record("warn"),
		error: record("error"),
		debug: record("debug"),
		find: (level, message) =>
			entries.filter((entry) => entry.level === level && (message === undefined || entry.message === message)),
	};
}
