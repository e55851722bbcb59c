export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

/** Receives one rendered line per log call. */
export type LogSink = (line: string, level: LogLevel) => void;

/** Errors and warnings go to stderr, everything else to stdout. */
export function writeToConsole(line: string, level: LogLevel): void {
	if (level === "error") console.error(line);
	else if (level === "warn") console.warn(line);
	else console.log(line);
}
