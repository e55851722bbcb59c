export { type ConsoleLoggerOptions, createConsoleLogger, formatFields } from "./console-logger.js";
export { createJsonLogger, type JsonLoggerOptions } from "./json-logger.js";
export { LOG_LEVEL_PRIORITY, type LogLevel, type LogSink, writeToConsole } from "./levels.js";
export { buildRedactKeys, redactData } from "./redact.js";
