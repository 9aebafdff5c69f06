import type { PolyfieldLogger } from "../types/config.js";

export { type ConsoleLoggerOptions, createConsoleLogger } from "./console-logger.js";
export { createJsonLogger, type JsonLoggerOptions } from "./json-logger.js";
export type { LogLevel } from "./levels.js";
export { buildRedactKeys, redactData } from "./redact.js";

/** Logger that drops everything. Used by test instances. */
export function createNoopLogger(): PolyfieldLogger {
	const noop = () => {};
	return { debug: noop, info: noop, warn: noop, error: noop };
}
