// =============================================================================
// JSON LOGGER — One JSON object per line
// =============================================================================

import type { PolyfieldLogger } from "../types/config.js";
import { consoleMethod, LEVEL_PRIORITY, type LogLevel } from "./levels.js";
import { buildRedactKeys, redactData } from "./redact.js";

export interface JsonLoggerOptions {
	/** Minimum log level to emit. Default: `"info"` */
	level?: LogLevel;
	/** Service name for structured output. Default: `"polyfield"` */
	service?: string;
	/** Keys whose values are replaced with "[REDACTED]". */
	redactKeys?: string[];
	/** Clock used for the `timestamp` property. */
	now?: () => Date;
}

/**
 * Create a structured JSON logger implementing `PolyfieldLogger`.
 *
 * @example
 * ```ts
 * import { createJsonLogger } from "@polyfield/core/logger";
 *
 * const logger = createJsonLogger({ service: "catalog" });
 * ```
 */
export function createJsonLogger(options: JsonLoggerOptions = {}): PolyfieldLogger {
	const { level = "info", service = "polyfield", now = () => new Date() } = options;
	const minPriority = LEVEL_PRIORITY[level];
	const redactKeys = buildRedactKeys(options.redactKeys);

	function emit(lvl: LogLevel, message: string, data?: Record<string, unknown>) {
		if (LEVEL_PRIORITY[lvl] < minPriority) return;

		const entry: Record<string, unknown> = {
			timestamp: now().toISOString(),
			level: lvl,
			service,
			message,
			...redactData(data, redactKeys),
		};

		console[consoleMethod(lvl)](JSON.stringify(entry));
	}

	return {
		debug: (message, data) => emit("debug", message, data),
		info: (message, data) => emit("info", message, data),
		warn: (message, data) => emit("warn", message, data),
		error: (message, data) => emit("error", message, data),
	};
}
