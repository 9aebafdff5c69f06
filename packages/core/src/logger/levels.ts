export type LogLevel = "debug" | "info" | "warn" | "error";

export const LEVEL_PRIORITY: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

/** console method used for a level. */
export function consoleMethod(level: LogLevel): "error" | "warn" | "log" {
	if (level === "error") return "error";
	if (level === "warn") return "warn";
	return "log";
}
