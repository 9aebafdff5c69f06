// =============================================================================
// REDACTION — Keeps secrets out of log lines
// =============================================================================

/**
 * Shallow-redact keys from a log data object. Returns the input untouched
 * when nothing matches.
 */
export function redactData(
	data: Record<string, unknown> | undefined,
	keys: ReadonlySet<string>,
): Record<string, unknown> | undefined {
	if (!data || keys.size === 0) return data;

	let redacted: Record<string, unknown> | undefined;
	for (const key of Object.keys(data)) {
		if (!keys.has(key)) continue;
		redacted ??= { ...data };
		redacted[key] = "[REDACTED]";
	}
	return redacted ?? data;
}

/** Nothing is redacted unless keys are configured. */
export function buildRedactKeys(userKeys?: string[]): Set<string> {
	return new Set(userKeys);
}
