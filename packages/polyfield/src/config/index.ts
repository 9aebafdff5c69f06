import type { LanguageDefinition, PolyfieldOptions } from "@polyfield/core";
import { ConfigError, normalizeLanguageCode } from "@polyfield/core";

/** `en`, `pt-br`, `zh-hans-cn`, `sr_latn`. */
const LANGUAGE_CODE_PATTERN = /^[a-zA-Z]{2,8}(?:[-_][a-zA-Z0-9]{1,8})*$/;

const UNRESOLVED_ASSIGNMENT_POLICIES = new Set(["warn", "ignore", "throw"]);

/**
 * Normalize the configured language list to `{ code, label }` entries.
 * Plain strings use the code as label.
 */
export function normalizeLanguages(
	languages: PolyfieldOptions["languages"],
): LanguageDefinition[] {
	return languages.map((language) =>
		typeof language === "string" ? { code: language, label: language } : { ...language },
	);
}

/**
 * Validate polyfield configuration options at runtime.
 * Throws ConfigError with clear messages on invalid configuration.
 */
export function validateConfig(options: PolyfieldOptions): void {
	if (!Array.isArray(options.languages) || options.languages.length === 0) {
		throw new ConfigError("Polyfield config: 'languages' must be a non-empty list");
	}

	const seen = new Map<string, string>();
	for (const language of options.languages) {
		const code = typeof language === "string" ? language : language?.code;
		if (typeof code !== "string" || !LANGUAGE_CODE_PATTERN.test(code)) {
			throw new ConfigError(
				`Polyfield config: invalid language code ${JSON.stringify(code)}. Use codes like "en" or "pt-br".`,
			);
		}
		if (typeof language !== "string" && typeof language.label !== "string") {
			throw new ConfigError(`Polyfield config: language "${code}" needs a string 'label'`);
		}

		// "en-us" and "en_us" would name the same concrete field.
		const normalized = normalizeLanguageCode(code);
		const previous = seen.get(normalized);
		if (previous !== undefined) {
			throw new ConfigError(
				`Polyfield config: languages "${previous}" and "${code}" map to the same field suffix "_${normalized}"`,
			);
		}
		seen.set(normalized, code);
	}

	if (options.fallbackLanguage !== undefined) {
		const codes = [...seen.values()];
		if (!codes.includes(options.fallbackLanguage)) {
			throw new ConfigError(
				`Polyfield config: 'fallbackLanguage' "${options.fallbackLanguage}" is not one of the configured languages (${codes.join(", ")})`,
			);
		}
	}

	if (options.getLanguage !== undefined && typeof options.getLanguage !== "function") {
		throw new ConfigError("Polyfield config: 'getLanguage' must be a function");
	}

	if (options.translateLabels !== undefined && typeof options.translateLabels !== "boolean") {
		throw new ConfigError("Polyfield config: 'translateLabels' must be a boolean");
	}

	if (
		options.unresolvedAssignment !== undefined &&
		!UNRESOLVED_ASSIGNMENT_POLICIES.has(options.unresolvedAssignment)
	) {
		throw new ConfigError(
			`Polyfield config: 'unresolvedAssignment' must be one of warn, ignore, throw (got "${options.unresolvedAssignment}")`,
		);
	}

	if (typeof options.models !== "object" || options.models === null) {
		throw new ConfigError("Polyfield config: 'models' must be an object of model definitions");
	}
}
