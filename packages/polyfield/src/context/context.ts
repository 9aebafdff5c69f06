// =============================================================================
// CONTEXT BUILDER
// =============================================================================
// Builds PolyfieldContext from PolyfieldOptions. Validates the options,
// resolves the logger and language settings.

import type {
	ModelDefinition,
	PolyfieldContext,
	PolyfieldOptions,
	ResolvedPolyfieldOptions,
} from "@polyfield/core";
import { createConsoleLogger } from "@polyfield/core/logger";
import { normalizeLanguages, validateConfig } from "../config/index.js";
import { getScopedLanguage } from "./language.js";

export function buildContext<TModels extends Record<string, ModelDefinition>>(
	options: PolyfieldOptions<TModels>,
): PolyfieldContext {
	validateConfig(options);

	const languages = normalizeLanguages(options.languages);
	const languageCodes = languages.map((language) => language.code);

	const resolved: ResolvedPolyfieldOptions = {
		languages,
		languageCodes,
		// validateConfig guarantees a non-empty list
		fallbackLanguage: options.fallbackLanguage ?? languageCodes[0] ?? "",
		translateLabels: options.translateLabels ?? true,
		unresolvedAssignment: options.unresolvedAssignment ?? "warn",
	};

	const logger = options.logger ?? createConsoleLogger();
	const getLanguage = options.getLanguage;

	return {
		options: resolved,
		logger,
		getActiveLanguage(): string {
			return getScopedLanguage() || getLanguage?.() || resolved.fallbackLanguage;
		},
	};
}
