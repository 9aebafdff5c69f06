import type { LanguageDefinition, PolyfieldLogger, UnresolvedAssignmentPolicy } from "./config.js";

export interface ResolvedPolyfieldOptions {
	languages: readonly LanguageDefinition[];
	languageCodes: readonly string[];
	fallbackLanguage: string;
	translateLabels: boolean;
	unresolvedAssignment: UnresolvedAssignmentPolicy;
}

export interface PolyfieldContext {
	options: ResolvedPolyfieldOptions;
	logger: PolyfieldLogger;
	/** Active language for the calling context. Never empty. */
	getActiveLanguage(): string;
}
