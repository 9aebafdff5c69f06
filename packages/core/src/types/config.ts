import type { ModelDefinition } from "./model.js";

export interface LanguageDefinition {
	/** Language code, e.g. `"en"` or `"pt-br"`. */
	code: string;
	/** Display label, e.g. `"English"`. */
	label: string;
}

/**
 * What `set()` does when no language in the chain has a concrete field.
 * The value is never written; `set()` returns `false` in every mode but `"throw"`.
 */
export type UnresolvedAssignmentPolicy = "warn" | "ignore" | "throw";

export interface PolyfieldOptions<
	TModels extends Record<string, ModelDefinition> = Record<string, ModelDefinition>,
> {
	/** Supported languages, in order. Plain strings use the code as label. */
	languages: ReadonlyArray<LanguageDefinition | string>;

	/** Language whose fields keep the declared constraints. Default: first language */
	fallbackLanguage?: string;

	/** Active language for the calling context. Default: `withLanguage()` scope, then fallback */
	getLanguage?: () => string | null | undefined;

	/** Model declarations, keyed by model name */
	models: TModels;

	/** Default for models that do not set `translateLabels`. Default: true */
	translateLabels?: boolean;

	/** Default: "warn" */
	unresolvedAssignment?: UnresolvedAssignmentPolicy;

	/** Custom logger */
	logger?: PolyfieldLogger;
}

export interface PolyfieldLogger {
	info(message: string, data?: Record<string, unknown>): void;
	warn(message: string, data?: Record<string, unknown>): void;
	error(message: string, data?: Record<string, unknown>): void;
	debug(message: string, data?: Record<string, unknown>): void;
}
