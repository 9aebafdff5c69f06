// =============================================================================
// LANGUAGE SCOPE — AsyncLocalStorage-based active language
// =============================================================================
// Code running inside `runWithLanguage("fr", fn)` sees "fr" as the active
// language, including across awaits inside `fn`.

import { AsyncLocalStorage } from "node:async_hooks";

interface LanguageStore {
	language: string;
}

const storage = new AsyncLocalStorage<LanguageStore>();

/**
 * Run `fn` with `language` as the active language.
 *
 * @example
 * ```ts
 * app.use((req, _res, next) => {
 *   runWithLanguage(req.acceptsLanguages("en", "fr") || "en", next);
 * });
 * ```
 */
export function runWithLanguage<T>(language: string, fn: () => T): T {
	return storage.run({ language }, fn);
}

/** Language of the innermost enclosing `runWithLanguage` scope. */
export function getScopedLanguage(): string | undefined {
	return storage.getStore()?.language;
}
