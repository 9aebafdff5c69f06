// =============================================================================
// LANGUAGE RESOLUTION — Naming rule shared by expansion and accessors
// =============================================================================
// `title` + `pt-br` → `title_pt_br`. The same rule names the fields the
// multiplier emits and the fields the accessors look up.

import type { ConcreteFieldDefinition } from "../types/field.js";

/** Replace every hyphen with an underscore: `"en-us"` → `"en_us"`. */
export function normalizeLanguageCode(code: string): string {
	return code.replace(/-/g, "_");
}

/**
 * Name of the field storing `canonical` in `language`.
 *
 * @example
 * ```ts
 * concreteFieldName("title", "en-us"); // "title_en_us"
 * ```
 */
export function concreteFieldName(canonical: string, language: string): string {
	return `${canonical}_${normalizeLanguageCode(language)}`;
}

/** Concrete field name in each language, in the order given. */
export function concreteFieldNames(canonical: string, languages: readonly string[]): string[] {
	return languages.map((language) => concreteFieldName(canonical, language));
}

/** Primary subtag of a language code: `"fr-ca"` → `"fr"`, `"fr"` → `"fr"`. */
export function primarySubtag(code: string): string {
	const separator = code.search(/[-_]/);
	return separator === -1 ? code : code.slice(0, separator);
}

/**
 * Logical field name a schema field was expanded from. Reads the
 * back-reference set during expansion; `"page_title_en"` cannot be split
 * reliably when canonical names contain underscores.
 */
export function canonicalFieldName(name: string, field: ConcreteFieldDefinition): string {
	return field.originalField ?? name;
}

/** `undefined`, `null`, `""` and `[]` are empty; `0` and `false` are values. */
export function isEmptyValue(value: unknown): boolean {
	if (value === undefined || value === null) return true;
	if (typeof value === "string") return value.length === 0;
	if (Array.isArray(value)) return value.length === 0;
	return false;
}

/**
 * Build a translatable-field marker. The result is frozen, which is what
 * schema construction checks for.
 *
 * @example
 * ```ts
 * const article = {
 *   fields: { title: { type: "text", notNull: true } },
 *   translate: translate("title"),
 * };
 * ```
 */
export function translate<const T extends readonly string[]>(...fields: T): Readonly<T> {
	return Object.freeze(fields);
}
