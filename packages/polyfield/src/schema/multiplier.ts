// =============================================================================
// FIELD MULTIPLIER — One logical field in, one field per language out
// =============================================================================

import type {
	ConcreteFieldDefinition,
	FieldDefinition,
	IndexDefinition,
} from "@polyfield/core";
import { cloneFieldDefinition, concreteFieldName, normalizeLanguageCode } from "@polyfield/core";

export interface MultiplyFieldInput {
	/** Canonical field name. */
	name: string;
	field: FieldDefinition;
	languages: readonly string[];
	fallbackLanguage: string;
	translateLabels: boolean;
}

/** Logical name → concrete names, in language order. */
export interface FieldBinding {
	field: string;
	concreteFields: string[];
}

export interface MultipliedField {
	fields: Record<string, ConcreteFieldDefinition>;
	binding: FieldBinding;
}

export function hasExplicitDefault(field: FieldDefinition): boolean {
	return field.default !== undefined || field.defaultSql !== undefined;
}

/**
 * Expand a logical field into one concrete field per language.
 *
 * Only the fallback language's field keeps the declared `notNull` and
 * `required`. Every other language is optional, and nullable unless the
 * declaration has an explicit default.
 *
 * @example
 * ```ts
 * multiplyField({
 *   name: "title",
 *   field: { type: "text", notNull: true, label: "Title" },
 *   languages: ["en", "fr"],
 *   fallbackLanguage: "en",
 *   translateLabels: true,
 * }).fields;
 * // {
 * //   title_en: { type: "text", notNull: true, label: "Title (en)", originalField: "title", language: "en" },
 * //   title_fr: { type: "text", notNull: false, required: false, label: "Title (fr)", originalField: "title", language: "fr" },
 * // }
 * ```
 */
export function multiplyField(input: MultiplyFieldInput): MultipliedField {
	const { name, field, languages, fallbackLanguage, translateLabels } = input;
	const fields: Record<string, ConcreteFieldDefinition> = {};
	const concreteFields: string[] = [];

	for (const language of languages) {
		const concrete: ConcreteFieldDefinition = {
			...cloneFieldDefinition(field),
			originalField: name,
			language,
		};

		if (language !== fallbackLanguage) {
			if (!hasExplicitDefault(concrete)) concrete.notNull = false;
			concrete.required = false;
			delete concrete.primaryKey;
		}

		if (concrete.label && translateLabels) {
			concrete.label = `${concrete.label} (${language})`;
		}

		const concreteName = concreteFieldName(name, language);
		fields[concreteName] = concrete;
		concreteFields.push(concreteName);
	}

	return { fields, binding: { field: name, concreteFields } };
}

/**
 * Replace every index that names a translatable field with one index per
 * language. `idx_title` on `["title"]` becomes `idx_title_en` on `["title_en"]`,
 * `idx_title_fr` on `["title_fr"]`, ...
 */
export function expandIndexes(
	indexes: readonly IndexDefinition[],
	translatable: ReadonlySet<string>,
	languages: readonly string[],
): IndexDefinition[] {
	const expanded: IndexDefinition[] = [];

	for (const index of indexes) {
		if (!index.columns.some((column) => translatable.has(column))) {
			expanded.push({ ...index, columns: [...index.columns] });
			continue;
		}

		for (const language of languages) {
			expanded.push({
				...index,
				name: `${index.name}_${normalizeLanguageCode(language)}`,
				columns: index.columns.map((column) =>
					translatable.has(column) ? concreteFieldName(column, language) : column,
				),
			});
		}
	}

	return expanded;
}
