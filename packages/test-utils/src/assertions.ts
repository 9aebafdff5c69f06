import type { ModelSchema } from "@polyfield/core";
import { canonicalFieldName, concreteFieldName } from "@polyfield/core";

/**
 * Assert that every translatable field of the schema has exactly one concrete
 * field per language, named by the resolution rule and pointing back to it.
 */
export function assertConcreteFields(schema: ModelSchema, languages: readonly string[]): void {
	for (const field of schema.translatableFields) {
		for (const language of languages) {
			const name = concreteFieldName(field, language);
			const concrete = Object.hasOwn(schema.fields, name) ? schema.fields[name] : undefined;
			if (!concrete) {
				throw new Error(`Model ${schema.name}: missing concrete field ${name}`);
			}
			if (canonicalFieldName(name, concrete) !== field || concrete.language !== language) {
				throw new Error(
					`Model ${schema.name}: ${name} points back to ${concrete.originalField}/${concrete.language}, expected ${field}/${language}`,
				);
			}
		}

		const count = Object.values(schema.fields).filter((f) => f.originalField === field).length;
		if (count !== languages.length) {
			throw new Error(
				`Model ${schema.name}: ${field} has ${count} concrete fields, expected ${languages.length}`,
			);
		}

		if (Object.hasOwn(schema.fields, field)) {
			throw new Error(`Model ${schema.name}: canonical name ${field} is stored as a field`);
		}
	}
}

/**
 * Assert that only the fallback language's concrete fields can be not-null
 * without a default, or required.
 */
export function assertRelaxedConstraints(schema: ModelSchema, fallbackLanguage: string): void {
	for (const [name, field] of Object.entries(schema.fields)) {
		if (field.originalField === undefined || field.language === fallbackLanguage) continue;

		const hasDefault = field.default !== undefined || field.defaultSql !== undefined;
		if (field.required || (field.notNull && !hasDefault)) {
			throw new Error(`Model ${schema.name}: ${name} must be optional and nullable`);
		}
	}
}
