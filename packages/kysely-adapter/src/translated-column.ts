// =============================================================================
// TRANSLATED COLUMN — Language fallback inside a SELECT
// =============================================================================
// Compiles the accessor resolution chain into one SQL expression:
//
//   COALESCE(active, primary(active), <default>)
//
// where <default> is the fallback language's column, or a CASE over the
// model's default-language column when it declares one. Text columns go
// through NULLIF(col, '') so that blank strings fall through like they do in
// the accessors.

import type { FieldType, ModelSchema } from "@polyfield/core";
import { concreteFieldName, PolyfieldError, primarySubtag } from "@polyfield/core";
import type { RawBuilder } from "kysely";
import { sql } from "kysely";

const TEXT_TYPES: ReadonlySet<FieldType> = new Set(["text", "varchar"]);

export interface TranslatedColumnOptions {
	/** Active language of the query. */
	language: string;
	/** Instance fallback language (`polyfield.fallbackLanguage`). */
	fallbackLanguage: string;
	/** Qualify column references with this table name or alias. */
	table?: string;
}

// =============================================================================
// INTERNAL HELPERS
// =============================================================================

function dedupe(languages: readonly string[]): string[] {
	const result: string[] = [];
	for (const language of languages) {
		if (!result.includes(language)) result.push(language);
	}
	return result;
}

function column(name: string, table: string | undefined): RawBuilder<unknown> {
	return sql.ref(table ? `${table}.${name}` : name);
}

function coalesce(values: readonly RawBuilder<unknown>[]): RawBuilder<unknown> {
	const [first] = values;
	if (!first) return sql`NULL`;
	if (values.length === 1) return first;
	return sql`COALESCE(${sql.join(values)})`;
}

/** Configured languages of `field`, read from the expanded schema. */
export function fieldLanguages(schema: ModelSchema, field: string): string[] {
	const languages: string[] = [];
	for (const concrete of Object.values(schema.fields)) {
		if (concrete.originalField === field && concrete.language !== undefined) {
			languages.push(concrete.language);
		}
	}
	return languages;
}

// =============================================================================
// EXPRESSION BUILDER
// =============================================================================

/**
 * SQL expression resolving `field` the way `polyfield.get()` does.
 * Throws UNKNOWN_FIELD when `field` is not translatable on the model.
 *
 * @example
 * ```ts
 * const article = polyfield.model("article");
 * const rows = await db
 *   .selectFrom("article")
 *   .select(["id", translatedColumn(article, "title", { language: "fr", fallbackLanguage: "en" }).as("title")])
 *   .execute();
 * ```
 */
export function translatedColumn(
	schema: ModelSchema,
	field: string,
	options: TranslatedColumnOptions,
): RawBuilder<unknown> {
	if (!schema.translatableFields.includes(field)) {
		throw PolyfieldError.unknownField(schema.name, field);
	}

	const { language, fallbackLanguage, table } = options;

	function values(languages: readonly string[]): RawBuilder<unknown>[] {
		const result: RawBuilder<unknown>[] = [];
		for (const code of dedupe(languages)) {
			const name = concreteFieldName(field, code);
			const definition = Object.hasOwn(schema.fields, name) ? schema.fields[name] : undefined;
			if (!definition || definition.originalField !== field) continue;
			const ref = column(name, table);
			result.push(TEXT_TYPES.has(definition.type) ? sql`NULLIF(${ref}, '')` : ref);
		}
		return result;
	}

	const active = [language, primarySubtag(language)];
	const fallback = [fallbackLanguage, primarySubtag(fallbackLanguage)];

	if (schema.defaultLanguageField === null) {
		return coalesce(values([...active, ...fallback]));
	}

	const defaultLanguage = column(schema.defaultLanguageField, table);
	// "pt_br" and "pt-br" name the same concrete field.
	const normalized = sql`replace(${defaultLanguage}, '_', '-')`;
	const languages = fieldLanguages(schema, field);

	const branches: RawBuilder<unknown>[] = [
		sql`WHEN ${defaultLanguage} IS NULL OR ${defaultLanguage} = '' THEN ${coalesce(values(fallback))}`,
	];
	for (const code of languages) {
		branches.push(
			sql`WHEN ${normalized} = ${code.replace(/_/g, "-")} THEN ${coalesce(values([code, primarySubtag(code)]))}`,
		);
	}
	// Region variants such as "fr-be" resolve through their primary subtag.
	for (const code of languages.filter((code) => primarySubtag(code) === code)) {
		branches.push(
			sql`WHEN split_part(${normalized}, '-', 1) = ${code} THEN ${coalesce(values([code]))}`,
		);
	}

	const byDefaultLanguage = sql`CASE ${sql.join(branches, sql` `)} END`;
	return coalesce([...values(active), byDefaultLanguage]);
}

/**
 * Every translatable field of the model, aliased to its logical name.
 *
 * @example
 * ```ts
 * db.selectFrom("article").select(["id", ...translatedColumns(article, { language, fallbackLanguage })]);
 * ```
 */
export function translatedColumns(schema: ModelSchema, options: TranslatedColumnOptions) {
	return schema.translatableFields.map((field) =>
		translatedColumn(schema, field, options).as(field),
	);
}
