// =============================================================================
// POLYFIELD -- Main entry point
// =============================================================================
// Creates the instance that owns the expanded schemas and dispatches record
// get/set calls to their accessors.

import type {
	FieldAccessor,
	LanguageDefinition,
	ModelDefinition,
	ModelRecord,
	ModelSchema,
	PolyfieldContext,
	PolyfieldOptions,
} from "@polyfield/core";
import {
	canonicalFieldName,
	concreteFieldName,
	concreteFieldNames,
	PolyfieldError,
} from "@polyfield/core";
import { buildContext } from "../context/context.js";
import { runWithLanguage } from "../context/language.js";
import { buildSchemas } from "../schema/builder.js";

export type ModelName<TModels> = Extract<keyof TModels, string>;

export interface LocalizeOptions {
	/** Drop the per-language fields from the result. Default: false */
	stripConcrete?: boolean;
}

// =============================================================================
// POLYFIELD INTERFACE
// =============================================================================

export interface Polyfield<
	TModels extends Record<string, ModelDefinition> = Record<string, ModelDefinition>,
> {
	/** Every declared model, abstract ones included. */
	schemas: Readonly<Record<string, ModelSchema>>;
	languages: readonly LanguageDefinition[];
	fallbackLanguage: string;

	model: (name: ModelName<TModels>) => ModelSchema;
	accessor: (model: ModelName<TModels>, field: string) => FieldAccessor;

	/** Value of `field` for the active language, with fallback. */
	get: (model: ModelName<TModels>, record: ModelRecord, field: string) => unknown;
	/** Write `field` for the active language. Returns false when nothing was written. */
	set: (model: ModelName<TModels>, record: ModelRecord, field: string, value: unknown) => boolean;
	/** Copy of `record` with every translatable field resolved under its logical name. */
	localize: (
		model: ModelName<TModels>,
		record: ModelRecord,
		options?: LocalizeOptions,
	) => ModelRecord;
	/** Stored value of `field` in each configured language, keyed by language code. */
	translations: (
		model: ModelName<TModels>,
		record: ModelRecord,
		field: string,
	) => Record<string, unknown>;

	/** Concrete field name for `field` in `language` (default: active language). */
	fieldName: (field: string, language?: string) => string;
	/** Concrete field name in each configured language. */
	fieldNames: (field: string) => string[];
	fallbackFieldName: (field: string) => string;
	/** Logical name a schema field was expanded from. */
	canonicalFieldName: (model: ModelName<TModels>, fieldName: string) => string;

	getActiveLanguage: () => string;
	withLanguage: <T>(language: string, fn: () => T) => T;

	$options: PolyfieldOptions<TModels>;
	$context: PolyfieldContext;
}

// =============================================================================
// FACTORY
// =============================================================================

/**
 * Validate the options and expand every model declaration.
 * Declaration errors (ConfigError, FieldNotFoundError) are thrown from here.
 *
 * @example
 * ```ts
 * const polyfield = createPolyfield({
 *   languages: [
 *     { code: "en", label: "English" },
 *     { code: "fr", label: "Français" },
 *   ],
 *   models: {
 *     article: {
 *       fields: { title: { type: "text", notNull: true, label: "Title" } },
 *       translate: translate("title"),
 *     },
 *   },
 * });
 *
 * const record = {};
 * polyfield.withLanguage("fr", () => polyfield.set("article", record, "title", "Bonjour"));
 * // record → { title_fr: "Bonjour" }
 * ```
 */
export function createPolyfield<TModels extends Record<string, ModelDefinition>>(
	options: PolyfieldOptions<TModels>,
): Polyfield<TModels> {
	const ctx = buildContext(options);
	const built = buildSchemas(options.models, ctx);
	const schemas: Record<string, ModelSchema> = Object.fromEntries(built);
	const { languages, languageCodes, fallbackLanguage } = ctx.options;

	ctx.logger.debug("Polyfield initialized", {
		models: built.size,
		languages: [...languageCodes],
		fallbackLanguage,
	});

	function model(name: string): ModelSchema {
		const schema = built.get(name);
		if (!schema) throw PolyfieldError.unknownModel(name);
		return schema;
	}

	function accessor(modelName: string, field: string): FieldAccessor {
		const schema = model(modelName);
		const found = Object.hasOwn(schema.accessors, field) ? schema.accessors[field] : undefined;
		if (!found) throw PolyfieldError.unknownField(modelName, field);
		return found;
	}

	return {
		schemas,
		languages,
		fallbackLanguage,

		model,
		accessor,

		get(modelName, record, field) {
			return accessor(modelName, field).get(record);
		},

		set(modelName, record, field, value) {
			return accessor(modelName, field).set(record, value);
		},

		localize(modelName, record, localizeOptions) {
			const schema = model(modelName);
			const result: ModelRecord = { ...record };

			for (const field of schema.translatableFields) {
				const fieldAccessor = schema.accessors[field];
				if (!fieldAccessor) continue;
				result[field] = fieldAccessor.get(record);
				if (localizeOptions?.stripConcrete) {
					for (const concrete of fieldAccessor.concreteFields) delete result[concrete];
				}
			}
			return result;
		},

		translations(modelName, record, field) {
			const fieldAccessor = accessor(modelName, field);
			const values: Record<string, unknown> = {};
			for (const language of languageCodes) {
				values[language] = record[concreteFieldName(fieldAccessor.field, language)];
			}
			return values;
		},

		fieldName(field, language) {
			return concreteFieldName(field, language ?? ctx.getActiveLanguage());
		},

		fieldNames(field) {
			return concreteFieldNames(field, languageCodes);
		},

		fallbackFieldName(field) {
			return concreteFieldName(field, fallbackLanguage);
		},

		canonicalFieldName(modelName, fieldName) {
			const schema = model(modelName);
			const field = Object.hasOwn(schema.fields, fieldName) ? schema.fields[fieldName] : undefined;
			if (!field) {
				throw PolyfieldError.fromCode("UNKNOWN_FIELD", {
					message: `Model "${modelName}" has no field "${fieldName}"`,
					details: { model: modelName, field: fieldName },
				});
			}
			return canonicalFieldName(fieldName, field);
		},

		getActiveLanguage: () => ctx.getActiveLanguage(),
		withLanguage: (language, fn) => runWithLanguage(language, fn),

		$options: options,
		$context: ctx,
	};
}
