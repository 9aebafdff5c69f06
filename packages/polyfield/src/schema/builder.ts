// =============================================================================
// SCHEMA BUILDER
// =============================================================================
// Turns model declarations into expanded model schemas. Models are built in
// dependency order so that every ancestor is complete before its
// descendants read it. Ancestor fields are inherited as already expanded.

import type {
	ConcreteFieldDefinition,
	FieldAccessor,
	ModelDefinition,
	ModelSchema,
	PolyfieldContext,
} from "@polyfield/core";
import { cloneFieldDefinition, ConfigError, toSnakeCase } from "@polyfield/core";
import { type AccessorTarget, createFieldAccessor } from "./accessor.js";
import { expandIndexes, multiplyField } from "./multiplier.js";
import {
	getAncestors,
	mergeInherited,
	registerTranslatable,
	resolveDefaultLanguageField,
} from "./registry.js";

function cloneConcreteField(field: ConcreteFieldDefinition): ConcreteFieldDefinition {
	const clone: ConcreteFieldDefinition = cloneFieldDefinition(field);
	if (field.originalField !== undefined) clone.originalField = field.originalField;
	if (field.language !== undefined) clone.language = field.language;
	return clone;
}

/**
 * Order model names so that every model comes after the models it extends.
 * Throws ConfigError on unknown ancestors and cycles.
 */
export function orderModels(models: Readonly<Record<string, ModelDefinition>>): string[] {
	const ordered: string[] = [];
	const state = new Map<string, "visiting" | "done">();

	function visit(name: string, path: string[]) {
		const current = state.get(name);
		if (current === "done") return;
		if (current === "visiting") {
			throw new ConfigError(`Models extend each other in a cycle: ${[...path, name].join(" → ")}`);
		}

		const model = models[name];
		if (!model) {
			const from = path[path.length - 1] ?? name;
			throw new ConfigError(`Model "${from}" extends "${name}", which is not declared`, {
				details: { model: from, extends: name },
			});
		}

		state.set(name, "visiting");
		for (const ancestor of model.extends ?? []) {
			visit(ancestor, [...path, name]);
		}
		state.set(name, "done");
		ordered.push(name);
	}

	for (const name of Object.keys(models)) {
		visit(name, []);
	}
	return ordered;
}

/**
 * Expand one model declaration. `schemas` must already hold every ancestor.
 */
export function buildModelSchema(
	name: string,
	model: ModelDefinition,
	schemas: ReadonlyMap<string, ModelSchema>,
	ctx: PolyfieldContext,
): ModelSchema {
	const { languageCodes, fallbackLanguage } = ctx.options;
	const translateLabels = model.translateLabels ?? ctx.options.translateLabels;

	const ancestors = getAncestors(name, model, schemas);
	const own = model.translate === undefined ? [] : registerTranslatable(name, model, model.translate);
	const inherited = mergeInherited(name, model, schemas);

	// Inherited fields arrive already expanded.
	const fields: Record<string, ConcreteFieldDefinition> = {};
	for (const ancestor of ancestors) {
		for (const [fieldName, field] of Object.entries(ancestor.fields)) {
			fields[fieldName] = cloneConcreteField(field);
		}
	}

	for (const [fieldName, field] of Object.entries(model.fields)) {
		const shadowsInherited =
			inherited.includes(fieldName) || fields[fieldName]?.originalField !== undefined;
		if (shadowsInherited && !own.includes(fieldName)) {
			throw new ConfigError(
				`Model "${name}": field "${fieldName}" shadows a translatable field inherited from an abstract model`,
				{ details: { model: name, field: fieldName } },
			);
		}

		if (!own.includes(fieldName)) {
			fields[fieldName] = cloneFieldDefinition(field);
			continue;
		}

		const { fields: concrete } = multiplyField({
			name: fieldName,
			field,
			languages: languageCodes,
			fallbackLanguage,
			translateLabels,
		});

		// The canonical name only ever exists as an accessor.
		delete fields[fieldName];

		for (const [concreteName, concreteField] of Object.entries(concrete)) {
			const inheritedField = fields[concreteName];
			if (
				Object.hasOwn(model.fields, concreteName) ||
				(inheritedField !== undefined && inheritedField.originalField !== fieldName)
			) {
				throw new ConfigError(
					`Model "${name}": translatable field "${fieldName}" needs "${concreteName}", which is already declared`,
					{ details: { model: name, field: fieldName, concreteField: concreteName } },
				);
			}
			fields[concreteName] = concreteField;
		}
	}

	const translatableFields = [...inherited];
	for (const fieldName of own) {
		if (!translatableFields.includes(fieldName)) translatableFields.push(fieldName);
	}

	const defaultLanguageField = resolveDefaultLanguageField(
		name,
		model,
		fields,
		ancestors,
		ctx.logger,
	);

	const target: AccessorTarget = { name, fields, defaultLanguageField };
	const accessors: Record<string, FieldAccessor> = {};
	for (const fieldName of translatableFields) {
		accessors[fieldName] = createFieldAccessor(fieldName, target, ctx);
	}

	const indexes = ancestors.flatMap((ancestor) =>
		ancestor.indexes.map((index) => ({ ...index, columns: [...index.columns] })),
	);
	indexes.push(...expandIndexes(model.indexes ?? [], new Set(own), languageCodes));

	return {
		name,
		tableName: model.tableName ?? toSnakeCase(name),
		abstract: model.abstract ?? false,
		fields,
		indexes,
		translatableFields: Object.freeze(translatableFields),
		defaultLanguageField,
		accessors: Object.freeze(accessors),
	};
}

/**
 * Expand every model declaration.
 *
 * @example
 * ```ts
 * const schemas = buildSchemas({
 *   translatable: { abstract: true, fields: { title: { type: "text" } }, translate: translate("title") },
 *   article: { extends: ["translatable"], fields: { slug: { type: "text", notNull: true } } },
 * }, ctx);
 * Object.keys(schemas.get("article")?.fields ?? {}); // ["title_en", "title_fr", "slug"]
 * ```
 */
export function buildSchemas(
	models: Readonly<Record<string, ModelDefinition>>,
	ctx: PolyfieldContext,
): Map<string, ModelSchema> {
	const schemas = new Map<string, ModelSchema>();

	for (const name of orderModels(models)) {
		const model = models[name];
		if (!model) continue;

		const schema = buildModelSchema(name, model, schemas, ctx);
		schemas.set(name, schema);

		ctx.logger.debug("Expanded model schema", {
			model: name,
			abstract: schema.abstract,
			fields: Object.keys(schema.fields).length,
			translatable: [...schema.translatableFields],
		});
	}

	return schemas;
}
