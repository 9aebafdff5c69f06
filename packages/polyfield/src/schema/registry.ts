// =============================================================================
// TRANSLATABLE FIELD REGISTRY
// =============================================================================
// Validates `translate` markers and merges the translatable sets inherited
// from abstract ancestors.

import type {
	FieldDefinition,
	ModelDefinition,
	ModelSchema,
	PolyfieldLogger,
} from "@polyfield/core";
import { ConfigError, FieldNotFoundError } from "@polyfield/core";

export function isFieldDefinition(value: unknown): value is FieldDefinition {
	return (
		typeof value === "object" && value !== null && "type" in value && typeof value.type === "string"
	);
}

/**
 * Validate a model's translatable-field marker and return its names.
 *
 * The marker must be a frozen list of unique, non-empty names, each naming a
 * field declared by the model itself (inherited fields do not count).
 */
export function registerTranslatable(
	modelName: string,
	model: ModelDefinition,
	fieldNames: unknown,
): string[] {
	if (typeof fieldNames === "string") {
		throw new ConfigError(
			`Model "${modelName}": 'translate' must be a list of field names, got the string "${fieldNames}". Use translate("${fieldNames}").`,
			{ details: { model: modelName } },
		);
	}
	if (!Array.isArray(fieldNames)) {
		throw new ConfigError(`Model "${modelName}": 'translate' must be a list of field names`, {
			details: { model: modelName },
		});
	}
	if (!Object.isFrozen(fieldNames)) {
		throw new ConfigError(
			`Model "${modelName}": 'translate' must be a frozen list. Build it with translate(...) or Object.freeze([...]).`,
			{ details: { model: modelName } },
		);
	}

	const names: string[] = [];
	for (const name of fieldNames) {
		if (typeof name !== "string" || name.length === 0) {
			throw new ConfigError(
				`Model "${modelName}": 'translate' entries must be non-empty strings, got ${JSON.stringify(name)}`,
				{ details: { model: modelName } },
			);
		}
		if (names.includes(name)) {
			throw new ConfigError(`Model "${modelName}": 'translate' lists "${name}" more than once`, {
				details: { model: modelName, field: name },
			});
		}
		names.push(name);
	}

	for (const name of names) {
		if (!Object.hasOwn(model.fields, name) || !isFieldDefinition(model.fields[name])) {
			throw new FieldNotFoundError(modelName, name);
		}
	}

	return names;
}

/**
 * Union of the translatable sets of the model's abstract ancestors.
 * First-seen order is kept; duplicates are dropped.
 */
export function mergeInherited(
	modelName: string,
	model: ModelDefinition,
	schemas: ReadonlyMap<string, ModelSchema>,
): string[] {
	const merged: string[] = [];

	for (const ancestor of getAncestors(modelName, model, schemas)) {
		for (const field of ancestor.translatableFields) {
			if (!merged.includes(field)) merged.push(field);
		}
	}

	return merged;
}

/**
 * Resolve the built schemas of the models named in `extends`. Only abstract
 * models can be extended.
 */
export function getAncestors(
	modelName: string,
	model: ModelDefinition,
	schemas: ReadonlyMap<string, ModelSchema>,
): ModelSchema[] {
	return (model.extends ?? []).map((ancestorName) => {
		const ancestor = schemas.get(ancestorName);
		if (!ancestor) {
			throw new ConfigError(
				`Model "${modelName}" extends "${ancestorName}", which is not declared before it`,
				{ details: { model: modelName, extends: ancestorName } },
			);
		}
		if (!ancestor.abstract) {
			throw new ConfigError(
				`Model "${modelName}" extends "${ancestorName}", which is not abstract`,
				{ details: { model: modelName, extends: ancestorName } },
			);
		}
		return ancestor;
	});
}

/**
 * Name of the field holding a per-record default language, or `null`.
 * A declared name that is not a field of the model is dropped with a warning.
 * Models that declare nothing take the first ancestor's setting.
 */
export function resolveDefaultLanguageField(
	modelName: string,
	model: ModelDefinition,
	fields: Readonly<Record<string, FieldDefinition>>,
	ancestors: readonly ModelSchema[],
	logger: PolyfieldLogger,
): string | null {
	const declared = model.defaultLanguageField;

	if (declared === undefined) {
		for (const ancestor of ancestors) {
			if (ancestor.defaultLanguageField !== null) return ancestor.defaultLanguageField;
		}
		return null;
	}

	if (!Object.hasOwn(fields, declared)) {
		logger.warn("Ignoring defaultLanguageField: no such field", {
			model: modelName,
			field: declared,
		});
		return null;
	}

	return declared;
}

/** Canonical translatable field names of a model, own and inherited. */
export function getAllTranslatableFields(schema: ModelSchema): readonly string[] {
	return schema.translatableFields;
}
