// =============================================================================
// FIELD CLONING
// =============================================================================
// Per-language fields must never share a choices list, a default value or
// metadata with each other or with the declaration they came from.

import type { FieldDefault, FieldDefinition } from "../types/field.js";

export function cloneDefault(value: FieldDefault): FieldDefault {
	if (Array.isArray(value)) return value.map(cloneDefault);
	if (value !== null && typeof value === "object") {
		const copy: { [key: string]: FieldDefault } = {};
		for (const [key, entry] of Object.entries(value)) {
			copy[key] = cloneDefault(entry);
		}
		return copy;
	}
	return value;
}

/**
 * Deep-copy a field declaration. Validator functions are shared, the array
 * holding them is not.
 */
export function cloneFieldDefinition(field: FieldDefinition): FieldDefinition {
	const clone: FieldDefinition = { ...field };

	if (field.default !== undefined) clone.default = cloneDefault(field.default);
	if (field.choices) clone.choices = field.choices.map((choice) => ({ ...choice }));
	if (field.validators) clone.validators = [...field.validators];
	if (field.references) clone.references = { ...field.references };
	if (field.metadata) {
		const metadata: Record<string, FieldDefault> = {};
		for (const [key, entry] of Object.entries(field.metadata)) {
			metadata[key] = cloneDefault(entry);
		}
		clone.metadata = metadata;
	}

	return clone;
}
