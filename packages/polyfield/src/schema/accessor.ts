// =============================================================================
// ACCESSOR GENERATOR — get/set through the logical field name
// =============================================================================
// Each accessor resolves a language chain for the record:
//
//   active → primary(active) → default → primary(default)
//
// where "default" is the record's default-language field when the model
// declares one and it holds a value, otherwise the fallback language.
// get() returns the first non-empty value; set() writes to the first
// language that has a concrete field.

import type {
	ConcreteFieldDefinition,
	FieldAccessor,
	ModelRecord,
	PolyfieldContext,
} from "@polyfield/core";
import {
	concreteFieldName,
	concreteFieldNames,
	isEmptyValue,
	PolyfieldError,
	primarySubtag,
} from "@polyfield/core";

/** The part of a model schema an accessor reads. */
export interface AccessorTarget {
	name: string;
	fields: Readonly<Record<string, ConcreteFieldDefinition>>;
	defaultLanguageField: string | null;
}

/** Ordered, deduplicated resolution chain. */
export function buildLanguageChain(activeLanguage: string, defaultLanguage: string): string[] {
	const chain: string[] = [];
	for (const language of [
		activeLanguage,
		primarySubtag(activeLanguage),
		defaultLanguage,
		primarySubtag(defaultLanguage),
	]) {
		if (!chain.includes(language)) chain.push(language);
	}
	return chain;
}

/**
 * The record's own default language when the model declares a
 * default-language field and the record holds a value in it.
 */
export function recordDefaultLanguage(
	target: AccessorTarget,
	record: ModelRecord,
	fallbackLanguage: string,
): string {
	if (target.defaultLanguageField !== null) {
		const value = record[target.defaultLanguageField];
		if (typeof value === "string" && value.length > 0) return value;
	}
	return fallbackLanguage;
}

export function createFieldAccessor(
	field: string,
	target: AccessorTarget,
	ctx: PolyfieldContext,
): FieldAccessor {
	const { languageCodes, fallbackLanguage, unresolvedAssignment } = ctx.options;

	function existing(language: string): string | null {
		const name = concreteFieldName(field, language);
		if (!Object.hasOwn(target.fields, name)) return null;
		// A plain field can share the name of a language this field is not stored in.
		return target.fields[name]?.originalField === field ? name : null;
	}

	const accessor: FieldAccessor = {
		field,
		concreteFields: concreteFieldNames(field, languageCodes),

		chain(record) {
			return buildLanguageChain(
				ctx.getActiveLanguage(),
				recordDefaultLanguage(target, record, fallbackLanguage),
			);
		},

		resolve(record, chain) {
			for (const language of chain) {
				const name = existing(language);
				if (name === null) continue;
				const value = record[name];
				if (!isEmptyValue(value)) return value;
			}
			return undefined;
		},

		assign(record, chain, value) {
			for (const language of chain) {
				const name = existing(language);
				if (name === null) continue;
				record[name] = value;
				return true;
			}
			return false;
		},

		get(record) {
			return accessor.resolve(record, accessor.chain(record));
		},

		set(record, value) {
			const chain = accessor.chain(record);
			if (accessor.assign(record, chain, value)) return true;

			if (unresolvedAssignment === "throw") {
				throw PolyfieldError.unresolvedLanguage(target.name, field, chain);
			}
			if (unresolvedAssignment === "warn") {
				ctx.logger.warn("Discarded assignment: no concrete field in the language chain", {
					model: target.name,
					field,
					chain,
				});
			}
			return false;
		},
	};

	return accessor;
}
