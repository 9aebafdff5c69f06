import type { ModelSchema } from "@polyfield/core";

export interface FieldSummary {
	name: string;
	type: string;
	notNull: boolean;
	required: boolean;
	/** Logical field this per-language field was expanded from. */
	originalField: string | null;
	language: string | null;
}

export interface ModelSummary {
	name: string;
	tableName: string;
	abstract: boolean;
	translatableFields: string[];
	defaultLanguageField: string | null;
	fields: FieldSummary[];
	indexes: string[];
}

export function describeModel(schema: ModelSchema): ModelSummary {
	return {
		name: schema.name,
		tableName: schema.tableName,
		abstract: schema.abstract,
		translatableFields: [...schema.translatableFields],
		defaultLanguageField: schema.defaultLanguageField,
		fields: Object.entries(schema.fields).map(([name, field]) => ({
			name,
			type: field.type,
			notNull: field.notNull ?? false,
			required: field.required ?? false,
			originalField: field.originalField ?? null,
			language: field.language ?? null,
		})),
		indexes: schema.indexes.map((index) => index.name),
	};
}

/** Plain-text body for `polyfield inspect`. */
export function formatModel(summary: ModelSummary): string {
	const width = Math.max(0, ...summary.fields.map((field) => field.name.length));
	const lines = [
		`Table:         ${summary.abstract ? "(abstract)" : summary.tableName}`,
		`Translatable:  ${summary.translatableFields.join(", ") || "none"}`,
		`Default lang:  ${summary.defaultLanguageField ?? "none"}`,
		"Fields:",
	];

	for (const field of summary.fields) {
		const flags = [field.notNull && "not null", field.required && "required"].filter(Boolean);
		let line = `  ${field.name.padEnd(width)}  ${field.type}`;
		if (flags.length > 0) line += ` (${flags.join(", ")})`;
		if (field.originalField !== null) line += ` <- ${field.originalField} [${field.language}]`;
		lines.push(line);
	}

	if (summary.indexes.length > 0) {
		lines.push(`Indexes:       ${summary.indexes.join(", ")}`);
	}
	return lines.join("\n");
}
