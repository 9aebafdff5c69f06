// =============================================================================
// SQL GENERATION — PostgreSQL DDL for expanded model schemas
// =============================================================================

import type { ConcreteFieldDefinition, FieldDefault, ModelSchema } from "@polyfield/core";

function pgType(field: ConcreteFieldDefinition): string {
	switch (field.type) {
		case "uuid":
			return "UUID";
		case "text":
			return "TEXT";
		case "varchar":
			return field.maxLength ? `VARCHAR(${field.maxLength})` : "VARCHAR";
		case "bigint":
			return "BIGINT";
		case "integer":
			return "INTEGER";
		case "boolean":
			return "BOOLEAN";
		case "timestamp":
			return "TIMESTAMPTZ";
		case "jsonb":
			return "JSONB";
		case "serial":
			return "SERIAL";
		default:
			return "TEXT";
	}
}

export function quoteIdent(name: string): string {
	return `"${name.replace(/"/g, '""')}"`;
}

export function quoteLiteral(value: string): string {
	return `'${value.replace(/'/g, "''")}'`;
}

export function defaultLiteral(value: FieldDefault, field: ConcreteFieldDefinition): string {
	if (value === null) return "NULL";
	if (typeof value === "boolean") return value ? "TRUE" : "FALSE";
	if (typeof value === "number") return String(value);
	if (typeof value === "string") return quoteLiteral(value);
	const json = quoteLiteral(JSON.stringify(value));
	return field.type === "jsonb" ? `${json}::jsonb` : json;
}

export function qualifyTable(schema: string, tableName: string): string {
	if (schema === "public") return quoteIdent(tableName);
	return `${quoteIdent(schema)}.${quoteIdent(tableName)}`;
}

export function columnSQL(name: string, field: ConcreteFieldDefinition, schema: string): string {
	const column = quoteIdent(name);
	const parts = [column, pgType(field)];
	if (field.primaryKey) parts.push("PRIMARY KEY");
	if (field.notNull && !field.primaryKey) parts.push("NOT NULL");
	if (field.unique && !field.primaryKey) parts.push("UNIQUE");
	if (field.defaultSql !== undefined) {
		parts.push(`DEFAULT ${field.defaultSql}`);
	} else if (field.default !== undefined) {
		parts.push(`DEFAULT ${defaultLiteral(field.default, field)}`);
	}
	if (field.choices && field.choices.length > 0) {
		const values = field.choices.map((choice) => quoteLiteral(choice.value)).join(", ");
		parts.push(`CHECK (${column} IN (${values}))`);
	}
	if (field.references) {
		const refTable = qualifyTable(schema, field.references.table);
		parts.push(`REFERENCES ${refTable}(${quoteIdent(field.references.column)})`);
	}
	return `  ${parts.join(" ")}`;
}

export function createTableSQL(model: ModelSchema, schema: string): string {
	const qualified = qualifyTable(schema, model.tableName);
	const colLines: string[] = [];

	for (const [name, field] of Object.entries(model.fields)) {
		colLines.push(columnSQL(name, field, schema));
	}

	let sql = `CREATE TABLE IF NOT EXISTS ${qualified} (\n${colLines.join(",\n")}\n);\n`;

	for (const idx of model.indexes) {
		const cols = idx.columns.map(quoteIdent).join(", ");
		const kind = idx.unique ? "UNIQUE INDEX" : "INDEX";
		const using = idx.using ? ` USING ${idx.using}` : "";
		// Indexes always live in their table's schema.
		sql += `CREATE ${kind} IF NOT EXISTS ${quoteIdent(idx.name)} ON ${qualified}${using} (${cols});\n`;
	}

	return sql;
}

/**
 * DDL for every concrete model, in declaration order. Abstract models have
 * no table.
 */
export function generateSQL(schemas: Readonly<Record<string, ModelSchema>>, schema = "public"): string {
	const statements: string[] = [];
	if (schema !== "public") {
		statements.push(`CREATE SCHEMA IF NOT EXISTS ${quoteIdent(schema)};\n`);
	}
	for (const model of Object.values(schemas)) {
		if (model.abstract) continue;
		statements.push(createTableSQL(model, schema));
	}
	return statements.join("\n");
}
