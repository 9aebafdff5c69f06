// =============================================================================
// FIELD DEFINITION
// =============================================================================

export type FieldType =
	| "text"
	| "varchar"
	| "integer"
	| "bigint"
	| "boolean"
	| "timestamp"
	| "jsonb"
	| "uuid"
	| "serial";

/** JSON-like default value. Arrays and objects are deep-cloned per language. */
export type FieldDefault =
	| string
	| number
	| boolean
	| null
	| FieldDefault[]
	| { [key: string]: FieldDefault };

export interface FieldChoice {
	value: string;
	label: string;
}

/** Returns an error message, or `null` when the value is accepted. */
export type FieldValidator = (value: unknown) => string | null;

export interface FieldDefinition {
	type: FieldType;
	primaryKey?: boolean;
	/** `false` (the default) means the column accepts NULL. */
	notNull?: boolean;
	/** When true, blank input is refused by forms and validators. */
	required?: boolean;
	default?: FieldDefault;
	/** Raw SQL default expression, e.g. `"NOW()"`. */
	defaultSql?: string;
	label?: string;
	maxLength?: number;
	unique?: boolean;
	choices?: FieldChoice[];
	validators?: FieldValidator[];
	references?: { table: string; column: string };
	/** Anything else the host framework needs, copied verbatim. */
	metadata?: Record<string, FieldDefault>;
}

/**
 * A field as it appears in an expanded schema. Per-language fields carry
 * a back-reference to the logical field they were expanded from.
 */
export interface ConcreteFieldDefinition extends FieldDefinition {
	originalField?: string;
	language?: string;
}

export interface IndexDefinition {
	name: string;
	columns: string[];
	unique?: boolean;
	using?: "btree" | "gin";
}
