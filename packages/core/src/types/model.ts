import type { ConcreteFieldDefinition, FieldDefinition, IndexDefinition } from "./field.js";

// =============================================================================
// DECLARATION PHASE
// =============================================================================

export interface ModelDefinition {
	/** Abstract models are never persisted; concrete models inherit their fields. */
	abstract?: boolean;
	/** Names of abstract models whose fields and translatable sets are inherited. */
	extends?: readonly string[];
	fields: Record<string, FieldDefinition>;
	/**
	 * Names of the fields stored once per language. Must be a frozen array:
	 * build it with `translate("title", "body")`.
	 */
	translate?: readonly string[];
	/** Append ` (code)` to the label of each per-language field. Default: instance setting */
	translateLabels?: boolean;
	/** Field holding a per-record language that overrides the fallback language. */
	defaultLanguageField?: string;
	indexes?: IndexDefinition[];
	/** Table name used by SQL generation. Default: the model name in snake_case */
	tableName?: string;
}

// =============================================================================
// EXPANSION PHASE
// =============================================================================

/** A runtime record: concrete field values keyed by concrete name. */
export type ModelRecord = Record<string, unknown>;

export interface FieldAccessor {
	/** Canonical (logical) field name. */
	readonly field: string;
	/** Concrete field names, one per configured language, in configuration order. */
	readonly concreteFields: readonly string[];
	/** Ordered, deduplicated language chain consulted for this record. */
	chain(record: ModelRecord): string[];
	get(record: ModelRecord): unknown;
	/** Returns `false` when no language in the chain has a concrete field. */
	set(record: ModelRecord, value: unknown): boolean;
	/** First non-empty value along an explicit language chain. */
	resolve(record: ModelRecord, chain: readonly string[]): unknown;
	/** Write into the first existing concrete field of an explicit chain. */
	assign(record: ModelRecord, chain: readonly string[], value: unknown): boolean;
}

export interface ModelSchema {
	name: string;
	tableName: string;
	abstract: boolean;
	fields: Record<string, ConcreteFieldDefinition>;
	indexes: IndexDefinition[];
	/** Canonical translatable names, own and inherited from abstract ancestors. */
	translatableFields: readonly string[];
	defaultLanguageField: string | null;
	accessors: Readonly<Record<string, FieldAccessor>>;
}
