export type {
	LanguageDefinition,
	PolyfieldLogger,
	PolyfieldOptions,
	UnresolvedAssignmentPolicy,
} from "./config.js";
export type { PolyfieldContext, ResolvedPolyfieldOptions } from "./context.js";
export type {
	ConcreteFieldDefinition,
	FieldChoice,
	FieldDefault,
	FieldDefinition,
	FieldType,
	FieldValidator,
	IndexDefinition,
} from "./field.js";
export type {
	FieldAccessor,
	ModelDefinition,
	ModelRecord,
	ModelSchema,
} from "./model.js";
