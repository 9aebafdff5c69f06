export type {
	ConcreteFieldDefinition,
	FieldAccessor,
	FieldDefinition,
	LanguageDefinition,
	ModelDefinition,
	ModelRecord,
	ModelSchema,
	PolyfieldLogger,
	PolyfieldOptions,
	UnresolvedAssignmentPolicy,
} from "@polyfield/core";
export {
	ConfigError,
	canonicalFieldName,
	concreteFieldName,
	FieldNotFoundError,
	PolyfieldError,
	translate,
} from "@polyfield/core";
export { normalizeLanguages, validateConfig } from "./config/index.js";
export { buildContext } from "./context/context.js";
export { getScopedLanguage, runWithLanguage } from "./context/language.js";
export {
	createPolyfield,
	type LocalizeOptions,
	type ModelName,
	type Polyfield,
} from "./polyfield/base.js";
export * from "./schema/index.js";
