export {
	type AccessorTarget,
	buildLanguageChain,
	createFieldAccessor,
	recordDefaultLanguage,
} from "./accessor.js";
export { buildModelSchema, buildSchemas, orderModels } from "./builder.js";
export {
	expandIndexes,
	type FieldBinding,
	hasExplicitDefault,
	type MultipliedField,
	type MultiplyFieldInput,
	multiplyField,
} from "./multiplier.js";
export {
	getAllTranslatableFields,
	getAncestors,
	isFieldDefinition,
	mergeInherited,
	registerTranslatable,
	resolveDefaultLanguageField,
} from "./registry.js";
