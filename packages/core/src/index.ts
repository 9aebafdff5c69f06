// Errors
export type { BaseErrorCode, PolyfieldErrorCode, RawErrorCode } from "./error/index.js";
export { BASE_ERROR_CODES, ConfigError, FieldNotFoundError, PolyfieldError } from "./error/index.js";

// Language resolution
export {
	canonicalFieldName,
	concreteFieldName,
	concreteFieldNames,
	isEmptyValue,
	normalizeLanguageCode,
	primarySubtag,
	translate,
} from "./language/index.js";

// Type definitions
export * from "./types/index.js";

// Utilities
export * from "./utils/index.js";
