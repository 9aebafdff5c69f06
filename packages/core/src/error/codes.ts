// =============================================================================
// TYPED ERROR CODES
// =============================================================================
// Typed error code registry with default messages. Declaration-time codes
// abort `createPolyfield`; runtime codes are raised by the instance API.

export type RawErrorCode = {
	message: string;
	/**
	 * Phase in which the error can be raised.
	 *
	 * - `"declaration"`: thrown while building schemas; no instance exists afterwards.
	 * - `"runtime"`: thrown by get/set/model lookups on a built instance.
	 */
	phase: "declaration" | "runtime";
};

export const BASE_ERROR_CODES = {
	// Declaration-time errors — abort schema construction.
	CONFIG_ERROR: { message: "Invalid configuration", phase: "declaration" },
	FIELD_NOT_FOUND: { message: "Field not found", phase: "declaration" },

	// Runtime errors — raised by the instance API.
	UNKNOWN_MODEL: { message: "Unknown model", phase: "runtime" },
	UNKNOWN_FIELD: { message: "Field is not translatable", phase: "runtime" },
	UNRESOLVED_LANGUAGE: {
		message: "No concrete field in the language chain",
		phase: "runtime",
	},
} as const satisfies Record<string, RawErrorCode>;

export type BaseErrorCode = keyof typeof BASE_ERROR_CODES;
