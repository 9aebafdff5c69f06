import { BASE_ERROR_CODES, type BaseErrorCode } from "./codes.js";

export { BASE_ERROR_CODES, type BaseErrorCode, type RawErrorCode } from "./codes.js";

export type PolyfieldErrorCode = BaseErrorCode;

export class PolyfieldError extends Error {
	readonly code: PolyfieldErrorCode;
	readonly details?: Record<string, unknown>;

	constructor(
		code: PolyfieldErrorCode,
		message: string,
		options?: {
			cause?: unknown;
			details?: Record<string, unknown>;
		},
	) {
		super(message, { cause: options?.cause });
		this.code = code;
		this.details = options?.details;
		this.name = "PolyfieldError";
	}

	/** Whether this error aborts schema construction. */
	get isDeclarationError(): boolean {
		return BASE_ERROR_CODES[this.code].phase === "declaration";
	}

	/**
	 * Create a PolyfieldError from a typed error code.
	 * Uses the default message from BASE_ERROR_CODES.
	 */
	static fromCode(
		code: PolyfieldErrorCode,
		options?: { message?: string; cause?: unknown; details?: Record<string, unknown> },
	): PolyfieldError {
		return new PolyfieldError(code, options?.message ?? BASE_ERROR_CODES[code].message, {
			cause: options?.cause,
			details: options?.details,
		});
	}

	static unknownModel(model: string) {
		return new PolyfieldError("UNKNOWN_MODEL", `Model "${model}" is not declared`, {
			details: { model },
		});
	}

	static unknownField(model: string, field: string) {
		return new PolyfieldError(
			"UNKNOWN_FIELD",
			`Field "${field}" is not a translatable field of model "${model}"`,
			{ details: { model, field } },
		);
	}

	static unresolvedLanguage(model: string, field: string, chain: readonly string[]) {
		return new PolyfieldError(
			"UNRESOLVED_LANGUAGE",
			`Cannot assign "${model}.${field}": none of [${chain.join(", ")}] has a concrete field`,
			{ details: { model, field, chain: [...chain] } },
		);
	}
}

/**
 * The translatable-field marker or the instance options are malformed.
 * Always raised while schemas are being built.
 */
export class ConfigError extends PolyfieldError {
	constructor(message: string, options?: { cause?: unknown; details?: Record<string, unknown> }) {
		super("CONFIG_ERROR", message, options);
		this.name = "ConfigError";
	}
}

/** A name in a model's `translate` marker is not one of its declared fields. */
export class FieldNotFoundError extends PolyfieldError {
	readonly model: string;
	readonly field: string;

	constructor(model: string, field: string) {
		super(
			"FIELD_NOT_FOUND",
			`There is no field "${field}" in model "${model}", as specified in its translate marker`,
			{ details: { model, field } },
		);
		this.name = "FieldNotFoundError";
		this.model = model;
		this.field = field;
	}
}
