import type { LanguageDefinition, PolyfieldLogger } from "@polyfield/core";
import {
	createPolyfield,
	type ModelDefinition,
	type Polyfield,
	type PolyfieldOptions,
} from "polyfield";

export interface LogEntry {
	level: "debug" | "info" | "warn" | "error";
	message: string;
	data?: Record<string, unknown>;
}

export interface TestInstanceOptions<TModels extends Record<string, ModelDefinition>> {
	models: TModels;
	/** Default: en, fr */
	languages?: ReadonlyArray<LanguageDefinition | string>;
	/** Default: the first language */
	fallbackLanguage?: string;
	translateLabels?: boolean;
	unresolvedAssignment?: PolyfieldOptions["unresolvedAssignment"];
}

export interface TestInstance<TModels extends Record<string, ModelDefinition>> {
	/** The polyfield instance */
	polyfield: Polyfield<TModels>;
	/** Everything the instance logged, in order */
	logs: LogEntry[];
	/** Change what the instance's getLanguage() returns. `undefined` means no answer. */
	setLanguage: (language: string | undefined) => void;
}

/** Logger that keeps every entry in `logs` instead of printing. */
export function createRecordingLogger(logs: LogEntry[]): PolyfieldLogger {
	const record =
		(level: LogEntry["level"]) => (message: string, data?: Record<string, unknown>) => {
			logs.push(data === undefined ? { level, message } : { level, message, data });
		};
	return {
		debug: record("debug"),
		info: record("info"),
		warn: record("warn"),
		error: record("error"),
	};
}

export function getTestInstance<TModels extends Record<string, ModelDefinition>>(
	options: TestInstanceOptions<TModels>,
): TestInstance<TModels> {
	const logs: LogEntry[] = [];
	let language: string | undefined;

	const polyfield = createPolyfield({
		languages: options.languages ?? ["en", "fr"],
		fallbackLanguage: options.fallbackLanguage,
		getLanguage: () => language,
		models: options.models,
		translateLabels: options.translateLabels,
		unresolvedAssignment: options.unresolvedAssignment,
		logger: createRecordingLogger(logs),
	});

	return {
		polyfield,
		logs,
		setLanguage: (next) => {
			language = next;
		},
	};
}
