import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import { createNoopLogger } from "@polyfield/core/logger";
import { createPolyfield } from "polyfield";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { possibleConfigPaths } from "../utils/config-paths.js";
import { extractOptions, findConfigFile, getPathAliases, isPolyfieldOptions } from "../utils/get-config.js";

const options = { languages: ["en", "fr"], models: {} };

describe("extractOptions", () => {
	it("reads a named polyfield instance", () => {
		const polyfield = createPolyfield({ ...options, logger: createNoopLogger() });

		expect(extractOptions({ polyfield })).toBe(polyfield.$options);
	});

	it("reads a named plain options object", () => {
		expect(extractOptions({ polyfield: options })).toBe(options);
	});

	it("reads a default-exported instance", () => {
		const polyfield = createPolyfield({ ...options, logger: createNoopLogger() });

		expect(extractOptions({ ...polyfield })).toBe(polyfield.$options);
	});

	it("reads default-exported plain options", () => {
		const config = { ...options };

		expect(extractOptions(config)).toBe(config);
	});

	it("returns null for anything else", () => {
		expect(extractOptions({ database: "x" })).toBeNull();
		expect(extractOptions({ languages: "en", models: {} })).toBeNull();
	});
});

describe("isPolyfieldOptions", () => {
	it("needs a language list and a models object", () => {
		expect(isPolyfieldOptions(options)).toBe(true);
		expect(isPolyfieldOptions({ languages: [] })).toBe(false);
		expect(isPolyfieldOptions({ languages: [], models: [] })).toBe(false);
		expect(isPolyfieldOptions(null)).toBe(false);
	});
});

describe("config files on disk", () => {
	let dir: string;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), "polyfield-cli-"));
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	it("finds the first candidate that exists", () => {
		writeFileSync(join(dir, "polyfield.ts"), "export default {};\n");
		writeFileSync(join(dir, "polyfield.config.ts"), "export default {};\n");

		expect(findConfigFile(dir)).toBe(resolve(dir, "polyfield.config.ts"));
	});

	it("returns null when nothing exists", () => {
		expect(findConfigFile(dir)).toBeNull();
		expect(findConfigFile(dir, "missing.ts")).toBeNull();
	});

	it("reads path aliases from tsconfig.json, ignoring comments", () => {
		writeFileSync(
			join(dir, "tsconfig.json"),
			`{
				// project aliases
				"compilerOptions": { "baseUrl": ".", "paths": { "@/*": ["./src/*"], "~db": ["./db/index.ts"] } }
			}`,
		);

		expect(getPathAliases(dir)).toEqual({
			"@": resolve(dir, "src"),
			"~db": resolve(dir, "db/index.ts"),
		});
	});

	it("returns null without paths", () => {
		writeFileSync(join(dir, "tsconfig.json"), `{ "compilerOptions": {} }`);

		expect(getPathAliases(dir)).toBeNull();
	});
});

describe("possibleConfigPaths", () => {
	it("starts at the project root", () => {
		expect(possibleConfigPaths.slice(0, 2)).toEqual(["polyfield.config.ts", "polyfield.config.tsx"]);
		expect(possibleConfigPaths).toContain("src/lib/polyfield.mts");
	});
});
