// =============================================================================
// Config loader — uses c12 (UnJS) + jiti for runtime TS transpilation
// =============================================================================
// Discovers and loads the user's polyfield config file (e.g.
// polyfield.config.ts). Handles a named export `polyfield`, a default
// export, a polyfield instance or a plain options object.

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { PolyfieldOptions } from "@polyfield/core";
import { loadConfig } from "c12";
import { createJiti } from "jiti";
import { possibleConfigPaths } from "./config-paths.js";

export interface ResolvedPolyfieldConfig {
	/** The PolyfieldOptions found in the config file */
	options: PolyfieldOptions;
	/** Absolute path of the config file that was loaded */
	configFile: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Shallow shape check; createPolyfield validates the rest. */
export function isPolyfieldOptions(value: unknown): value is PolyfieldOptions {
	return isRecord(value) && Array.isArray(value.languages) && isRecord(value.models);
}

/**
 * Load and resolve the polyfield config file.
 *
 * Resolution order:
 * 1. If `configPath` is provided (--config flag), use it directly.
 * 2. Otherwise, scan `possibleConfigPaths` from the project root.
 *
 * The config file should export the instance or its options in one of:
 *   - `export const polyfield = createPolyfield({ ... })`  → polyfield.$options
 *   - `export default createPolyfield({ ... })`           → default.$options
 *   - `export const polyfield = { languages, models }`    → plain options
 *   - `export default { languages, models }`              → plain options
 */
export async function getConfig({
	cwd,
	configPath,
}: {
	cwd: string;
	configPath?: string;
}): Promise<ResolvedPolyfieldConfig | null> {
	// --- Explicit --config path ---
	if (configPath) {
		const resolvedPath = existsSync(configPath) ? resolve(configPath) : resolve(cwd, configPath);
		return tryLoadConfig(resolvedPath, cwd);
	}

	// --- Auto-discovery ---
	for (const candidate of possibleConfigPaths) {
		const fullPath = resolve(cwd, candidate);
		if (!existsSync(fullPath)) continue;

		const result = await tryLoadConfig(fullPath, cwd);
		if (result) return result;
	}

	return null;
}

/**
 * Read tsconfig.json and extract path aliases for jiti.
 * Returns a Record<alias, resolved path> or null if no aliases found.
 */
export function getPathAliases(cwd: string): Record<string, string> | null {
	const tsconfigPath = resolve(cwd, "tsconfig.json");
	if (!existsSync(tsconfigPath)) return null;

	let tsconfig: unknown;
	try {
		const raw = readFileSync(tsconfigPath, "utf-8");
		// Strip comments for JSON.parse compatibility (single-line and multi-line)
		const stripped = raw.replace(/\/\*[\s\S]*?\*\//g, "").replace(/\/\/.*$/gm, "");
		tsconfig = JSON.parse(stripped);
	} catch {
		return null;
	}

	if (!isRecord(tsconfig) || !isRecord(tsconfig.compilerOptions)) return null;
	const { paths, baseUrl } = tsconfig.compilerOptions;
	if (!isRecord(paths)) return null;

	const baseDir = resolve(cwd, typeof baseUrl === "string" ? baseUrl : ".");
	const aliases: Record<string, string> = {};

	for (const [alias, targets] of Object.entries(paths)) {
		const target: unknown = Array.isArray(targets) ? targets[0] : undefined;
		if (typeof target !== "string") continue;
		// Strip trailing /* from both alias and target
		const cleanAlias = alias.replace(/\/\*$/, "");
		const cleanTarget = target.replace(/\/\*$/, "");
		aliases[cleanAlias] = resolve(baseDir, cleanTarget);
	}

	return Object.keys(aliases).length > 0 ? aliases : null;
}

async function tryLoadConfig(
	configFile: string,
	cwd: string,
): Promise<ResolvedPolyfieldConfig | null> {
	try {
		const aliases = getPathAliases(cwd);

		// If path aliases exist, create a jiti instance with alias support
		const jitiInstance = aliases ? createJiti(cwd, { alias: aliases }) : undefined;

		const { config } = await loadConfig({
			configFile,
			cwd,
			dotenv: {
				fileName: [".env", ".env.local", ".env.development", ".env.production"],
			},
			rcFile: false,
			packageJson: false,
			globalRc: false,
			...(jitiInstance ? { jiti: jitiInstance } : {}),
		});

		if (!isRecord(config)) return null;

		const options = extractOptions(config);
		if (!options) return null;

		return { options, configFile };
	} catch (error) {
		// Surface config parse errors so users can debug, instead of silently failing
		const message = error instanceof Error ? error.message : String(error);
		process.stderr.write(`polyfield: failed to load config from ${configFile}: ${message}\n`);
		return null;
	}
}

/**
 * Extract PolyfieldOptions from the loaded module's config object.
 *
 * c12 resolves `export default X` → `{ ...X }` and named exports → `{ name: X }`.
 * We handle:
 *   1. `{ polyfield: Polyfield }` → named export, an instance with $options
 *   2. `{ polyfield: PolyfieldOptions }` → named export, plain options object
 *   3. Polyfield instance at root (has $options)
 *   4. Plain PolyfieldOptions at root (has `languages` and `models`)
 */
export function extractOptions(config: Record<string, unknown>): PolyfieldOptions | null {
	for (const candidate of [config.polyfield, config]) {
		if (!isRecord(candidate)) continue;
		if (isPolyfieldOptions(candidate.$options)) return candidate.$options;
		if (isPolyfieldOptions(candidate)) return candidate;
	}
	return null;
}

/**
 * Find the config file path without loading it (for display purposes).
 */
export function findConfigFile(cwd: string, configPath?: string): string | null {
	if (configPath) {
		const resolved = existsSync(configPath) ? resolve(configPath) : resolve(cwd, configPath);
		return existsSync(resolved) ? resolved : null;
	}

	for (const candidate of possibleConfigPaths) {
		const fullPath = resolve(cwd, candidate);
		if (existsSync(fullPath)) return fullPath;
	}

	return null;
}
