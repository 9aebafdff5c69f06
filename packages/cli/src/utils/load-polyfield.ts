import { resolve } from "node:path";
import * as p from "@clack/prompts";
import { createConsoleLogger } from "@polyfield/core/logger";
import type { Command } from "commander";
import pc from "picocolors";
import { createPolyfield, type Polyfield } from "polyfield";
import { getConfig } from "./get-config.js";

export interface LoadedPolyfield {
	polyfield: Polyfield;
	configFile: string;
	/** Absolute working directory from --cwd. */
	cwd: string;
}

export interface RootOptions {
	cwd: string;
	configPath: string | undefined;
}

/** --cwd and --config as given to the root command. */
export function rootOptions(command: Command): RootOptions {
	const opts = command.parent?.opts();
	const cwd: string = opts?.cwd ?? process.cwd();
	const configPath: string | undefined = opts?.config;
	return { cwd: resolve(cwd), configPath };
}

/**
 * Resolve --cwd/--config from the root command, load the config file and
 * build the instance. Reports and returns null when no config is found.
 */
export async function loadPolyfield(command: Command): Promise<LoadedPolyfield | null> {
	const { cwd, configPath } = rootOptions(command);

	const config = await getConfig({ cwd, configPath });
	if (!config) {
		p.log.error(
			`${pc.red("No polyfield config found.")} Create ${pc.cyan("polyfield.config.ts")} or pass ${pc.cyan("--config <path>")}.`,
		);
		process.exitCode = 1;
		return null;
	}

	const polyfield = createPolyfield({
		...config.options,
		logger: config.options.logger ?? createConsoleLogger({ level: "warn", timestamps: false }),
	});

	return { polyfield, configFile: config.configFile, cwd };
}
