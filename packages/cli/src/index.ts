#!/usr/bin/env node
import "dotenv/config";
import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import pc from "picocolors";
import { generateCommand } from "./commands/generate.js";
import { inspectCommand } from "./commands/inspect.js";

// Graceful shutdown
process.on("SIGINT", () => process.exit(0));
process.on("SIGTERM", () => process.exit(0));

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
	try {
		const pkg: unknown = JSON.parse(readFileSync(resolve(__dirname, "../package.json"), "utf-8"));
		if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
			return pkg.version;
		}
	} catch (error) {
		process.stderr.write(`polyfield: could not read package version: ${String(error)}\n`);
	}
	return "0.1.0";
}

const cliVersion = readVersion();

const BANNER = `
  ${pc.bold(pc.cyan("polyfield"))} ${pc.dim(`v${cliVersion}`)}
  ${pc.dim("Per-language fields with fallback resolution")}
`;

const program = new Command()
	.name("polyfield")
	.description("CLI for polyfield — inspect expanded schemas and generate SQL")
	.version(cliVersion, "-v, --version")
	.option("--cwd <dir>", "Working directory", process.cwd())
	.option("-c, --config <path>", "Path to polyfield config file")
	.action(() => {
		console.log(BANNER);
		program.help();
	});

program.addCommand(inspectCommand);
program.addCommand(generateCommand);

program.exitOverride();

try {
	await program.parseAsync();
} catch (error) {
	if (error instanceof Error && "code" in error && error.code === "commander.helpDisplayed") {
		process.exit(0);
	}
	if (error instanceof Error && "code" in error && error.code === "commander.version") {
		process.exit(0);
	}
	const message = error instanceof Error ? error.message : String(error);
	console.error(pc.red(message));
	process.exit(1);
}
