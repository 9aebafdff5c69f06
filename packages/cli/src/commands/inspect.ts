import * as p from "@clack/prompts";
import { Command } from "commander";
import pc from "picocolors";
import { describeModel, formatModel } from "../utils/describe.js";
import { loadPolyfield } from "../utils/load-polyfield.js";

export const inspectCommand = new Command("inspect")
	.description("Show the expanded schema of every model")
	.option("-m, --model <name>", "Only show this model")
	.option("--json", "Output as JSON")
	.action(async (options: { model?: string; json?: boolean }) => {
		const loaded = await loadPolyfield(inspectCommand);
		if (!loaded) return;
		const { polyfield, configFile } = loaded;

		const schemas = Object.values(polyfield.schemas).filter(
			(schema) => options.model === undefined || schema.name === options.model,
		);
		if (options.model !== undefined && schemas.length === 0) {
			p.log.error(`${pc.red("Unknown model:")} ${options.model}`);
			process.exitCode = 1;
			return;
		}

		const summaries = schemas.map(describeModel);

		if (options.json) {
			const info = {
				configFile,
				languages: polyfield.languages,
				fallbackLanguage: polyfield.fallbackLanguage,
				models: summaries,
			};
			process.stdout.write(`${JSON.stringify(info, null, 2)}\n`);
			return;
		}

		p.intro(pc.bgCyan(pc.black(" polyfield inspect ")));
		p.log.info(`${pc.bold("Config:")}    ${configFile}`);
		p.log.info(
			`${pc.bold("Languages:")} ${polyfield.languages
				.map((language) =>
					language.code === polyfield.fallbackLanguage
						? `${pc.cyan(language.code)} ${pc.dim("(fallback)")}`
						: pc.cyan(language.code),
				)
				.join(", ")}`,
		);

		for (const summary of summaries) {
			p.note(formatModel(summary), summary.name);
		}

		p.outro(pc.dim("Run with --json for machine-readable output"));
	});
