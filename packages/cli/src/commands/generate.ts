import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import * as p from "@clack/prompts";
import { Command } from "commander";
import pc from "picocolors";
import { loadPolyfield } from "../utils/load-polyfield.js";
import { generateSQL } from "../utils/sql.js";

export const generateCommand = new Command("generate")
	.description("Generate PostgreSQL DDL for every concrete model")
	.option("-s, --schema <name>", "PostgreSQL schema", "public")
	.option("-o, --output <file>", "Write the SQL to this file instead of stdout")
	.option("-y, --yes", "Overwrite the output file without asking")
	.action(async (options: { schema: string; output?: string; yes?: boolean }) => {
		const loaded = await loadPolyfield(generateCommand);
		if (!loaded) return;
		const { polyfield, cwd } = loaded;

		const sql = generateSQL(polyfield.schemas, options.schema);

		if (!options.output) {
			process.stdout.write(sql);
			return;
		}

		p.intro(pc.bgCyan(pc.black(" polyfield generate ")));

		const filePath = resolve(cwd, options.output);
		if (existsSync(filePath) && !options.yes) {
			const confirmed = await p.confirm({
				message: `${options.output} exists. Overwrite?`,
				initialValue: false,
			});

			if (p.isCancel(confirmed) || !confirmed) {
				p.cancel("Generate cancelled.");
				return;
			}
		}

		mkdirSync(dirname(filePath), { recursive: true });
		const content = [
			"-- Generated by polyfield",
			`-- Languages: ${polyfield.languages.map((language) => language.code).join(", ")} (fallback: ${polyfield.fallbackLanguage})`,
			"",
			sql,
		].join("\n");
		writeFileSync(filePath, content, "utf-8");

		const tables = Object.values(polyfield.schemas)
			.filter((schema) => !schema.abstract)
			.map((schema) => pc.cyan(schema.tableName));
		p.log.success(`Wrote ${pc.cyan(options.output)}`);
		p.log.info(`  ${pc.green("CREATE")} ${tables.join(", ")}`);
		p.outro(pc.dim("Apply it with psql or your migration tool."));
	});
